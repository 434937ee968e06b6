import { Router, type Request, type Response } from 'express';
import type { UpdateConfigRequest } from '../types/config.js';
import type { ConfigManager } from '../services/configManager.js';
import type { Logger } from '../utils/logger.js';
import { sendError } from './utils.js';

export function createConfigRouter(configManager: ConfigManager, logger?: Logger): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(configManager.getPublicConfig());
  });

  router.put('/', (req: Request, res: Response) => {
    try {
      const updates: UpdateConfigRequest = req.body ?? {};
      configManager.updateConfig(updates);
      logger?.info(`Configuration updated: ${Object.keys(updates).join(', ')}`);
      res.json(configManager.getPublicConfig());
    } catch (error) {
      sendError(res, error, 'Failed to update configuration', logger);
    }
  });

  return router;
}
