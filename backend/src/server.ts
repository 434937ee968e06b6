import express from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';

import { createSessionRouter } from './routes/sessions.js';
import { createConfigRouter } from './routes/config.js';

import type { Orchestrator } from './services/orchestrator.js';
import type { SessionRegistry } from './services/sessionRegistry.js';
import type { ConfigManager } from './services/configManager.js';
import type { Logger } from './utils/logger.js';
import type { OutputEvent, Session } from '../../shared/types/session.js';

interface ServerOptions {
  orchestrator: Orchestrator;
  registry: SessionRegistry;
  configManager: ConfigManager;
  logger?: Logger;
  corsOrigin?: string | string[];
}

export class Server {
  readonly app: express.Application;
  private httpServer: ReturnType<typeof createServer>;
  private io: SocketIOServer;
  private detachListeners: Array<() => void> = [];

  constructor(private options: ServerOptions) {
    this.app = express();
    this.httpServer = createServer(this.app);
    this.io = new SocketIOServer(this.httpServer, {
      cors: {
        origin: options.corsOrigin ?? '*',
        methods: ['GET', 'POST']
      }
    });

    this.setupMiddleware();
    this.setupRoutes();
    this.setupSocketIO();
  }

  private setupMiddleware() {
    this.app.use(cors({ origin: this.options.corsOrigin ?? '*' }));
    this.app.use(express.json({ limit: '1mb' }));
  }

  private setupRoutes() {
    const { orchestrator, configManager, logger } = this.options;

    this.app.get('/health', (_req, res) => {
      const health = orchestrator.health();
      res.json({
        status: health.acceptingSessions ? 'ok' : 'shutting_down',
        ...health,
        timestamp: new Date().toISOString()
      });
    });

    const sessionRouter = createSessionRouter(orchestrator, logger);
    this.app.use('/api/sessions', sessionRouter);
    this.app.use('/sessions', sessionRouter);
    this.app.use('/api/config', createConfigRouter(configManager, logger));

    // Malformed JSON bodies end up here
    this.app.use((error: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      if (error instanceof SyntaxError) {
        res.status(400).json({ error: 'Invalid JSON body' });
        return;
      }
      logger?.error('Unhandled request error', error instanceof Error ? error : undefined);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private setupSocketIO() {
    const { registry, logger } = this.options;

    this.io.on('connection', (socket) => {
      logger?.verbose(`Client connected: ${socket.id}`);
      socket.emit('sessions:initial', registry.list());

      socket.on('disconnect', () => {
        logger?.verbose(`Client disconnected: ${socket.id}`);
      });
    });

    const forward = <T>(event: string, channel: string) => {
      const listener = (payload: T) => {
        this.io.emit(channel, payload);
      };
      registry.on(event, listener);
      this.detachListeners.push(() => registry.off(event, listener));
    };

    forward<Session>('session-created', 'session:created');
    forward<Session>('session-updated', 'session:updated');
    forward<Session>('session-retired', 'session:retired');
    forward<{ id: string }>('session-purged', 'session:purged');
    forward<OutputEvent>('session-output', 'session:output');
  }

  /** Resolves with the bound port (useful when `port` is 0). */
  async start(port: number, host: string): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.httpServer.once('error', onError);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', onError);
        const address = this.httpServer.address();
        const boundPort = address !== null && typeof address === 'object' ? address.port : port;
        this.options.logger?.info(`Server running on http://${host}:${boundPort}`);
        resolve(boundPort);
      });
    });
  }

  async stop(): Promise<void> {
    for (const detach of this.detachListeners) {
      detach();
    }
    this.detachListeners = [];

    return new Promise<void>((resolve) => {
      this.io.close(() => resolve());
      // Output streams of finished sessions are done; drop idle keep-alive sockets too
      this.httpServer.closeAllConnections();
    });
  }
}
