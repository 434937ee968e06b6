import { Server } from './server.js';
import type { ConfigManager } from './services/configManager.js';
import { WorkspaceManager } from './services/workspaceManager.js';
import { CliAgentExecutable, type AgentExecutable } from './services/agentExecutable.js';
import { ProcessSupervisor } from './services/processSupervisor.js';
import { SessionRegistry } from './services/sessionRegistry.js';
import { Orchestrator } from './services/orchestrator.js';
import { ShutdownCoordinator, type ShutdownReport } from './services/shutdownCoordinator.js';
import type { AppConfig } from './types/config.js';
import type { Logger } from './utils/logger.js';

export interface Application {
  workspaceManager: WorkspaceManager;
  registry: SessionRegistry;
  orchestrator: Orchestrator;
  shutdownCoordinator: ShutdownCoordinator;
  server: Server;
  /** Drains sessions, closes the HTTP server and the log file. */
  shutdown(reason: string): Promise<ShutdownReport>;
}

export interface ApplicationOverrides {
  /** Replaces the CLI agent built from configuration. */
  executable?: AgentExecutable;
  /** Kill margin passed to the shutdown coordinator. */
  shutdownKillMarginMs?: number;
}

/**
 * Wires the services together. Fails with WorkspaceRootUnavailableError when
 * the workspace root cannot be used, before anything is accepted.
 */
export async function createApplication(
  configManager: ConfigManager,
  logger: Logger,
  overrides: ApplicationOverrides = {}
): Promise<Application> {
  const config: AppConfig = configManager.getConfig();

  const workspaceManager = new WorkspaceManager(config.workspaceRoot, config.archiveRoot, logger);
  await workspaceManager.initialize();
  // Nothing is running yet, so whatever is left in the root is from a previous process
  await workspaceManager.sweepOrphans();

  const supervisor = new ProcessSupervisor(overrides.executable ?? new CliAgentExecutable(config.agent), {
    watchdogMs: config.watchdogMs,
    defaultGracePeriodMs: config.defaultGracePeriodMs,
    logger
  });

  const registry = new SessionRegistry({
    workspaces: workspaceManager,
    runner: supervisor,
    maxConcurrentSessions: config.maxConcurrentSessions,
    defaultGracePeriodMs: config.defaultGracePeriodMs,
    maxGracePeriodMs: config.maxGracePeriodMs,
    defaultTimeoutMs: config.defaultSessionTimeoutMs,
    retentionMs: config.retentionMs,
    retainWorkspaces: config.retainWorkspaces,
    logger
  });

  configManager.on('config-updated', (updated: AppConfig) => {
    registry.setMaxConcurrentSessions(updated.maxConcurrentSessions);
  });

  const orchestrator = new Orchestrator(registry);
  const shutdownCoordinator = new ShutdownCoordinator(registry, {
    gracePeriodMs: config.shutdownGracePeriodMs,
    killMarginMs: overrides.shutdownKillMarginMs,
    logger
  });
  const server = new Server({ orchestrator, registry, configManager, logger });

  let closing: Promise<ShutdownReport> | null = null;
  const shutdown = (reason: string): Promise<ShutdownReport> => {
    if (!closing) {
      closing = (async () => {
        const report = await shutdownCoordinator.shutdown(reason);
        await server.stop();
        registry.dispose();
        return report;
      })();
    }
    return closing;
  };

  return { workspaceManager, registry, orchestrator, shutdownCoordinator, server, shutdown };
}
