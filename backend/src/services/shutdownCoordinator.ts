import type { Logger } from '../utils/logger.js';
import type { SessionRegistry } from './sessionRegistry.js';

export interface ShutdownReport {
  /** 0 after a clean drain, 1 when sessions had to be killed or left behind. */
  exitCode: 0 | 1;
  /** Sessions whose agent ignored the interrupt and was killed. */
  forcedKills: string[];
  /** Sessions that were still not retired once the drain budget ran out. */
  remaining: string[];
  durationMs: number;
}

export interface ShutdownCoordinatorOptions {
  gracePeriodMs: number;
  /** Extra time allowed for SIGKILL delivery and output drain after the grace period. */
  killMarginMs?: number;
  logger?: Logger;
}

const DEFAULT_KILL_MARGIN_MS = 3000;

export class ShutdownCoordinator {
  private pending: Promise<ShutdownReport> | null = null;

  constructor(
    private registry: SessionRegistry,
    private options: ShutdownCoordinatorOptions
  ) {}

  get isShuttingDown(): boolean {
    return this.pending !== null;
  }

  /**
   * Stops admissions, cancels unfinished sessions and waits for them to
   * retire within the grace period. Calling it again returns the same report.
   */
  shutdown(reason = 'shutdown requested'): Promise<ShutdownReport> {
    if (!this.pending) {
      this.pending = this.drain(reason);
    }
    return this.pending;
  }

  private async drain(reason: string): Promise<ShutdownReport> {
    const { gracePeriodMs, logger } = this.options;
    const killMarginMs = this.options.killMarginMs ?? DEFAULT_KILL_MARGIN_MS;
    const startedAt = Date.now();

    this.registry.beginShutdown();
    const inFlight = this.registry.unretiredSessionIds();
    logger?.info(`Shutting down (${reason}): ${inFlight.length} unfinished session(s), grace period ${gracePeriodMs}ms`);

    await this.registry.cancelAll(gracePeriodMs, 'shutdown');

    let idle = await this.registry.waitForIdle(gracePeriodMs + killMarginMs);
    if (!idle) {
      // Covers cancellations that were already under way with a longer grace period
      const killed = this.registry.killOutstanding('shutdown');
      logger?.warn(`${this.registry.activeCount()} session(s) still active after ${gracePeriodMs + killMarginMs}ms; killed ${killed.length} agent process(es)`);
      idle = await this.registry.waitForIdle(killMarginMs);
      if (!idle) {
        logger?.warn(`${this.registry.activeCount()} session(s) still active after SIGKILL`);
      }
    }

    const remaining = await this.registry.reclaimOutstanding();
    const inFlightIds = new Set(inFlight);
    const forcedKills = this.registry.forcedKillSessionIds().filter(id => inFlightIds.has(id));
    const exitCode = remaining.length === 0 && forcedKills.length === 0 ? 0 : 1;
    const durationMs = Date.now() - startedAt;

    if (exitCode === 0) {
      logger?.info(`Shutdown complete in ${durationMs}ms`);
    } else {
      logger?.warn(`Shutdown finished in ${durationMs}ms with ${forcedKills.length} forced kill(s) and ${remaining.length} unfinished session(s)`);
    }
    return { exitCode, forcedKills, remaining, durationMs };
  }
}
