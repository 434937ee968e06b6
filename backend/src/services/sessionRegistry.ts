import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import {
  isTerminalState,
  type OutputEvent,
  type Session,
  type SubmitOptions,
  type TaskPayload,
  type TerminalSessionState
} from '../../../shared/types/session.js';
import type { Logger } from '../utils/logger.js';
import { MAX_TIMER_DELAY_MS } from '../types/config.js';
import { Mutex } from '../utils/mutex.js';
import { OutputChannel } from './outputChannel.js';
import { serializeTask } from './agentExecutable.js';
import type { AgentRunner, ExitResult, SupervisorHandle, TerminationReason } from './processSupervisor.js';
import type { WorkspaceManager } from './workspaceManager.js';
import {
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  OverloadedError,
  errorMessage
} from '../errors.js';

export type WorkspaceProvider = Pick<WorkspaceManager, 'provision' | 'reclaim'>;

export interface SessionRegistryOptions {
  workspaces: WorkspaceProvider;
  runner: AgentRunner;
  maxConcurrentSessions: number;
  defaultGracePeriodMs: number;
  maxGracePeriodMs: number;
  defaultTimeoutMs?: number;
  /** How long retired sessions keep answering status queries. */
  retentionMs: number;
  /** Archive workspaces instead of deleting them unless a submission says otherwise. */
  retainWorkspaces?: boolean;
  /** Retire sessions as soon as they reach a terminal state. Defaults to true. */
  autoRetire?: boolean;
  logger?: Logger;
}

interface SessionEntry {
  session: Session;
  task: TaskPayload;
  channel: OutputChannel;
  handle: SupervisorHandle | null;
  cancelReason: TerminationReason | null;
  cancelGracePeriodMs: number;
  holdsSlot: boolean;
  forcedKill: boolean;
  retirement: Promise<void> | null;
  purgeTimer: NodeJS.Timeout | null;
}

const TASK_PREVIEW_LENGTH = 200;

function isCancellable(session: Session): boolean {
  return session.state === 'queued' || session.state === 'provisioning' || session.state === 'running';
}

function outcomeFor(result: ExitResult): TerminalSessionState {
  switch (result.reason) {
    case 'timeout':
    case 'watchdog':
      return 'timed_out';
    case 'cancel':
    case 'shutdown':
      return 'cancelled';
    case null:
      return result.exitCode === 0 && result.signal === null ? 'completed' : 'failed';
  }
}

/**
 * Single source of truth for sessions. Admission is bounded and fails fast;
 * each session's transitions are serialized by a lock keyed on its id, and
 * no lock is held while an agent process runs.
 */
export class SessionRegistry extends EventEmitter {
  private sessions = new Map<string, SessionEntry>();
  private admitted = 0;
  private shuttingDown = false;
  private maxConcurrentSessions: number;
  private locks = new Mutex();
  private idleWaiters = new Set<() => void>();
  private runs = new Set<Promise<void>>();

  constructor(private options: SessionRegistryOptions) {
    super();
    this.maxConcurrentSessions = options.maxConcurrentSessions;
  }

  /**
   * Allocates a queued session and returns its id without waiting for the
   * workspace or the agent. Throws OverloadedError when at capacity or
   * shutting down.
   */
  admit(task: TaskPayload, submitOptions: SubmitOptions = {}): string {
    if (this.shuttingDown) {
      throw new OverloadedError('Orchestrator is shutting down and not accepting sessions');
    }
    if (this.admitted >= this.maxConcurrentSessions) {
      throw new OverloadedError(`Concurrency limit of ${this.maxConcurrentSessions} sessions reached; retry later`);
    }

    const taskText = serializeTask(task);
    if (!taskText.trim()) {
      throw new InvalidArgumentError('Task must not be empty');
    }
    const timeoutMs = this.resolveDuration('timeoutMs', submitOptions.timeoutMs, this.options.defaultTimeoutMs ?? 0);
    const gracePeriodMs = this.resolveGracePeriod(submitOptions.gracePeriodMs);

    const id = randomUUID();
    const session: Session = {
      id,
      state: 'queued',
      outcome: null,
      workspacePath: null,
      createdAt: new Date(),
      startedAt: null,
      endedAt: null,
      retiredAt: null,
      exitCode: null,
      signal: null,
      pid: null,
      cancellationRequested: false,
      taskPreview: taskText.slice(0, TASK_PREVIEW_LENGTH),
      timeoutMs,
      gracePeriodMs,
      retainWorkspace: submitOptions.retainWorkspace ?? this.options.retainWorkspaces ?? false,
      archivePath: null,
      lastSequence: -1
    };

    const entry: SessionEntry = {
      session,
      task,
      channel: new OutputChannel(id, event => this.emit('session-output', event)),
      handle: null,
      cancelReason: null,
      cancelGracePeriodMs: gracePeriodMs,
      holdsSlot: true,
      forcedKill: false,
      retirement: null,
      purgeTimer: null
    };

    this.sessions.set(id, entry);
    this.admitted++;
    this.options.logger?.info(`Admitted session ${id} (${this.admitted}/${this.maxConcurrentSessions} active)`);
    this.emit('session-created', this.snapshot(entry));

    const run = this.runSession(entry);
    this.runs.add(run);
    void run.finally(() => this.runs.delete(run));

    return id;
  }

  get(sessionId: string): Session {
    return this.snapshot(this.require(sessionId));
  }

  list(): Session[] {
    return Array.from(this.sessions.values())
      .map(entry => this.snapshot(entry))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  /** Output of a session from `fromSequence` on; ends when the session's output is complete. */
  stream(sessionId: string, fromSequence = 0, signal?: AbortSignal): AsyncIterable<OutputEvent> {
    const entry = this.require(sessionId);
    return entry.handle ? entry.handle.stream(fromSequence, signal) : entry.channel.read(fromSequence, signal);
  }

  /**
   * Requests cancellation. Queued and provisioning sessions end without
   * launching; running ones get the interrupt signal, then SIGKILL after the
   * grace period. Repeating the call is acknowledged without further effect.
   */
  async cancel(sessionId: string, gracePeriodMs?: number, reason: TerminationReason = 'cancel'): Promise<Session> {
    const grace = this.resolveGracePeriod(gracePeriodMs);
    return this.locks.withLock(sessionId, () => {
      const entry = this.require(sessionId);
      const { session } = entry;

      if (session.cancellationRequested) {
        return this.snapshot(entry);
      }
      if (!isCancellable(session)) {
        throw new InvalidStateError(`Session ${sessionId} is ${session.state} and cannot be cancelled`);
      }

      session.cancellationRequested = true;
      entry.cancelReason = reason;
      entry.cancelGracePeriodMs = grace;
      this.options.logger?.info(`Cancellation requested for session ${sessionId} (${reason}) in state ${session.state}`);

      if (entry.handle) {
        this.cancelHandle(entry, entry.handle);
      }
      this.emit('session-updated', this.snapshot(entry));
      return this.snapshot(entry);
    });
  }

  /**
   * Requests cancellation of every session that has not finished and is not
   * already being cancelled.
   * @returns ids of the sessions this call cancelled
   */
  async cancelAll(gracePeriodMs?: number, reason: TerminationReason = 'cancel'): Promise<string[]> {
    const grace = this.resolveGracePeriod(gracePeriodMs);
    const candidates = Array.from(this.sessions.values())
      .filter(entry => isCancellable(entry.session) && !entry.session.cancellationRequested)
      .map(entry => entry.session.id);

    const cancelled: string[] = [];
    for (const id of candidates) {
      try {
        await this.cancel(id, grace, reason);
        cancelled.push(id);
      } catch (error) {
        // Finished while we got to it
        if (!(error instanceof InvalidStateError)) throw error;
      }
    }
    if (cancelled.length > 0) {
      this.options.logger?.info(`Cancelled ${cancelled.length} session(s) (${reason})`);
    }
    return cancelled;
  }

  /**
   * SIGKILLs every agent process that is still running, whatever grace
   * period it was given.
   * @returns ids of the sessions whose process was killed
   */
  killOutstanding(reason: TerminationReason = 'shutdown'): string[] {
    const killed: string[] = [];
    for (const entry of this.sessions.values()) {
      if (!entry.handle) continue;
      entry.handle.kill(reason);
      entry.forcedKill = true;
      killed.push(entry.session.id);
    }
    return killed;
  }

  /**
   * Moves a terminal session through finalizing to retired, reclaiming its
   * workspace and releasing its admission slot.
   */
  async retire(sessionId: string): Promise<Session> {
    const entry = this.require(sessionId);
    if (!entry.retirement) {
      if (!isTerminalState(entry.session.state)) {
        throw new InvalidStateError(`Session ${sessionId} is ${entry.session.state}; only finished sessions can be retired`);
      }
      entry.retirement = this.finalize(entry);
    }
    await entry.retirement;
    return this.snapshot(entry);
  }

  activeCount(): number {
    return this.admitted;
  }

  isAcceptingSessions(): boolean {
    return !this.shuttingDown;
  }

  setMaxConcurrentSessions(limit: number): void {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidArgumentError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.maxConcurrentSessions = limit;
  }

  getMaxConcurrentSessions(): number {
    return this.maxConcurrentSessions;
  }

  /** From now on every admission is rejected. */
  beginShutdown(): void {
    this.shuttingDown = true;
  }

  /** Ids of sessions that have not been retired yet. */
  unretiredSessionIds(): string[] {
    return Array.from(this.sessions.values())
      .filter(entry => entry.session.state !== 'retired')
      .map(entry => entry.session.id);
  }

  /** Ids of sessions whose process had to be killed after its grace period. */
  forcedKillSessionIds(): string[] {
    return Array.from(this.sessions.values())
      .filter(entry => entry.forcedKill)
      .map(entry => entry.session.id);
  }

  /**
   * Resolves true once no session holds an admission slot, or false when
   * `timeoutMs` elapses first.
   */
  waitForIdle(timeoutMs: number): Promise<boolean> {
    if (this.admitted === 0) {
      return Promise.resolve(true);
    }
    return new Promise(resolve => {
      const done = (idle: boolean) => {
        clearTimeout(timer);
        this.idleWaiters.delete(onIdle);
        resolve(idle);
      };
      const onIdle = () => done(true);
      const timer = setTimeout(() => done(false), timeoutMs);
      this.idleWaiters.add(onIdle);
    });
  }

  /**
   * Last-resort cleanup for shutdown: retires terminal sessions and removes
   * the workspaces of any that are still not finished.
   * @returns ids of sessions that could not be retired cleanly
   */
  async reclaimOutstanding(): Promise<string[]> {
    const leftovers: string[] = [];
    for (const entry of this.sessions.values()) {
      const { session } = entry;
      if (session.state === 'retired') continue;

      if (isTerminalState(session.state) || entry.retirement) {
        try {
          await this.retire(session.id);
          continue;
        } catch (error) {
          this.options.logger?.error(`Failed to retire session ${session.id} during shutdown`, error instanceof Error ? error : undefined);
        }
      } else if (session.workspacePath) {
        try {
          await this.options.workspaces.reclaim(session.workspacePath, session.retainWorkspace);
        } catch (error) {
          this.options.logger?.error(`Failed to reclaim workspace of session ${session.id}`, error instanceof Error ? error : undefined);
        }
      }
      leftovers.push(session.id);
    }
    return leftovers;
  }

  /** Stops purge timers; sessions stay in memory. */
  dispose(): void {
    for (const entry of this.sessions.values()) {
      if (entry.purgeTimer) {
        clearTimeout(entry.purgeTimer);
        entry.purgeTimer = null;
      }
    }
  }

  /** Settles once every session lifecycle started so far has finished. */
  async settled(): Promise<void> {
    while (this.runs.size > 0) {
      await Promise.allSettled(Array.from(this.runs));
    }
  }

  private async runSession(entry: SessionEntry): Promise<void> {
    const { id } = entry.session;
    const { logger } = this.options;

    try {
      const proceed = await this.update(entry, session => {
        if (session.cancellationRequested) {
          this.endWithoutProcess(entry, 'cancelled', 'Cancelled before the workspace was provisioned');
          return false;
        }
        session.state = 'provisioning';
        return true;
      });
      if (!proceed) return this.afterTerminal(entry);

      let workspacePath: string;
      try {
        workspacePath = await this.options.workspaces.provision(id);
      } catch (error) {
        logger?.error(`Failed to provision workspace for session ${id}`, error instanceof Error ? error : undefined);
        await this.update(entry, () => this.endWithoutProcess(entry, 'failed', `Workspace provisioning failed: ${errorMessage(error)}`));
        return this.afterTerminal(entry);
      }

      const launch = await this.update(entry, session => {
        session.workspacePath = workspacePath;
        entry.channel.append('system', `Workspace provisioned at ${workspacePath}`);
        if (session.cancellationRequested) {
          this.endWithoutProcess(entry, 'cancelled', 'Cancelled before the agent was started');
          return false;
        }
        return true;
      });
      if (!launch) return this.afterTerminal(entry);

      let handle: SupervisorHandle;
      try {
        handle = await this.options.runner.start(
          { sessionId: id, workspacePath, task: entry.task },
          entry.channel,
          { timeoutMs: entry.session.timeoutMs, gracePeriodMs: entry.session.gracePeriodMs }
        );
      } catch (error) {
        await this.update(entry, () => this.endWithoutProcess(entry, 'failed', errorMessage(error)));
        return this.afterTerminal(entry);
      }

      await this.update(entry, session => {
        entry.handle = handle;
        session.state = 'running';
        session.startedAt = new Date();
        session.pid = handle.pid ?? null;
        if (session.cancellationRequested) {
          this.cancelHandle(entry, handle);
        }
      });

      const result = await handle.wait();

      await this.update(entry, session => {
        const outcome = outcomeFor(result);
        session.state = outcome;
        session.outcome = outcome;
        session.exitCode = result.exitCode;
        session.signal = result.signal;
        session.endedAt = new Date();
        entry.forcedKill = result.forced;
        entry.handle = null;
        if (outcome === 'failed') {
          session.error = result.signal !== null
            ? `Agent terminated by ${result.signal}`
            : `Agent exited with code ${result.exitCode}`;
        }
        logger?.info(`Session ${id} ${outcome} (exit code ${result.exitCode}, signal ${result.signal})`);
      });
      await this.afterTerminal(entry);
    } catch (error) {
      logger?.error(`Unexpected failure in session ${id}`, error instanceof Error ? error : undefined);
      await this.update(entry, session => {
        if (!isTerminalState(session.state) && session.state !== 'finalizing' && session.state !== 'retired') {
          this.endWithoutProcess(entry, 'failed', errorMessage(error));
        }
      });
      await this.afterTerminal(entry);
    }
  }

  private async afterTerminal(entry: SessionEntry): Promise<void> {
    if (this.options.autoRetire === false || !isTerminalState(entry.session.state)) {
      return;
    }
    try {
      await this.retire(entry.session.id);
    } catch (error) {
      this.options.logger?.error(`Failed to retire session ${entry.session.id}`, error instanceof Error ? error : undefined);
    }
  }

  private async finalize(entry: SessionEntry): Promise<void> {
    const { id } = entry.session;
    const workspacePath = await this.update(entry, session => {
      session.state = 'finalizing';
      return session.workspacePath;
    });

    let archivePath: string | null = null;
    if (workspacePath) {
      try {
        archivePath = await this.options.workspaces.reclaim(workspacePath, entry.session.retainWorkspace);
      } catch (error) {
        this.options.logger?.error(`Failed to reclaim workspace ${workspacePath} of session ${id}`, error instanceof Error ? error : undefined);
      }
    }

    await this.update(entry, session => {
      session.state = 'retired';
      session.workspacePath = null;
      session.archivePath = archivePath;
      session.retiredAt = new Date();
      this.releaseSlot(entry);
    });
    this.options.logger?.info(`Retired session ${id} (${this.admitted}/${this.maxConcurrentSessions} active)`);
    this.emit('session-retired', this.snapshot(entry));
    this.schedulePurge(entry);
  }

  private schedulePurge(entry: SessionEntry): void {
    const { id } = entry.session;
    entry.purgeTimer = setTimeout(() => {
      entry.purgeTimer = null;
      if (this.sessions.get(id) === entry) {
        this.sessions.delete(id);
        this.options.logger?.verbose(`Purged session ${id}`);
        this.emit('session-purged', { id });
      }
    }, this.options.retentionMs);
    entry.purgeTimer.unref();
  }

  private releaseSlot(entry: SessionEntry): void {
    if (!entry.holdsSlot) return;
    entry.holdsSlot = false;
    this.admitted--;
    if (this.admitted === 0) {
      for (const notify of [...this.idleWaiters]) {
        notify();
      }
    }
  }

  // Must run under the session lock
  private endWithoutProcess(entry: SessionEntry, outcome: 'failed' | 'cancelled', message: string): void {
    const { session } = entry;
    session.state = outcome;
    session.outcome = outcome;
    session.endedAt = new Date();
    if (outcome === 'failed') {
      session.error = message;
    }
    entry.channel.append('system', message);
    entry.channel.close();
  }

  private cancelHandle(entry: SessionEntry, handle: SupervisorHandle): void {
    handle
      .cancel(entry.cancelGracePeriodMs, entry.cancelReason ?? 'cancel')
      .catch(error => {
        this.options.logger?.error(`Failed to cancel session ${entry.session.id}`, error instanceof Error ? error : undefined);
      });
  }

  /** Applies `fn` under the session lock and publishes the new snapshot. */
  private async update<T>(entry: SessionEntry, fn: (session: Session) => T): Promise<T> {
    return this.locks.withLock(entry.session.id, () => {
      const result = fn(entry.session);
      this.emit('session-updated', this.snapshot(entry));
      return result;
    });
  }

  private snapshot(entry: SessionEntry): Session {
    return { ...entry.session, lastSequence: entry.channel.lastSequence };
  }

  private require(sessionId: string): SessionEntry {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new NotFoundError(sessionId);
    }
    return entry;
  }

  // Requested grace periods above the maximum are clamped, not rejected
  private resolveGracePeriod(requested: number | undefined): number {
    const grace = this.resolveDuration('gracePeriodMs', requested, this.options.defaultGracePeriodMs, Infinity);
    return Math.min(grace, this.options.maxGracePeriodMs);
  }

  private resolveDuration(name: string, requested: number | undefined, fallback: number, limit = MAX_TIMER_DELAY_MS): number {
    if (requested === undefined) {
      return fallback;
    }
    if (Number.isNaN(requested) || requested < 0) {
      throw new InvalidArgumentError(`${name} must be a non-negative number of milliseconds, got ${requested}`);
    }
    if (requested > limit) {
      throw new InvalidArgumentError(`${name} must not exceed ${limit}ms, got ${requested}`);
    }
    return Math.floor(requested);
  }
}
