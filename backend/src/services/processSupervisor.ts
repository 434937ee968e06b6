import { spawn, type ChildProcess } from 'child_process';
import type { OutputEvent } from '../../../shared/types/session.js';
import type { Logger } from '../utils/logger.js';
import { signalProcessGroup } from '../utils/processUtils.js';
import type { AgentExecutable, LaunchRequest } from './agentExecutable.js';
import type { OutputChannel } from './outputChannel.js';
import { LaunchFailedError, errorMessage } from '../errors.js';

/**
 * State of a started process. A launch that fails never produces a handle:
 * `AgentRunner.start` rejects with LaunchFailedError instead.
 */
export type SupervisorState = 'running' | 'exited' | 'killed';

export type TerminationReason = 'cancel' | 'timeout' | 'watchdog' | 'shutdown';

export interface ExitResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** `killed` when the process died from a signal rather than exiting. */
  termination: 'exited' | 'killed';
  /** Why termination was requested, null when the process ended on its own. */
  reason: TerminationReason | null;
  /** True when the grace period ran out and SIGKILL was sent. */
  forced: boolean;
}

/** Live binding between a session and its agent process. */
export interface SupervisorHandle {
  readonly sessionId: string;
  readonly pid: number | undefined;
  readonly state: SupervisorState;
  stream(fromSequence?: number, signal?: AbortSignal): AsyncIterable<OutputEvent>;
  cancel(gracePeriodMs: number, reason?: TerminationReason): Promise<void>;
  /** SIGKILLs the process group now, cutting short any grace period in progress. */
  kill(reason?: TerminationReason): void;
  wait(): Promise<ExitResult>;
}

/** Starts agent processes. Registry code depends on this, not on child_process. */
export interface AgentRunner {
  start(request: LaunchRequest, channel: OutputChannel, limits?: RunLimits): Promise<SupervisorHandle>;
}

export interface RunLimits {
  /** Run time after which the process is cancelled as timed out; 0 disables. */
  timeoutMs?: number;
  /** Grace period used when the timeout or watchdog fires. */
  gracePeriodMs?: number;
}

export interface ProcessSupervisorOptions {
  /** Upper bound on any run, applied even when no timeout was requested. */
  watchdogMs: number;
  /** Grace period the watchdog uses when no per-run grace period is given. */
  defaultGracePeriodMs: number;
  /** How long to wait for stdout/stderr to close once the process has exited. */
  drainTimeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_DRAIN_TIMEOUT_MS = 2000;

export class ProcessSupervisor implements AgentRunner {
  constructor(
    private executable: AgentExecutable,
    private options: ProcessSupervisorOptions
  ) {}

  /**
   * Spawns the agent in `request.workspacePath` and resolves once the OS has
   * confirmed the spawn. Throws LaunchFailedError when it cannot be started.
   */
  async start(request: LaunchRequest, channel: OutputChannel, limits: RunLimits = {}): Promise<SupervisorHandle> {
    const { logger } = this.options;
    const plan = await this.executable.prepare(request);

    logger?.verbose(`Spawning ${this.executable.name} for session ${request.sessionId} in ${request.workspacePath}`);
    logger?.verbose(`Command: ${plan.command} ${plan.args.map(arg => JSON.stringify(arg)).join(' ')}`);

    let child: ChildProcess;
    try {
      child = spawn(plan.command, plan.args, {
        cwd: request.workspacePath,
        env: plan.env,
        stdio: [plan.stdin === null ? 'ignore' : 'pipe', 'pipe', 'pipe'],
        // Own process group, so cancellation reaches everything the agent starts
        detached: true
      });
    } catch (error) {
      throw new LaunchFailedError(`Failed to launch ${plan.command}: ${errorMessage(error)}`);
    }

    try {
      await new Promise<void>((resolve, reject) => {
        const onSpawn = () => {
          child.off('error', onError);
          resolve();
        };
        const onError = (error: Error) => {
          child.off('spawn', onSpawn);
          reject(error);
        };
        child.once('spawn', onSpawn);
        child.once('error', onError);
      });
    } catch (error) {
      logger?.error(`Failed to launch ${plan.command} for session ${request.sessionId}`, error instanceof Error ? error : undefined);
      throw new LaunchFailedError(`Failed to launch ${plan.command}: ${errorMessage(error)}`);
    }

    logger?.info(`Agent process ${child.pid} started for session ${request.sessionId}`);
    return new SupervisedProcess(request.sessionId, child, channel, plan.stdin, {
      interruptSignal: this.executable.interruptSignal,
      watchdogMs: this.options.watchdogMs,
      timeoutMs: limits.timeoutMs ?? 0,
      gracePeriodMs: limits.gracePeriodMs ?? this.options.defaultGracePeriodMs,
      drainTimeoutMs: this.options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS,
      logger
    });
  }
}

interface SupervisedProcessSettings {
  interruptSignal: NodeJS.Signals;
  watchdogMs: number;
  timeoutMs: number;
  gracePeriodMs: number;
  drainTimeoutMs: number;
  logger?: Logger;
}

export class SupervisedProcess implements SupervisorHandle {
  private currentState: SupervisorState = 'running';
  private terminationReason: TerminationReason | null = null;
  private forced = false;
  private cancellation: Promise<void> | null = null;
  private exitStatus: { code: number | null; signal: NodeJS.Signals | null } | null = null;
  private finished = false;
  private timers = new Set<NodeJS.Timeout>();
  private resolveExit: (result: ExitResult) => void = () => undefined;
  private readonly exitPromise: Promise<ExitResult>;

  constructor(
    readonly sessionId: string,
    private child: ChildProcess,
    private channel: OutputChannel,
    stdinPayload: string | null,
    private settings: SupervisedProcessSettings
  ) {
    this.exitPromise = new Promise(resolve => {
      this.resolveExit = resolve;
    });
    this.attachOutput();
    this.deliverStdin(stdinPayload);
    this.armTimers();
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  stream(fromSequence = 0, signal?: AbortSignal): AsyncIterable<OutputEvent> {
    return this.channel.read(fromSequence, signal);
  }

  /**
   * Sends the interrupt signal, then SIGKILL if the process is still alive
   * after `gracePeriodMs`. Later calls return the first call's promise.
   */
  cancel(gracePeriodMs: number, reason: TerminationReason = 'cancel'): Promise<void> {
    if (this.cancellation) {
      return this.cancellation;
    }
    if (this.finished || this.exitStatus) {
      return this.exitPromise.then(() => undefined);
    }
    this.terminationReason = reason;
    this.cancellation = this.terminate(Math.max(0, gracePeriodMs), reason);
    return this.cancellation;
  }

  kill(reason: TerminationReason = 'shutdown'): void {
    if (this.finished) return;
    this.terminationReason ??= reason;
    this.forced = true;
    this.settings.logger?.warn(`Killing agent process ${this.pid} for session ${this.sessionId} (${reason})`);
    this.channel.append('system', `Killing process group (${reason})`);
    this.sendSignal('SIGKILL');
    this.scheduleGiveUp();
  }

  wait(): Promise<ExitResult> {
    return this.exitPromise;
  }

  private async terminate(gracePeriodMs: number, reason: TerminationReason): Promise<void> {
    const { interruptSignal, logger } = this.settings;
    logger?.info(`Terminating agent process ${this.pid} for session ${this.sessionId} (${reason}), grace period ${gracePeriodMs}ms`);
    this.channel.append('system', `Termination requested (${reason}); sending ${interruptSignal}, grace period ${gracePeriodMs}ms`);
    this.sendSignal(interruptSignal);

    const exitedInTime = await this.exitedWithin(gracePeriodMs);
    if (!exitedInTime) {
      this.forced = true;
      logger?.warn(`Agent process ${this.pid} ignored ${interruptSignal} for ${gracePeriodMs}ms, sending SIGKILL`);
      this.channel.append('system', `Grace period elapsed; sending SIGKILL`);
      this.sendSignal('SIGKILL');
      this.scheduleGiveUp();
    }
    await this.exitPromise;
  }

  // A killed process that still never reports exit is given up on
  private scheduleGiveUp(): void {
    if (this.finished) return;
    this.schedule(
      () => this.finish(this.exitStatus?.code ?? null, this.exitStatus?.signal ?? 'SIGKILL'),
      this.settings.drainTimeoutMs * 2
    );
  }

  private exitedWithin(ms: number): Promise<boolean> {
    if (this.exitStatus || this.finished) {
      return Promise.resolve(true);
    }
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.child.off('exit', onExit);
        resolve(this.exitStatus !== null || this.finished);
      }, ms);
      const onExit = () => {
        clearTimeout(timer);
        resolve(true);
      };
      this.child.once('exit', onExit);
    });
  }

  private sendSignal(signal: NodeJS.Signals): void {
    const result = signalProcessGroup(this.child, signal);
    if (result === 'failed') {
      this.channel.append('system', `Failed to deliver ${signal} to process ${this.pid}`);
      this.settings.logger?.warn(`Failed to deliver ${signal} to agent process ${this.pid} (session ${this.sessionId})`);
    }
  }

  private attachOutput(): void {
    for (const streamKind of ['stdout', 'stderr'] as const) {
      const stream = this.child[streamKind];
      if (!stream) continue;
      stream.setEncoding('utf8');
      stream.on('data', (chunk: string) => {
        this.channel.append(streamKind, chunk);
      });
      stream.on('error', (error: Error) => {
        this.channel.append('system', `Error reading ${streamKind}: ${error.message}`);
        this.settings.logger?.warn(`Error reading ${streamKind} of session ${this.sessionId}`, error);
      });
    }

    this.child.on('error', (error: Error) => {
      this.channel.append('system', `Process error: ${error.message}`);
      this.settings.logger?.warn(`Agent process error in session ${this.sessionId}`, error);
    });

    this.child.on('exit', (code, signal) => {
      this.exitStatus = { code, signal };
      // Descendants may hold the pipes open; stop waiting for them eventually
      this.schedule(() => {
        if (this.finished) return;
        this.settings.logger?.warn(`Output of session ${this.sessionId} still open ${this.settings.drainTimeoutMs}ms after exit, closing`);
        this.sendSignal('SIGKILL');
        this.child.stdout?.destroy();
        this.child.stderr?.destroy();
        this.finish(code, signal);
      }, this.settings.drainTimeoutMs);
    });

    this.child.on('close', (code, signal) => {
      this.finish(code, signal);
    });
  }

  private deliverStdin(payload: string | null): void {
    const stdin = this.child.stdin;
    if (payload === null || !stdin) return;
    stdin.on('error', (error: Error) => {
      this.channel.append('system', `Error writing task to stdin: ${error.message}`);
      this.settings.logger?.warn(`Error writing task to stdin of session ${this.sessionId}`, error);
    });
    stdin.end(payload);
  }

  private armTimers(): void {
    const { timeoutMs, watchdogMs, gracePeriodMs } = this.settings;
    if (timeoutMs > 0) {
      this.schedule(() => {
        this.channel.append('system', `Session timed out after ${timeoutMs}ms`);
        void this.cancel(gracePeriodMs, 'timeout');
      }, timeoutMs);
    }
    this.schedule(() => {
      this.settings.logger?.warn(`Watchdog fired for session ${this.sessionId} after ${watchdogMs}ms`);
      void this.cancel(gracePeriodMs, 'watchdog');
    }, watchdogMs);
  }

  private schedule(fn: () => void, ms: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, ms);
    this.timers.add(timer);
  }

  private finish(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.finished) return;
    this.finished = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();

    const termination = signal !== null ? 'killed' : 'exited';
    this.currentState = termination;
    const result: ExitResult = {
      exitCode: code,
      signal,
      termination,
      reason: this.terminationReason,
      forced: this.forced
    };

    this.channel.append(
      'system',
      signal !== null ? `Process terminated by ${signal}` : `Process exited with code ${code}`
    );
    this.channel.close();
    this.settings.logger?.info(
      `Agent process ${this.pid} for session ${this.sessionId} ended (code ${code}, signal ${signal}${this.terminationReason ? `, ${this.terminationReason}` : ''})`
    );
    this.resolveExit(result);
  }
}
