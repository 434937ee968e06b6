/**
 * Session and output-event shapes shared by the orchestrator services and
 * anything consuming its HTTP or socket.io surface.
 */

export type SessionState =
  | 'queued'
  | 'provisioning'
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled'
  | 'timed_out'
  | 'finalizing'
  | 'retired';

export type TerminalSessionState = Extract<SessionState, 'completed' | 'failed' | 'cancelled' | 'timed_out'>;

export const TERMINAL_STATES: readonly TerminalSessionState[] = ['completed', 'failed', 'cancelled', 'timed_out'];

export function isTerminalState(state: SessionState): state is TerminalSessionState {
  return (TERMINAL_STATES as readonly SessionState[]).includes(state);
}

// Sessions in these states still hold an admission slot
export function isActiveState(state: SessionState): boolean {
  return state !== 'retired';
}

export interface Session {
  id: string;
  state: SessionState;
  /** Terminal state reached; kept through finalizing and retirement. */
  outcome: TerminalSessionState | null;
  workspacePath: string | null;
  createdAt: Date;
  startedAt: Date | null;
  endedAt: Date | null;
  retiredAt: Date | null;
  exitCode: number | null;
  signal: string | null;
  pid: number | null;
  cancellationRequested: boolean;
  error?: string;
  taskPreview: string;
  timeoutMs: number;
  gracePeriodMs: number;
  retainWorkspace: boolean;
  archivePath: string | null;
  lastSequence: number;
}

export type OutputStream = 'stdout' | 'stderr' | 'system';

export interface OutputEvent {
  sessionId: string;
  sequence: number;
  stream: OutputStream;
  payload: string;
  timestamp: Date;
}

/**
 * Opaque task handed to the agent. Strings are passed through as-is,
 * structured tasks are serialized to JSON before delivery.
 */
export type TaskPayload = string | Record<string, unknown>;

export interface SubmitOptions {
  timeoutMs?: number;
  gracePeriodMs?: number;
  retainWorkspace?: boolean;
}

export interface CreateSessionRequest extends SubmitOptions {
  task: TaskPayload;
}

export interface CreateSessionResponse {
  sessionId: string;
}

export interface CancelSessionResponse {
  sessionId: string;
  state: SessionState;
}

export interface CancelAllResponse {
  /** Sessions this request cancelled; ones already finishing are left out. */
  cancelled: string[];
}
