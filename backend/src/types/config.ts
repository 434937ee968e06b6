export type TaskInputChannel = 'argument' | 'stdin' | 'file';

export type InterruptSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

export interface AgentConfig {
  command: string;
  args: string[];
  taskInput: TaskInputChannel;
  taskFileName: string;
  interruptSignal: InterruptSignal;
  env?: Record<string, string>;
}

export interface AppConfig {
  port: number;
  host: string;
  workspaceRoot: string;
  archiveRoot: string;
  maxConcurrentSessions: number;
  defaultGracePeriodMs: number;
  maxGracePeriodMs: number;
  defaultSessionTimeoutMs: number;
  watchdogMs: number;
  retentionMs: number;
  retainWorkspaces: boolean;
  shutdownGracePeriodMs: number;
  agent: AgentConfig;
  logDir: string | null;
  verbose: boolean;
}

export interface UpdateConfigRequest {
  verbose?: boolean;
  maxConcurrentSessions?: number;
}

/** Longest delay a Node.js timer honours; larger values fire almost at once. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
