import { EventEmitter } from 'events';
import path from 'path';
import { z } from 'zod';
import { MAX_TIMER_DELAY_MS, type AgentConfig, type AppConfig, type UpdateConfigRequest } from '../types/config.js';
import { InvalidArgumentError } from '../errors.js';

const DEFAULT_AGENT_ARGS = ['-p', '{task}', '--output-format', 'stream-json', '--verbose'];

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value, ctx) => {
    if (['1', 'true', 'yes', 'on'].includes(value)) return true;
    if (['0', 'false', 'no', 'off', ''].includes(value)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const milliseconds = z.coerce.number().int().nonnegative().max(MAX_TIMER_DELAY_MS);

const argsTemplate = z
  .string()
  .trim()
  .transform((value, ctx): string[] => {
    if (!value.startsWith('[')) {
      return value.split(/\s+/).filter(Boolean);
    }
    try {
      const parsed = z.array(z.string()).safeParse(JSON.parse(value));
      if (parsed.success) return parsed.data;
    } catch {
      // reported below
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a JSON array of strings' });
    return z.NEVER;
  });

const environmentVariables = z
  .string()
  .trim()
  .transform((value, ctx): Record<string, string> => {
    if (!value) return {};
    try {
      const parsed = z.record(z.string()).safeParse(JSON.parse(value));
      if (parsed.success) return parsed.data;
    } catch {
      // reported below
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a JSON object of string values' });
    return z.NEVER;
  });

const environmentSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8082),
  HOST: z.string().min(1).default('0.0.0.0'),
  WORKSPACE_ROOT: z.string().min(1).default('agent_workspace'),
  ARCHIVE_ROOT: z.string().min(1).optional(),
  MAX_CONCURRENT_SESSIONS: z.coerce.number().int().positive().default(4),
  DEFAULT_GRACE_PERIOD_MS: milliseconds.default(5000),
  MAX_GRACE_PERIOD_MS: milliseconds.default(30000),
  DEFAULT_SESSION_TIMEOUT_MS: milliseconds.default(0),
  WATCHDOG_MS: z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(60 * 60 * 1000),
  RETENTION_MS: milliseconds.default(5 * 60 * 1000),
  RETAIN_WORKSPACES: booleanFlag.default('false'),
  SHUTDOWN_GRACE_PERIOD_MS: milliseconds.default(5000),
  AGENT_COMMAND: z.string().min(1).default('claude'),
  AGENT_ARGS: argsTemplate.optional(),
  AGENT_TASK_INPUT: z.enum(['argument', 'stdin', 'file']).default('argument'),
  AGENT_TASK_FILE: z.string().min(1).default('TASK.md'),
  AGENT_INTERRUPT_SIGNAL: z.enum(['SIGINT', 'SIGTERM', 'SIGHUP']).default('SIGTERM'),
  AGENT_ENV: environmentVariables.optional(),
  LOG_DIR: z.string().default('logs'),
  VERBOSE: booleanFlag.default('false')
});

/**
 * Builds the application configuration from environment variables. Relative
 * paths are resolved against `cwd`.
 */
export function parseConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): AppConfig {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid configuration: ${details}`);
  }
  const vars = result.data;

  if (vars.DEFAULT_GRACE_PERIOD_MS > vars.MAX_GRACE_PERIOD_MS) {
    throw new InvalidArgumentError(
      `Invalid configuration: DEFAULT_GRACE_PERIOD_MS (${vars.DEFAULT_GRACE_PERIOD_MS}) exceeds MAX_GRACE_PERIOD_MS (${vars.MAX_GRACE_PERIOD_MS})`
    );
  }

  const workspaceRoot = path.resolve(cwd, vars.WORKSPACE_ROOT);
  const archiveRoot = vars.ARCHIVE_ROOT
    ? path.resolve(cwd, vars.ARCHIVE_ROOT)
    : path.join(path.dirname(workspaceRoot), `${path.basename(workspaceRoot)}_archive`);

  if (archiveRoot === workspaceRoot || archiveRoot.startsWith(workspaceRoot + path.sep)) {
    throw new InvalidArgumentError('Invalid configuration: ARCHIVE_ROOT must not be inside WORKSPACE_ROOT');
  }

  const agent: AgentConfig = {
    command: vars.AGENT_COMMAND,
    args: vars.AGENT_ARGS ?? DEFAULT_AGENT_ARGS,
    taskInput: vars.AGENT_TASK_INPUT,
    taskFileName: vars.AGENT_TASK_FILE,
    interruptSignal: vars.AGENT_INTERRUPT_SIGNAL,
    env: vars.AGENT_ENV ?? {}
  };

  return {
    port: vars.PORT,
    host: vars.HOST,
    workspaceRoot,
    archiveRoot,
    maxConcurrentSessions: vars.MAX_CONCURRENT_SESSIONS,
    defaultGracePeriodMs: vars.DEFAULT_GRACE_PERIOD_MS,
    maxGracePeriodMs: vars.MAX_GRACE_PERIOD_MS,
    defaultSessionTimeoutMs: vars.DEFAULT_SESSION_TIMEOUT_MS,
    watchdogMs: vars.WATCHDOG_MS,
    retentionMs: vars.RETENTION_MS,
    retainWorkspaces: vars.RETAIN_WORKSPACES,
    shutdownGracePeriodMs: vars.SHUTDOWN_GRACE_PERIOD_MS,
    agent,
    logDir: vars.LOG_DIR.trim() ? path.resolve(cwd, vars.LOG_DIR) : null,
    verbose: vars.VERBOSE
  };
}

const updateSchema = z
  .object({
    verbose: z.boolean().optional(),
    maxConcurrentSessions: z.number().int().positive().optional()
  })
  .strict();

export class ConfigManager extends EventEmitter {
  private config: AppConfig;

  constructor(config: AppConfig) {
    super();
    this.config = config;
  }

  static fromEnvironment(env: NodeJS.ProcessEnv = process.env, cwd?: string): ConfigManager {
    return new ConfigManager(parseConfig(env, cwd));
  }

  getConfig(): AppConfig {
    return { ...this.config, agent: { ...this.config.agent, args: [...this.config.agent.args] } };
  }

  /**
   * Applies the runtime-adjustable subset of the configuration and emits
   * `config-updated` with the new snapshot.
   */
  updateConfig(updates: UpdateConfigRequest): AppConfig {
    const parsed = updateSchema.safeParse(updates);
    if (!parsed.success) {
      throw new InvalidArgumentError(parsed.error.issues.map(issue => issue.message).join('; '));
    }
    this.config = { ...this.config, ...parsed.data };
    const snapshot = this.getConfig();
    this.emit('config-updated', snapshot);
    return snapshot;
  }

  isVerbose(): boolean {
    return this.config.verbose;
  }

  getWorkspaceRoot(): string {
    return this.config.workspaceRoot;
  }

  /** Configuration without values that should not leave the process. */
  getPublicConfig(): Omit<AppConfig, 'agent'> & { agent: Omit<AgentConfig, 'env'> } {
    const { agent, ...rest } = this.getConfig();
    const { env: _env, ...publicAgent } = agent;
    return { ...rest, agent: publicAgent };
  }
}
