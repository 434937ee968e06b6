import { writeFile } from 'fs/promises';
import { basename, join } from 'path';
import type { TaskPayload } from '../../../shared/types/session.js';
import type { AgentConfig, InterruptSignal, TaskInputChannel } from '../types/config.js';
import { InvalidArgumentError } from '../errors.js';

export const TASK_PLACEHOLDER = '{task}';
export const TASK_FILE_PLACEHOLDER = '{taskFile}';

export interface LaunchRequest {
  sessionId: string;
  workspacePath: string;
  task: TaskPayload;
}

/** Everything needed to spawn one agent process. */
export interface LaunchPlan {
  command: string;
  args: string[];
  /** Written to the child's stdin, which is then closed. Null leaves stdin detached. */
  stdin: string | null;
  env: NodeJS.ProcessEnv;
}

/**
 * How a particular agent is invoked. The supervisor only deals with the
 * resulting plan, so other agents plug in by implementing this interface.
 */
export interface AgentExecutable {
  readonly name: string;
  readonly interruptSignal: InterruptSignal;
  prepare(request: LaunchRequest): Promise<LaunchPlan>;
}

export function serializeTask(task: TaskPayload): string {
  return typeof task === 'string' ? task : JSON.stringify(task);
}

function substitute(args: string[], placeholder: string, value: string): string[] {
  const hasPlaceholder = args.some(arg => arg.includes(placeholder));
  if (!hasPlaceholder) {
    return [...args, value];
  }
  return args.map(arg => arg.split(placeholder).join(value));
}

/**
 * Agent launched as a command-line program, e.g. `claude -p {task}`.
 */
export class CliAgentExecutable implements AgentExecutable {
  readonly name: string;
  readonly interruptSignal: InterruptSignal;
  private readonly command: string;
  private readonly args: string[];
  private readonly taskInput: TaskInputChannel;
  private readonly taskFileName: string;
  private readonly env: Record<string, string>;

  constructor(config: AgentConfig) {
    if (basename(config.taskFileName) !== config.taskFileName) {
      throw new InvalidArgumentError(`Task file name must be a plain file name, got ${config.taskFileName}`);
    }
    this.name = basename(config.command);
    this.command = config.command;
    this.args = [...config.args];
    this.taskInput = config.taskInput;
    this.taskFileName = config.taskFileName;
    this.interruptSignal = config.interruptSignal;
    this.env = { ...config.env };
  }

  async prepare({ sessionId, workspacePath, task }: LaunchRequest): Promise<LaunchPlan> {
    const payload = serializeTask(task);
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      ...this.env,
      AGENT_SESSION_ID: sessionId,
      AGENT_WORKSPACE: workspacePath
    };

    switch (this.taskInput) {
      case 'argument':
        return { command: this.command, args: substitute(this.args, TASK_PLACEHOLDER, payload), stdin: null, env };
      case 'stdin':
        return { command: this.command, args: [...this.args], stdin: payload, env };
      case 'file': {
        const taskFile = join(workspacePath, this.taskFileName);
        await writeFile(taskFile, payload, 'utf-8');
        return {
          command: this.command,
          args: substitute(this.args, TASK_FILE_PLACEHOLDER, taskFile),
          stdin: null,
          env: { ...env, AGENT_TASK_FILE: taskFile }
        };
      }
    }
  }
}
