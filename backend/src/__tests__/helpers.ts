import { mkdtemp, realpath, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { OutputEvent } from '../../../shared/types/session.js';
import { CliAgentExecutable } from '../services/agentExecutable.js';
import type { AgentConfig } from '../types/config.js';
import { Logger } from '../utils/logger.js';

export const quietLogger = new Logger({ isVerbose: () => false }, null, false);

/**
 * Agent running `script` under /bin/sh; the task arrives as `$1`.
 */
export function shellAgent(script: string, overrides: Partial<AgentConfig> = {}): CliAgentExecutable {
  return new CliAgentExecutable({
    command: '/bin/sh',
    args: ['-c', script, 'agent', '{task}'],
    taskInput: 'argument',
    taskFileName: 'TASK.md',
    interruptSignal: 'SIGTERM',
    ...overrides
  });
}

// Shell snippet that ignores the interrupt signal and keeps running
export const STUBBORN_SCRIPT = "trap '' TERM INT; echo ready; sleep 30";

export async function makeTempDir(prefix: string): Promise<string> {
  return realpath(await mkdtemp(join(tmpdir(), prefix)));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export function joinPayloads(events: OutputEvent[], stream: OutputEvent['stream']): string {
  return events.filter(event => event.stream === stream).map(event => event.payload).join('');
}

export async function waitFor(predicate: () => boolean, timeoutMs = 5000, intervalMs = 20): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise(resolve => setTimeout(resolve, intervalMs));
  }
}

/** Reads `events` until a stdout chunk containing `text` arrives. */
export async function waitForOutput(events: AsyncIterable<OutputEvent>, text: string): Promise<void> {
  for await (const event of events) {
    if (event.stream === 'stdout' && event.payload.includes(text)) return;
  }
  throw new Error(`Output ended before "${text}" was printed`);
}
