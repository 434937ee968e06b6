import type { ChildProcess } from 'child_process';

export type SignalResult = 'sent' | 'gone' | 'failed';

function isNoSuchProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

/**
 * Signals the whole process group of a child spawned with `detached: true`
 * (negative PID), falling back to the child itself when that fails.
 */
export function signalProcessGroup(child: ChildProcess, signal: NodeJS.Signals): SignalResult {
  const pid = child.pid;
  if (pid !== undefined && process.platform !== 'win32') {
    try {
      process.kill(-pid, signal);
      return 'sent';
    } catch (error) {
      if (isNoSuchProcess(error)) {
        return 'gone';
      }
      // fall through to the direct kill
    }
  }

  try {
    return child.kill(signal) ? 'sent' : 'gone';
  } catch {
    return 'failed';
  }
}

/** True while a process with this PID exists (signal 0 checks without delivering anything). */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means it exists but belongs to someone else
    return !isNoSuchProcess(error);
  }
}
