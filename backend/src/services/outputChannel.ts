import type { OutputEvent, OutputStream } from '../../../shared/types/session.js';
import { InvalidArgumentError } from '../errors.js';

/**
 * Ordered, append-only event buffer for one session. Sequence numbers start
 * at 0 and have no gaps. Readers pull from any retained sequence and park
 * until more output arrives or the channel is closed.
 */
export class OutputChannel {
  private events: OutputEvent[] = [];
  private closed = false;
  private waiters = new Set<() => void>();

  constructor(
    readonly sessionId: string,
    private onAppend?: (event: OutputEvent) => void
  ) {}

  /** Returns the stored event, or null once the channel is closed. */
  append(stream: OutputStream, payload: string): OutputEvent | null {
    if (this.closed) {
      return null;
    }
    const event: OutputEvent = Object.freeze({
      sessionId: this.sessionId,
      sequence: this.events.length,
      stream,
      payload,
      timestamp: new Date()
    });
    this.events.push(event);
    this.wakeReaders();
    this.onAppend?.(event);
    return event;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeReaders();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Sequence number of the newest event, -1 while empty. */
  get lastSequence(): number {
    return this.events.length - 1;
  }

  get size(): number {
    return this.events.length;
  }

  snapshot(fromSequence = 0): OutputEvent[] {
    return this.events.slice(assertSequence(fromSequence));
  }

  /**
   * Yields events from `fromSequence` on, in order. Ends once the channel is
   * closed and drained, or as soon as `signal` aborts.
   */
  read(fromSequence = 0, signal?: AbortSignal): AsyncGenerator<OutputEvent, void, undefined> {
    return this.iterate(assertSequence(fromSequence), signal);
  }

  private async *iterate(cursor: number, signal?: AbortSignal): AsyncGenerator<OutputEvent, void, undefined> {
    while (!signal?.aborted) {
      if (cursor < this.events.length) {
        yield this.events[cursor++];
        continue;
      }
      if (this.closed) {
        return;
      }
      await this.waitForChange(signal);
    }
  }

  private waitForChange(signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      const wake = () => {
        this.waiters.delete(wake);
        signal?.removeEventListener('abort', wake);
        resolve();
      };
      this.waiters.add(wake);
      signal?.addEventListener('abort', wake, { once: true });
    });
  }

  private wakeReaders(): void {
    for (const wake of [...this.waiters]) {
      wake();
    }
  }
}

function assertSequence(sequence: number): number {
  if (!Number.isInteger(sequence) || sequence < 0) {
    throw new InvalidArgumentError(`Sequence must be a non-negative integer, got ${sequence}`);
  }
  return sequence;
}
