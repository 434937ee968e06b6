import { describe, expect, it } from 'vitest';
import { OutputChannel } from '../outputChannel.js';
import { InvalidArgumentError } from '../../errors.js';
import type { OutputEvent } from '../../../../shared/types/session.js';
import { collect } from '../../__tests__/helpers.js';

describe('OutputChannel', () => {
  it('numbers events from 0 without gaps', () => {
    const channel = new OutputChannel('s1');

    channel.append('stdout', 'a');
    channel.append('stderr', 'b');
    channel.append('system', 'c');

    expect(channel.snapshot().map(event => [event.sequence, event.stream, event.payload])).toEqual([
      [0, 'stdout', 'a'],
      [1, 'stderr', 'b'],
      [2, 'system', 'c']
    ]);
    expect(channel.lastSequence).toBe(2);
    expect(channel.size).toBe(3);
  });

  it('reports -1 as the last sequence while empty', () => {
    expect(new OutputChannel('s1').lastSequence).toBe(-1);
  });

  it('ignores appends after close', () => {
    const channel = new OutputChannel('s1');
    channel.append('stdout', 'kept');
    channel.close();

    expect(channel.append('stdout', 'dropped')).toBeNull();
    expect(channel.size).toBe(1);
    expect(channel.isClosed).toBe(true);
  });

  it('notifies the append listener with each stored event', () => {
    const seen: OutputEvent[] = [];
    const channel = new OutputChannel('s1', event => seen.push(event));

    const stored = channel.append('stdout', 'x');

    expect(seen).toEqual([stored]);
    expect(seen[0].sessionId).toBe('s1');
  });

  it('resumes reading from a given sequence', async () => {
    const channel = new OutputChannel('s1');
    for (const payload of ['a', 'b', 'c', 'd']) {
      channel.append('stdout', payload);
    }
    channel.close();

    const events = await collect(channel.read(2));

    expect(events.map(event => event.payload)).toEqual(['c', 'd']);
  });

  it('yields nothing when starting past the end of a closed channel', async () => {
    const channel = new OutputChannel('s1');
    channel.append('stdout', 'a');
    channel.close();

    expect(await collect(channel.read(5))).toEqual([]);
  });

  it('delivers output appended while a reader is waiting', async () => {
    const channel = new OutputChannel('s1');
    const reading = collect(channel.read());

    setTimeout(() => {
      channel.append('stdout', 'late');
      channel.close();
    }, 20);

    expect((await reading).map(event => event.payload)).toEqual(['late']);
  });

  it('gives every reader the same sequence', async () => {
    const channel = new OutputChannel('s1');
    const first = collect(channel.read());
    const second = collect(channel.read());

    channel.append('stdout', 'one');
    channel.append('stderr', 'two');
    channel.close();

    expect(await first).toEqual(await second);
  });

  it('stops a waiting reader when the signal aborts', async () => {
    const channel = new OutputChannel('s1');
    channel.append('stdout', 'a');
    const controller = new AbortController();

    const reading = collect(channel.read(0, controller.signal));
    setTimeout(() => controller.abort(), 20);

    expect((await reading).map(event => event.payload)).toEqual(['a']);
    expect(channel.isClosed).toBe(false);
  });

  it('rejects negative or fractional sequences', () => {
    const channel = new OutputChannel('s1');

    expect(() => channel.read(-1)).toThrow(InvalidArgumentError);
    expect(() => channel.read(1.5)).toThrow(InvalidArgumentError);
    expect(() => channel.snapshot(-2)).toThrow(InvalidArgumentError);
  });
});
