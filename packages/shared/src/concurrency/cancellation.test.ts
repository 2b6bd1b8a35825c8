import { CancellationSource, NEVER_CANCELLED } from './cancellation';
import { SerialQueue } from './serial-queue';

describe('CancellationSource', () => {
  it('issues tokens with increasing generations and cancels the previous one', () => {
    const source = new CancellationSource();
    const first = source.next();
    const second = source.next();

    expect(first.generation).toBe(1);
    expect(second.generation).toBe(2);
    expect(first.isCancelled()).toBe(true);
    expect(second.isCancelled()).toBe(false);
    expect(source.isCurrent(first)).toBe(false);
    expect(source.isCurrent(second)).toBe(true);
    expect(source.currentGeneration).toBe(2);
  });

  it('notifies cancel listeners once and supports unsubscribing', () => {
    const source = new CancellationSource();
    const token = source.next();
    const kept = vi.fn();
    const removed = vi.fn();

    token.onCancel(kept);
    const off = token.onCancel(removed);
    off();

    source.cancel();
    source.cancel();

    expect(kept).toHaveBeenCalledTimes(1);
    expect(removed).not.toHaveBeenCalled();
    expect(source.isCurrent(token)).toBe(false);
  });

  it('runs listeners immediately on an already cancelled token', () => {
    const source = new CancellationSource();
    const token = source.next();
    source.next();

    const listener = vi.fn();
    token.onCancel(listener);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('provides a token that never cancels', () => {
    expect(NEVER_CANCELLED.isCancelled()).toBe(false);
  });
});

describe('SerialQueue', () => {
  it('runs tasks one after another in submission order', async () => {
    const queue = new SerialQueue();
    const order: string[] = [];
    let releaseFirst: () => void = () => {};

    const first = queue.run(async () => {
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      order.push('first');
      return 1;
    });
    const second = queue.run(async () => {
      order.push('second');
      return 2;
    });

    expect(queue.size).toBe(2);
    await Promise.resolve();
    releaseFirst();

    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(order).toEqual(['first', 'second']);
    expect(queue.size).toBe(0);
  });

  it('keeps running after a task rejects', async () => {
    const queue = new SerialQueue();
    const failing = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
    await queue.drain();
  });
});
