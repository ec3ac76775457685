import { describe, it, expect } from 'vitest';
import { OperationTimeoutError } from '../../../src/errors';
import { pendingShowLocks, withShowLock } from '../../../src/services/showLocks';

function gate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('withShowLock', () => {
  it('runs work for the same show one at a time, in call order', async () => {
    const order: string[] = [];
    const first = gate();

    const a = withShowLock(1, 1000, async () => {
      order.push('a:start');
      await first.opened;
      order.push('a:end');
    });
    const b = withShowLock(1, 1000, async () => {
      order.push('b');
    });

    await flush();
    expect(order).toEqual(['a:start']);

    first.open();
    await Promise.all([a, b]);
    expect(order).toEqual(['a:start', 'a:end', 'b']);
  });

  it('does not block other shows', async () => {
    const held = gate();
    const slow = withShowLock(1, 1000, async () => {
      await held.opened;
      return 'slow';
    });

    await expect(withShowLock(2, 1000, async () => 'fast')).resolves.toBe('fast');

    held.open();
    await expect(slow).resolves.toBe('slow');
  });

  it('times out waiting without running the work', async () => {
    const held = gate();
    let ran = false;

    const holder = withShowLock(3, 1000, async () => {
      await held.opened;
    });
    const waiter = withShowLock(3, 20, async () => {
      ran = true;
    });

    await expect(waiter).rejects.toBeInstanceOf(OperationTimeoutError);
    expect(ran).toBe(false);

    held.open();
    await holder;
    await expect(withShowLock(3, 1000, async () => 'after')).resolves.toBe('after');
  });

  it('releases the lock when the work throws', async () => {
    await expect(
      withShowLock(4, 1000, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(withShowLock(4, 1000, async () => 'next')).resolves.toBe('next');
  });

  it('forgets shows once nothing is waiting', async () => {
    await withShowLock(5, 1000, async () => undefined);
    await flush();
    expect(pendingShowLocks()).toBe(0);
  });
});
