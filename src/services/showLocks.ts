import { withTimeout } from '../utils/withTimeout';

// Tail of the pending work per show. Each caller chains onto it.
const tails = new Map<number, Promise<void>>();

/**
 * Run `work` once every earlier holder for the same show has finished.
 * Waiting longer than `timeoutMs` rejects with OperationTimeoutError and the
 * work never runs.
 */
export async function withShowLock<T>(showId: number, timeoutMs: number, work: () => Promise<T>): Promise<T> {
  const previous = tails.get(showId) ?? Promise.resolve();

  let release: () => void = () => undefined;
  const current = new Promise<void>((resolve) => {
    release = resolve;
  });
  const tail = previous.then(() => current);
  tails.set(showId, tail);

  try {
    await withTimeout(previous, timeoutMs, `Waiting for show ${showId} lock`);
  } catch (error) {
    // Keep the chain intact for later callers, but release as soon as our turn comes
    void previous.then(release);
    cleanup(showId, tail);
    throw error;
  }

  try {
    return await work();
  } finally {
    release();
    cleanup(showId, tail);
  }
}

function cleanup(showId: number, tail: Promise<void>) {
  void tail.then(() => {
    if (tails.get(showId) === tail) {
      tails.delete(showId);
    }
  });
}

export function pendingShowLocks(): number {
  return tails.size;
}
