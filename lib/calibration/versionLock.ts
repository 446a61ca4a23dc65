/**
 * In-process serialization of calibration operations per version id.
 * Callers for the same id run one after another in arrival order; different ids do not wait on each other.
 * Cross-process safety comes from the store (row lock + compare-and-swap on publish).
 */

const tails = new Map<string, Promise<void>>();

export async function withVersionLock<T>(versionId: string, fn: () => Promise<T>): Promise<T> {
  const previous = tails.get(versionId) ?? Promise.resolve();
  const run = previous.then(fn);
  const tail = run.then(
    () => undefined,
    () => undefined
  );
  tails.set(versionId, tail);
  try {
    return await run;
  } finally {
    if (tails.get(versionId) === tail) tails.delete(versionId);
  }
}

/** Number of versions with queued or running operations. */
export function pendingVersionLocks(): number {
  return tails.size;
}
