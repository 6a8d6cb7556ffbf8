const pendingWrites = new WeakMap<object, Promise<void>>();

/**
 * Runs `work` after every write already queued against `database` has
 * settled. SQLite takes one writer at a time, and libsql opens a separate
 * connection per transaction, so overlapping transactions in one process
 * would otherwise fail with SQLITE_BUSY.
 */
export function withWriteLock<T>(
  database: object,
  work: () => Promise<T>,
): Promise<T> {
  const previous = pendingWrites.get(database) ?? Promise.resolve();
  const result = previous.then(work);

  // The queue only needs to know when `work` is done; its outcome reaches
  // the caller through `result`.
  pendingWrites.set(
    database,
    result.then(
      () => undefined,
      () => undefined,
    ),
  );

  return result;
}
