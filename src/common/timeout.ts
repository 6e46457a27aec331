/**
 * Race `work` against a timer. The timer is always cleared, so a settled call
 * leaves nothing scheduled.
 * @param work - Pending operation
 * @param timeoutMs - Milliseconds before giving up
 * @param onTimeout - Builds the rejection reason
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}
