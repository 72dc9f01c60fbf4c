/**
 * Wait for `task` to settle, giving up after `timeoutMs`.
 * Resolves true if it settled in time (fulfilled or rejected).
 */
export async function settleWithin(task: Promise<unknown> | null, timeoutMs: number): Promise<boolean> {
  if (!task) {
    return true;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([
      task.then(
        () => true,
        () => true,
      ),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
