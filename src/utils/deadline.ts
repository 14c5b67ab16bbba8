export class DeadlineExceededError extends Error {
  constructor(public readonly budgetMs: number) {
    super(`Deadline of ${budgetMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Run `work` but give up after `budgetMs`. The signal handed to `work`
 * is aborted on timeout so it can stop early; the returned promise
 * rejects with DeadlineExceededError either way.
 */
export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  budgetMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DeadlineExceededError(budgetMs));
    }, Math.max(0, budgetMs));
  });

  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
