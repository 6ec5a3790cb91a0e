/**
 * Deadline
 *
 * Bounds a collaborator call by a timer. The call itself is not cancelled; its late result
 * is ignored.
 */

export class DeadlineExceededError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} did not respond within ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
  }
}

export async function withDeadline<T>(task: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  const budget = Math.max(0, Math.round(timeoutMs));
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceededError(label, budget)), budget);
  });

  try {
    return await Promise.race([task, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
