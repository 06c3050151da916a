/**
 * Shared utility functions used across modules.
 */

/**
 * Normalize a string for comparison (lowercase, trim, single spaces).
 */
export function normalize(str: string): string {
  return str
    .toLowerCase()
    .trim()
    .replace(/\s+/g, ' ');
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Round to a fixed number of decimal places.
 */
export function roundTo(value: number, decimals = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Arithmetic mean, or null for an empty list.
 */
export function average(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Median, or null for an empty list.
 */
export function median(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Group items by a key function, keeping input order inside each group.
 */
export function groupBy<T>(array: readonly T[], keyFn: (item: T) => string): Record<string, T[]> {
  const groups: Record<string, T[]> = {};
  for (const item of array) {
    const key = keyFn(item);
    if (Object.prototype.hasOwnProperty.call(groups, key)) {
      groups[key].push(item);
    } else {
      groups[key] = [item];
    }
  }
  return groups;
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Run an abortable task with an upper bound on its duration.
 * On expiry the task's signal is aborted and the returned promise rejects
 * with a TimeoutError.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  message = `Timed out after ${timeoutMs}ms`
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expiry = new Promise<never>((_, reject) => {
    // Reject before aborting so the timeout, not the task's abort error, settles the race.
    timer = setTimeout(() => {
      reject(new TimeoutError(message));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), expiry]);
  } finally {
    clearTimeout(timer);
  }
}
