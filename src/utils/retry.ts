export type BackoffOptions = {
  baseDelayMs?: number;
  maxDelayMs?: number;
};

const DEFAULTS: Required<BackoffOptions> = {
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

/** Exponential delay before retrying after the given (1-based) failed attempt. */
export function backoffDelay(attempt: number, opts?: BackoffOptions): number {
  const { baseDelayMs, maxDelayMs } = { ...DEFAULTS, ...opts };
  if (baseDelayMs <= 0) return 0;
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise((r) => setTimeout(r, ms));
}
