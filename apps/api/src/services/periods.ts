const DAY_MS = 24 * 60 * 60 * 1000;

/** Quota periods are UTC calendar months. */
export function periodStartOf(nowMs: number): Date {
  const now = new Date(nowMs);
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
}

export function nextPeriodStart(nowMs: number): Date {
  const now = new Date(nowMs);
  // Date.UTC rolls month 12 over into January of the next year.
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + 1, 1));
}

/** Whole days left before the next period starts, rounded down. */
export function daysUntilNextPeriod(nowMs: number): number {
  return Math.floor((nextPeriodStart(nowMs).getTime() - nowMs) / DAY_MS);
}
