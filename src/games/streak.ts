const DAY_MS = 24 * 60 * 60 * 1000;

function utcDay(date: Date): number {
  return Math.floor(date.getTime() / DAY_MS);
}

/**
 * Play streak after a session at `now`: unchanged (at least 1) on the same
 * UTC day, +1 on the next UTC day, reset to 1 after a gap.
 */
export function nextStreak(
  current: number,
  lastPlayedAt: Date | null,
  now: Date,
): number {
  if (!lastPlayedAt) return 1;
  const gap = utcDay(now) - utcDay(lastPlayedAt);
  if (gap === 0) return Math.max(current, 1);
  if (gap === 1) return current + 1;
  return 1;
}
