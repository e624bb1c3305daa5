const MS_PER_HOUR = 60 * 60 * 1000;

/** numerator / denominator, or 0 when the denominator is not positive. */
export function safeRatio(numerator: number, denominator: number): number {
  if (denominator <= 0) return 0;
  return numerator / denominator;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Hours between an ISO timestamp and `now` (epoch ms). Future or unparseable
 * timestamps count as age 0.
 */
export function ageHours(createdAt: string, now: number): number {
  const created = new Date(createdAt).getTime();
  if (Number.isNaN(created)) return 0;
  return Math.max(0, (now - created) / MS_PER_HOUR);
}

export function generateRequestId(userId: string, now: number): string {
  return `feed_${userId}_${now}`;
}
