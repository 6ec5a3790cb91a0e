/**
 * Time helpers shared by the aggregator, gate and history store (all UTC)
 */

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * YYYY-MM-DD of the UTC calendar day
 */
export function utcDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function ageInSeconds(now: Date, observedAt: Date): number {
  return (now.getTime() - observedAt.getTime()) / 1000;
}

/**
 * Parse an ISO timestamp (or a Date produced by js-yaml) into a valid Date
 */
export function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}
