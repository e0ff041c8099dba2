/**
 * Clock source. Every time comparison in the core goes through one of these
 * so that expiry behaviour is testable to the second.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Unix seconds for a Date (JWT NumericDate) */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}
