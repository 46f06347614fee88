/** Source of the current time in epoch seconds (fractional) */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

/** Whole epoch milliseconds for a clock reading */
export function toEpochMillis(seconds: number): number {
  return Math.floor(seconds * 1000);
}
