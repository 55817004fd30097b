/**
 * @summary Simulated time spans.
 *
 * Durations are either plain seconds or a date-fns Duration such as
 * `{ days: 1, hours: 2 }`. Calendar units use date-fns' averages
 * (a month is 30.436875 days).
 */

import { milliseconds, type Duration } from "date-fns";

export type DurationInput = Duration | number;

/**
 * Convert a duration to whole seconds, rounding up.
 *
 * @throws RangeError if the duration is negative or not finite
 *
 * @example
 * durationToSeconds(90);               // 90
 * durationToSeconds({ minutes: 2 });   // 120
 */
export function durationToSeconds(duration: DurationInput): number {
  const ms = typeof duration === "number" ? duration * 1000 : milliseconds(duration);
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`Invalid duration: ${JSON.stringify(duration)}`);
  }
  return Math.ceil(ms / 1000);
}
