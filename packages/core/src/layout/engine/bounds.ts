export const I32_MAX = 2147483647;

/** Upper bound on any repeat() count, fixed or resolved from available space. */
export const MAX_REPETITIONS = 0xffff;

/** Floor a count-like number to a non-negative integer; NaN and -Infinity become 0. */
export function toCount(v: number): number {
  if (Number.isNaN(v) || v <= 0) return 0;
  if (v === Number.POSITIVE_INFINITY) return I32_MAX;
  return Math.min(Math.floor(v), I32_MAX);
}
