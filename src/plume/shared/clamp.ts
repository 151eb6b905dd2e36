export function clampNumber(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/** Truncates to an integer index in `[0, max]`; NaN becomes 0. */
export function clampIndex(value: number, max: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return clampNumber(Math.trunc(value), 0, Math.max(0, max));
}
