// natural loads sylvester, which replaces Math.sign so that Math.sign(0) is 1.
// Sort comparators go through these instead.

export function compareNumbers(x: number, y: number): number {
  return x < y ? -1 : x > y ? 1 : 0;
}

/** Locale-independent string order (UTF-16 code units). */
export function compareCodeUnits(x: string, y: string): number {
  return x < y ? -1 : x > y ? 1 : 0;
}
