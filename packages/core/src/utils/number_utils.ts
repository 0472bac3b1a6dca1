/**
 * Rounds to two decimal places, the precision of every engine score.
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

