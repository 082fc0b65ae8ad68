/**
 * Decimal rounding, half away from zero.
 *
 * The epsilon nudge keeps values like 1.005 (stored as 1.00499...) rounding up.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = Math.abs(value) * factor;
  const rounded = Math.round(scaled + Number.EPSILON * scaled) / factor;
  return value < 0 ? -rounded : rounded;
}
