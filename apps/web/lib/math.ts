/** Round to `digits` decimals (half away from zero for positive values). */
export function roundTo(value: number, digits = 2): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

export function sum(values: number[]): number {
  return values.reduce((s, v) => s + v, 0);
}
