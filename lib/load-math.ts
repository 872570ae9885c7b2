export function clamp(val: number, min: number, max: number): number {
  if (!Number.isFinite(val)) return max;
  return Math.max(min, Math.min(max, val));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
}
