export const mean = (values: number[]): number => {
  if (values.length === 0) return 0;
  return values.reduce((acc, value) => acc + value, 0) / values.length;
};

export const clamp = (value: number, low: number, high: number): number => {
  return Math.max(low, Math.min(high, value));
};

export const round = (value: number, digits = 2): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * Linear 0..100 score of `value` between a worst and a best anchor. The anchors
 * may be given in either order, so "lower is better" metrics pass worst > best.
 */
export const scaleScore = (value: number, worst: number, best: number): number => {
  if (worst === best) return value >= best ? 100 : 0;
  return clamp(((value - worst) / (best - worst)) * 100, 0, 100);
};
