export function meanAbsoluteError(actual: readonly number[], predicted: readonly number[]): number {
  if (!actual.length) return NaN;
  let sum = 0;
  for (let i = 0; i < actual.length; i++) sum += Math.abs(actual[i] - predicted[i]);
  return sum / actual.length;
}

export function r2Score(actual: readonly number[], predicted: readonly number[]): number {
  if (!actual.length) return NaN;
  const mean = actual.reduce((sum, v) => sum + v, 0) / actual.length;
  let residual = 0;
  let total = 0;
  for (let i = 0; i < actual.length; i++) {
    residual += (actual[i] - predicted[i]) ** 2;
    total += (actual[i] - mean) ** 2;
  }
  if (total === 0) return residual === 0 ? 1 : 0;
  return 1 - residual / total;
}
