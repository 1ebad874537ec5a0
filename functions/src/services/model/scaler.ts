export type StandardScaler = {
  mean: readonly number[];
  scale: readonly number[];
};

// Population variance; a constant column keeps scale 1.
export function fitStandardScaler(rows: readonly (readonly number[])[]): StandardScaler {
  if (!rows.length) throw new Error('Cannot fit a scaler on an empty table');
  const width = rows[0].length;
  const mean = new Array<number>(width).fill(0);
  const scale = new Array<number>(width).fill(0);

  for (const row of rows) {
    for (let j = 0; j < width; j++) mean[j] += row[j];
  }
  for (let j = 0; j < width; j++) mean[j] /= rows.length;

  for (const row of rows) {
    for (let j = 0; j < width; j++) {
      const diff = row[j] - mean[j];
      scale[j] += diff * diff;
    }
  }
  for (let j = 0; j < width; j++) {
    const std = Math.sqrt(scale[j] / rows.length);
    scale[j] = std > 0 ? std : 1;
  }
  return { mean, scale };
}

export function scaleRow(scaler: StandardScaler, row: readonly number[]): number[] {
  return row.map((value, j) => (value - scaler.mean[j]) / scaler.scale[j]);
}
