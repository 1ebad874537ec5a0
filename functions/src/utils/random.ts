/** Uniform source on [0, 1). `Math.random` satisfies it. */
export type RandomSource = () => number;

export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniform(random: RandomSource, low: number, high: number): number {
  return low + (high - low) * random();
}

// Box-Muller, cosine branch only.
export function normal(random: RandomSource, mean: number, std: number): number {
  let u = 0;
  while (u === 0) u = random();
  const v = random();
  return mean + std * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/**
 * Gamma(shape, scale) via Marsaglia-Tsang. Shapes below 1 are boosted with
 * the usual `U^(1/shape)` correction.
 */
export function gamma(random: RandomSource, shape: number, scale: number): number {
  if (shape < 1) {
    const boost = Math.pow(random() || Number.EPSILON, 1 / shape);
    return gamma(random, shape + 1, scale) * boost;
  }
  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);
  for (;;) {
    let x = 0;
    let v = 0;
    do {
      x = normal(random, 0, 1);
      v = 1 + c * x;
    } while (v <= 0);
    v = v * v * v;
    const u = random();
    if (u < 1 - 0.0331 * x * x * x * x) return d * v * scale;
    if (Math.log(u || Number.EPSILON) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v * scale;
  }
}

export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
