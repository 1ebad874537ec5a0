export type TreeNode =
  | { kind: 'leaf'; value: number; samples: number }
  | {
      kind: 'split';
      feature: number;
      threshold: number;
      samples: number;
      left: TreeNode;
      right: TreeNode;
    };

export type TreeOptions = {
  maxDepth: number;
  minSamplesSplit: number;
  minSamplesLeaf: number;
};

export type FittedTree = {
  root: TreeNode;
  /** Impurity decrease per feature, normalised to sum to 1 (all zeros for a stump). */
  importances: number[];
};

type Split = { feature: number; threshold: number; sse: number };

const EPSILON = 1e-12;

function sumSquaredError(indices: readonly number[], y: readonly number[]) {
  let sum = 0;
  let sq = 0;
  for (const i of indices) {
    sum += y[i];
    sq += y[i] * y[i];
  }
  const n = indices.length;
  return { mean: sum / n, sse: Math.max(0, sq - (sum * sum) / n) };
}

function findBestSplit(
  X: readonly (readonly number[])[],
  y: readonly number[],
  indices: readonly number[],
  minLeaf: number
): Split | null {
  const n = indices.length;
  const width = X[indices[0]].length;
  let best: Split | null = null;

  for (let f = 0; f < width; f++) {
    const sorted = [...indices].sort((a, b) => X[a][f] - X[b][f]);
    let totalSum = 0;
    let totalSq = 0;
    for (const i of sorted) {
      totalSum += y[i];
      totalSq += y[i] * y[i];
    }

    let leftSum = 0;
    let leftSq = 0;
    for (let k = 1; k < n; k++) {
      const prev = sorted[k - 1];
      leftSum += y[prev];
      leftSq += y[prev] * y[prev];
      if (k < minLeaf || n - k < minLeaf) continue;

      const lo = X[prev][f];
      const hi = X[sorted[k]][f];
      if (hi - lo <= EPSILON) continue;

      const rightSum = totalSum - leftSum;
      const rightSq = totalSq - leftSq;
      const sse = leftSq - (leftSum * leftSum) / k + (rightSq - (rightSum * rightSum) / (n - k));
      if (!best || sse < best.sse - EPSILON) {
        best = { feature: f, threshold: (lo + hi) / 2, sse };
      }
    }
  }
  return best;
}

/** CART regression tree on squared error; rows go left when `x[feature] <= threshold`. */
export function fitRegressionTree(
  X: readonly (readonly number[])[],
  y: readonly number[],
  indices: readonly number[],
  options: TreeOptions
): FittedTree {
  if (!indices.length) throw new Error('Cannot fit a tree on an empty sample');
  const width = X[indices[0]].length;
  const importances = new Array<number>(width).fill(0);

  const build = (nodeIndices: readonly number[], depth: number): TreeNode => {
    const { mean, sse } = sumSquaredError(nodeIndices, y);
    const samples = nodeIndices.length;
    if (
      depth >= options.maxDepth ||
      samples < options.minSamplesSplit ||
      samples < 2 * options.minSamplesLeaf ||
      sse <= EPSILON
    ) {
      return { kind: 'leaf', value: mean, samples };
    }

    const split = findBestSplit(X, y, nodeIndices, options.minSamplesLeaf);
    if (!split) return { kind: 'leaf', value: mean, samples };

    importances[split.feature] += sse - split.sse;
    const left: number[] = [];
    const right: number[] = [];
    for (const i of nodeIndices) {
      (X[i][split.feature] <= split.threshold ? left : right).push(i);
    }
    return {
      kind: 'split',
      feature: split.feature,
      threshold: split.threshold,
      samples,
      left: build(left, depth + 1),
      right: build(right, depth + 1)
    };
  };

  const root = build(indices, 0);
  const total = importances.reduce((sum, v) => sum + v, 0);
  return {
    root,
    importances: total > 0 ? importances.map((v) => v / total) : importances
  };
}

export function predictTree(root: TreeNode, row: readonly number[]): number {
  let node = root;
  while (node.kind === 'split') {
    node = row[node.feature] <= node.threshold ? node.left : node.right;
  }
  return node.value;
}
