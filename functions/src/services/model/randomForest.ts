import { TreeNode, TreeOptions, fitRegressionTree, predictTree } from './decisionTree';
import { seededRandom } from '../../utils/random';

export type ForestOptions = TreeOptions & {
  nEstimators: number;
  seed: number;
};

export type RandomForest = {
  trees: readonly TreeNode[];
  featureImportances: readonly number[];
};

export const DEFAULT_FOREST_OPTIONS: ForestOptions = {
  nEstimators: 100,
  maxDepth: 10,
  minSamplesSplit: 5,
  minSamplesLeaf: 2,
  seed: 42
};

/**
 * Bagged regression trees. Every tree sees a bootstrap sample of the rows and
 * considers all features at each split, so the randomness comes from bagging
 * alone.
 */
export function fitRandomForest(
  X: readonly (readonly number[])[],
  y: readonly number[],
  options: Partial<ForestOptions> = {}
): RandomForest {
  const opts: ForestOptions = { ...DEFAULT_FOREST_OPTIONS, ...options };
  if (!X.length || X.length !== y.length) {
    throw new Error(`Forest needs matching non-empty X and y (got ${X.length} and ${y.length})`);
  }
  const random = seededRandom(opts.seed);
  const n = X.length;
  const width = X[0].length;
  const trees: TreeNode[] = [];
  const importances = new Array<number>(width).fill(0);

  for (let t = 0; t < opts.nEstimators; t++) {
    const sample = Array.from({ length: n }, () => Math.floor(random() * n));
    const tree = fitRegressionTree(X, y, sample, opts);
    trees.push(tree.root);
    tree.importances.forEach((v, j) => (importances[j] += v));
  }

  const total = importances.reduce((sum, v) => sum + v, 0);
  return {
    trees,
    featureImportances: total > 0 ? importances.map((v) => v / total) : importances
  };
}

export function predictForest(forest: RandomForest, row: readonly number[]): number {
  let sum = 0;
  for (const tree of forest.trees) sum += predictTree(tree, row);
  return sum / forest.trees.length;
}
