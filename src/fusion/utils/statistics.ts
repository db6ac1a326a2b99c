/**
 * Score Statistics
 *
 * Small numeric helpers for one-dimensional score vectors: the two-cluster
 * split used for adaptive thresholds, percentiles and summary moments.
 */

// ============================================================================
// Moments
// ============================================================================

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population standard deviation.
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - m) ** 2)));
}

// ============================================================================
// Percentile
// ============================================================================

/**
 * Percentile with linear interpolation between the two closest ranks.
 *
 * @param p - Percentile in [0, 100]
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (rank - lower);
}

// ============================================================================
// Two-Cluster Split
// ============================================================================

export interface TwoMeansResult {
  readonly lowCenter: number;
  readonly highCenter: number;
  readonly iterations: number;
}

/**
 * Mean of a cluster, held inside the range of its members. Summation error
 * would otherwise let the center of identical values land one ulp off them.
 */
function clusterCenter(members: readonly number[]): number {
  return Math.min(Math.max(mean(members), Math.min(...members)), Math.max(...members));
}

/**
 * Lloyd's algorithm with k=2 on a line. Centers start at the minimum and the
 * maximum, which makes the result deterministic. A cluster that empties keeps
 * its previous center. Identical values yield that value for both centers.
 */
export function twoMeans(values: readonly number[], maxIterations = 100): TwoMeansResult {
  if (values.length === 0) return { lowCenter: 0, highCenter: 0, iterations: 0 };

  let low = Math.min(...values);
  let high = Math.max(...values);
  if (low === high) return { lowCenter: low, highCenter: high, iterations: 0 };
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations++;
    const lowMembers: number[] = [];
    const highMembers: number[] = [];
    for (const v of values) {
      // ties go to the lower cluster
      if (Math.abs(v - low) <= Math.abs(v - high)) lowMembers.push(v);
      else highMembers.push(v);
    }

    const nextLow = lowMembers.length > 0 ? clusterCenter(lowMembers) : low;
    const nextHigh = highMembers.length > 0 ? clusterCenter(highMembers) : high;
    if (nextLow === low && nextHigh === high) break;
    low = nextLow;
    high = nextHigh;
  }

  return { lowCenter: low, highCenter: high, iterations };
}

/**
 * Threshold halfway between the two cluster centers.
 */
export function twoMeansThreshold(values: readonly number[], maxIterations = 100): number {
  const { lowCenter, highCenter } = twoMeans(values, maxIterations);
  return (lowCenter + highCenter) / 2;
}
