/**
 * Poisson goal-count helpers
 */

/**
 * P(X = k) for X ~ Poisson(lambda)
 */
export function poissonPmf(k: number, lambda: number): number {
  if (!Number.isInteger(k) || k < 0) return 0;
  if (lambda === 0) return k === 0 ? 1 : 0;

  let p = Math.exp(-lambda);
  for (let i = 1; i <= k; i++) {
    p *= lambda / i;
  }
  return p;
}

/**
 * PMF over 0..cutoff with the tail mass P(X > cutoff) folded into the cutoff cell,
 * so the vector sums to 1
 */
export function poissonVector(lambda: number, cutoff: number): number[] {
  if (!Number.isFinite(lambda) || lambda < 0) {
    throw new Error(`Goal rate must be a finite non-negative number (got ${lambda})`);
  }
  if (!Number.isInteger(cutoff) || cutoff < 1) {
    throw new Error(`Scoreline cutoff must be an integer >= 1 (got ${cutoff})`);
  }

  const probabilities: number[] = [];
  let p = Math.exp(-lambda);
  let cumulative = 0;

  for (let k = 0; k < cutoff; k++) {
    probabilities.push(p);
    cumulative += p;
    p *= lambda / (k + 1);
  }
  probabilities.push(Math.max(0, 1 - cumulative));

  return probabilities;
}
