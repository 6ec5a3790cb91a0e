/**
 * Scoreline Distribution
 *
 * Probability mass over final scores. Stored as the residual grid (goals still to come,
 * 0..cutoff per side) shifted by the score already on the board. Immutable once built.
 */

import type { LiveScore } from '../types';
import { poissonVector } from './poisson';

/**
 * Dixon-Coles low-score correction factor for residual cell (h, a)
 */
export function dixonColesTau(h: number, a: number, lambdaHome: number, lambdaAway: number, rho: number): number {
  if (h === 0 && a === 0) return 1 - lambdaHome * lambdaAway * rho;
  if (h === 0 && a === 1) return 1 + lambdaHome * rho;
  if (h === 1 && a === 0) return 1 + lambdaAway * rho;
  if (h === 1 && a === 1) return 1 - rho;
  return 1;
}

/**
 * Independent Poisson product over 0..cutoff, then the rho correction on the four
 * low-score cells and renormalization. rho = 0 leaves the product untouched.
 */
export function buildResidualGrid(
  lambdaHome: number,
  lambdaAway: number,
  cutoff: number,
  rho: number
): number[][] {
  const home = poissonVector(lambdaHome, cutoff);
  const away = poissonVector(lambdaAway, cutoff);
  const grid = home.map(ph => away.map(pa => ph * pa));

  if (rho === 0) return grid;

  for (let h = 0; h <= 1; h++) {
    for (let a = 0; a <= 1; a++) {
      grid[h][a] = Math.max(0, grid[h][a] * dixonColesTau(h, a, lambdaHome, lambdaAway, rho));
    }
  }

  const total = grid.reduce((sum, row) => sum + row.reduce((s, p) => s + p, 0), 0);
  return grid.map(row => row.map(p => p / total));
}

export class ScorelineDistribution {
  readonly cutoff: number;
  readonly offset: Readonly<LiveScore>;
  private readonly grid: ReadonlyArray<ReadonlyArray<number>>;

  constructor(residualGrid: number[][], offset: LiveScore = { home: 0, away: 0 }) {
    this.cutoff = residualGrid.length - 1;
    this.offset = Object.freeze({ ...offset });
    this.grid = Object.freeze(residualGrid.map(row => Object.freeze([...row])));
  }

  static fromRates(
    lambdaHome: number,
    lambdaAway: number,
    cutoff: number,
    rho: number,
    offset?: LiveScore
  ): ScorelineDistribution {
    return new ScorelineDistribution(buildResidualGrid(lambdaHome, lambdaAway, cutoff, rho), offset);
  }

  /**
   * Probability that the sides score exactly these many more goals
   */
  residualProbability(homeGoals: number, awayGoals: number): number {
    return this.grid[homeGoals]?.[awayGoals] ?? 0;
  }

  /**
   * Probability of this final score
   */
  probability(finalHome: number, finalAway: number): number {
    return this.residualProbability(finalHome - this.offset.home, finalAway - this.offset.away);
  }

  forEachCell(callback: (finalHome: number, finalAway: number, probability: number) => void): void {
    this.grid.forEach((row, h) => {
      row.forEach((p, a) => callback(h + this.offset.home, a + this.offset.away, p));
    });
  }

  probabilityWhere(predicate: (finalHome: number, finalAway: number) => boolean): number {
    let total = 0;
    this.forEachCell((home, away, p) => {
      if (predicate(home, away)) total += p;
    });
    return total;
  }

  totalMass(): number {
    return this.probabilityWhere(() => true);
  }

  /**
   * P(final home goals = n) keyed by n
   */
  homeMarginal(): Map<number, number> {
    const marginal = new Map<number, number>();
    this.forEachCell((home, _away, p) => marginal.set(home, (marginal.get(home) ?? 0) + p));
    return marginal;
  }

  awayMarginal(): Map<number, number> {
    const marginal = new Map<number, number>();
    this.forEachCell((_home, away, p) => marginal.set(away, (marginal.get(away) ?? 0) + p));
    return marginal;
  }

  mostLikelyScore(): LiveScore {
    let best: LiveScore = { ...this.offset };
    let bestProbability = -1;
    this.forEachCell((home, away, p) => {
      if (p > bestProbability) {
        best = { home, away };
        bestProbability = p;
      }
    });
    return best;
  }
}
