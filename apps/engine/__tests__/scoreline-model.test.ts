/**
 * Scoreline Model Tests
 *
 * Poisson grid, low-score correlation, live-state rescaling and rating fallback.
 */

import { poissonPmf, poissonVector } from '../src/model/poisson';
import { buildResidualGrid, dixonColesTau, ScorelineDistribution } from '../src/model/scoreline-distribution';
import { adjustRatesForLiveState, fatigueFactor, trailingBoost } from '../src/model/live-adjustment';
import { baseGoalRates, ScorelineModel } from '../src/model/scoreline-model';
import { RatingStore } from '../src/ratings/rating-store';
import type { CanonicalMatch, TeamRating } from '../src/types';
import { testConfig } from './helpers/test-config';

const NOW = new Date('2026-10-18T15:00:00Z');

function rating(teamId: string, attack: number, defense: number, homeAdvantage = 1.1, lastUpdated = NOW): TeamRating {
  return { teamId, attackStrength: attack, defenseStrength: defense, homeAdvantage, lastUpdated };
}

const match: CanonicalMatch = {
  matchId: 'gor-mahia_vs_afc-leopards@2026-10-18',
  normalizedHomeTeam: 'gor-mahia',
  normalizedAwayTeam: 'afc-leopards',
  competition: 'Kenya Premier League',
  kickoffTime: new Date('2026-10-18T13:00:00Z'),
};

describe('Scoreline Model', () => {
  describe('Poisson helpers', () => {
    test('pmf matches the closed form', () => {
      const expected = Math.exp(-1.4) * Math.pow(1.4, 3) / 6;
      expect(poissonPmf(3, 1.4)).toBeCloseTo(expected, 12);
      expect(poissonPmf(0, 0)).toBe(1);
      expect(poissonPmf(2, 0)).toBe(0);
    });

    test('folds the tail into the cutoff cell', () => {
      const vector = poissonVector(2.5, 3);
      const tail = 1 - [0, 1, 2].reduce((sum, k) => sum + poissonPmf(k, 2.5), 0);

      expect(vector).toHaveLength(4);
      expect(vector[3]).toBeCloseTo(tail, 12);
      expect(Math.abs(vector.reduce((s, p) => s + p, 0) - 1)).toBeLessThan(1e-12);
    });

    test('rejects a negative rate', () => {
      expect(() => poissonVector(-0.1, 10)).toThrow('non-negative');
    });
  });

  describe('Distribution mass', () => {
    const cases: Array<[number, number, number, number]> = [
      [1.4, 1.1, 10, 0],
      [0, 0, 1, 0],
      [3.2, 0.4, 1, 0],
      [2.8, 2.6, 10, -0.13],
      [0.3, 0.2, 6, 0.1],
    ];

    test.each(cases)('lambda=(%p, %p) cutoff=%p rho=%p sums to 1', (home, away, cutoff, rho) => {
      const distribution = ScorelineDistribution.fromRates(home, away, cutoff, rho);
      expect(Math.abs(distribution.totalMass() - 1)).toBeLessThan(1e-9);
    });
  });

  describe('Low-score correlation', () => {
    test('rho = 0 reproduces the independent Poisson product in every cell', () => {
      const home = poissonVector(1.4, 10);
      const away = poissonVector(1.1, 10);
      const distribution = ScorelineDistribution.fromRates(1.4, 1.1, 10, 0);

      for (let h = 0; h <= 10; h++) {
        for (let a = 0; a <= 10; a++) {
          expect(distribution.residualProbability(h, a)).toBe(home[h] * away[a]);
        }
      }
    });

    test('tau factors for the four low-score cells', () => {
      expect(dixonColesTau(0, 0, 1.4, 1.1, -0.1)).toBeCloseTo(1.154, 12);
      expect(dixonColesTau(0, 1, 1.4, 1.1, -0.1)).toBeCloseTo(0.86, 12);
      expect(dixonColesTau(1, 0, 1.4, 1.1, -0.1)).toBeCloseTo(0.89, 12);
      expect(dixonColesTau(1, 1, 1.4, 1.1, -0.1)).toBeCloseTo(1.1, 12);
      expect(dixonColesTau(2, 1, 1.4, 1.1, -0.1)).toBe(1);
    });

    test('negative rho lifts 0-0 above independence and leaves 2-2 scaled only by renormalization', () => {
      const independent = buildResidualGrid(1.4, 1.1, 10, 0);
      const correlated = buildResidualGrid(1.4, 1.1, 10, -0.1);
      const total = independent.reduce((sum, row, h) =>
        sum + row.reduce((s, p, a) => s + p * dixonColesTau(h, a, 1.4, 1.1, -0.1), 0), 0);

      expect(correlated[0][0]).toBeGreaterThan(independent[0][0]);
      expect(correlated[0][0]).toBeCloseTo((independent[0][0] * 1.154) / total, 12);
      expect(correlated[2][2]).toBeCloseTo(independent[2][2] / total, 12);
    });
  });

  describe('Market sums from the grid', () => {
    test('over 2.5 from the independent grid equals the convolved total-goals tail', () => {
      // Sum of Poisson(1.4) and Poisson(1.1) is Poisson(2.5)
      const distribution = ScorelineDistribution.fromRates(1.4, 1.1, 10, 0);
      const over = distribution.probabilityWhere((h, a) => h + a > 2.5);
      const convolved = 1 - [0, 1, 2].reduce((sum, k) => sum + poissonPmf(k, 2.5), 0);

      expect(over).toBeCloseTo(convolved, 9);
    });
  });

  describe('Observed score offset', () => {
    test('shifts the residual grid by the current score', () => {
      const distribution = ScorelineDistribution.fromRates(0.5, 0.4, 10, 0, { home: 2, away: 1 });

      expect(distribution.probability(2, 1)).toBe(distribution.residualProbability(0, 0));
      expect(distribution.probability(3, 1)).toBe(distribution.residualProbability(1, 0));
      expect(distribution.probability(1, 1)).toBe(0);
      expect(distribution.mostLikelyScore()).toEqual({ home: 2, away: 1 });
    });
  });

  describe('Live adjustment', () => {
    const config = testConfig().model;

    test('rescales by remaining time and boosts the trailing side', () => {
      const rates = adjustRatesForLiveState({ home: 1.5, away: 1.2 }, { minute: 60, score: { home: 1, away: 0 } }, config);

      expect(rates.home).toBeCloseTo(0.5, 12);
      expect(rates.away).toBeCloseTo(0.46, 12);
    });

    test('linear fatigue past the threshold', () => {
      const rates = adjustRatesForLiveState({ home: 1.5, away: 1.2 }, { minute: 80, score: { home: 0, away: 0 } }, config);

      expect(fatigueFactor(80, config.fatigue)).toBeCloseTo(0.95, 12);
      expect(rates.home).toBeCloseTo(1.5 * (10 / 90) * 0.95, 12);
    });

    test('exponential fatigue past the threshold', () => {
      const fatigue = { ...config.fatigue, mode: 'exponential' as const };
      expect(fatigueFactor(80, fatigue)).toBeCloseTo(Math.exp(-0.05), 12);
      expect(fatigueFactor(70, fatigue)).toBe(1);
    });

    test('fatigue never increases with the minute', () => {
      for (const mode of ['linear', 'exponential'] as const) {
        const fatigue = { ...config.fatigue, mode, rate_per_minute: 0.03 };
        let previous = Infinity;
        for (let minute = 0; minute <= 120; minute += 5) {
          const factor = fatigueFactor(minute, fatigue);
          expect(factor).toBeLessThanOrEqual(previous);
          expect(factor).toBeGreaterThanOrEqual(0);
          previous = factor;
        }
      }
    });

    test('trailing boost is capped', () => {
      expect(trailingBoost(0, config.trailing_boost)).toBe(1);
      expect(trailingBoost(1, config.trailing_boost)).toBeCloseTo(1.15, 12);
      expect(trailingBoost(3, config.trailing_boost)).toBeCloseTo(1.3, 12);
    });

    test('full time leaves a point mass on the current score', () => {
      const rates = adjustRatesForLiveState({ home: 1.5, away: 1.2 }, { minute: 90, score: { home: 2, away: 1 } }, config);
      const distribution = ScorelineDistribution.fromRates(rates.home, rates.away, 10, -0.1, { home: 2, away: 1 });

      expect(rates).toEqual({ home: 0, away: 0 });
      expect(distribution.probability(2, 1)).toBe(1);
    });
  });

  describe('Rates from ratings', () => {
    test('attack x opponent defense x home advantage x league average', () => {
      const config = testConfig().model;
      const rates = baseGoalRates(rating('gor-mahia', 1.3, 0.8, 1.2), rating('afc-leopards', 1.1, 0.9), config);

      expect(rates.home).toBeCloseTo(1.35 * 1.3 * 0.9 * 1.2, 12);
      expect(rates.away).toBeCloseTo(1.35 * 1.1 * 0.8, 12);
    });

    test('missing rating falls back to league average and flags low confidence', () => {
      const store = new RatingStore(168);
      store.upsert(rating('gor-mahia', 1.3, 0.8, 1.2));
      const model = new ScorelineModel(testConfig().model, store);

      const output = model.evaluate(match, null, NOW);

      expect(output.lowConfidence).toBe(true);
      expect(output.lowConfidenceReasons).toEqual(['no rating for afc-leopards']);
      expect(output.baseRates.home).toBeCloseTo(1.35 * 1.3 * 1.2, 12);
      expect(output.baseRates.away).toBeCloseTo(1.35 * 0.8, 12);
    });

    test('stale rating is treated as missing', () => {
      const store = new RatingStore(168);
      const old = new Date(NOW.getTime() - 200 * 60 * 60 * 1000);
      store.upsert(rating('gor-mahia', 1.3, 0.8, 1.2, old));
      store.upsert(rating('afc-leopards', 1.1, 0.9));
      const model = new ScorelineModel(testConfig().model, store);

      const output = model.evaluate(match, null, NOW);

      expect(output.lowConfidence).toBe(true);
      expect(output.homeAdvantage).toBe(1.15);
      expect(output.baseRates.home).toBeCloseTo(1.35 * 1 * 0.9 * 1.15, 12);
    });

    test('fresh ratings with live state give a distribution anchored at the score', () => {
      const store = new RatingStore(168);
      store.upsert(rating('gor-mahia', 1.3, 0.8, 1.2));
      store.upsert(rating('afc-leopards', 1.1, 0.9));
      const model = new ScorelineModel(testConfig().model, store);

      const output = model.evaluate(match, { minute: 45, score: { home: 1, away: 1 } }, NOW);

      expect(output.lowConfidence).toBe(false);
      expect(output.residualRates.home).toBeCloseTo(output.baseRates.home / 2, 12);
      expect(output.distribution.probability(0, 0)).toBe(0);
      expect(Math.abs(output.distribution.totalMass() - 1)).toBeLessThan(1e-9);
    });
  });
});
