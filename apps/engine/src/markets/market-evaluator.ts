/**
 * Market Evaluator
 *
 * Derives market probabilities from a scoreline distribution, de-margins the best
 * available prices into fair implied probabilities and computes the value edge.
 */

import type { EvaluationConfig } from '../config/engine-config';
import type { BestPrice, CanonicalMatchView, MarketProbability } from '../types';
import type { ScorelineDistribution } from '../model/scoreline-distribution';
import { parseMarketKey, selectionsFor, type ParsedMarket, type Selection } from './market-keys';

export interface MarketEvaluation {
  market: ParsedMarket;
  overround: number; // sum of naive implied probabilities
  selections: Array<{ probability: MarketProbability; price: BestPrice }>;
}

export interface SkippedMarket {
  marketType: string;
  reason: 'unsupported' | 'incomplete';
}

/**
 * Model probability of every selection of a market
 */
export function marketProbabilities(
  distribution: ScorelineDistribution,
  market: ParsedMarket
): Map<Selection, number> {
  switch (market.kind) {
    case '1x2':
      return new Map<Selection, number>([
        ['home', distribution.probabilityWhere((h, a) => h > a)],
        ['draw', distribution.probabilityWhere((h, a) => h === a)],
        ['away', distribution.probabilityWhere((h, a) => h < a)],
      ]);

    case 'totals': {
      const { line } = market;
      return new Map<Selection, number>([
        ['over', distribution.probabilityWhere((h, a) => h + a > line)],
        ['under', distribution.probabilityWhere((h, a) => h + a < line)],
      ]);
    }

    case 'btts': {
      const homeBlank = distribution.homeMarginal().get(0) ?? 0;
      const awayBlank = distribution.awayMarginal().get(0) ?? 0;
      const bothBlank = distribution.probability(0, 0);
      const yes = 1 - homeBlank - awayBlank + bothBlank;
      return new Map<Selection, number>([
        ['yes', yes],
        ['no', 1 - yes],
      ]);
    }
  }
}

/**
 * Proportional de-margining: each naive 1/price divided by the market's naive sum
 */
export function demargin(prices: number[]): number[] {
  if (prices.length === 0 || prices.some(price => !(price > 1))) {
    throw new Error(`Prices must all be greater than 1 (got ${prices.join(', ')})`);
  }
  const naive = prices.map(price => 1 / price);
  const total = naive.reduce((sum, p) => sum + p, 0);
  return naive.map(p => p / total);
}

export class MarketEvaluator {
  private config: EvaluationConfig;

  constructor(config: EvaluationConfig) {
    this.config = config;
  }

  /**
   * Evaluate every complete market quoted for the match
   */
  evaluate(
    view: CanonicalMatchView,
    distribution: ScorelineDistribution
  ): { evaluations: MarketEvaluation[]; skipped: SkippedMarket[] } {
    const pricesByMarket = new Map<string, BestPrice[]>();
    for (const price of view.bestPrices) {
      pricesByMarket.set(price.marketType, [...(pricesByMarket.get(price.marketType) ?? []), price]);
    }

    const evaluations: MarketEvaluation[] = [];
    const skipped: SkippedMarket[] = [];

    for (const [marketType, prices] of [...pricesByMarket.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      const market = parseMarketKey(marketType);
      if (!market) {
        skipped.push({ marketType, reason: 'unsupported' });
        continue;
      }

      const ordered: BestPrice[] = [];
      for (const selection of selectionsFor(market)) {
        const price = prices.find(p => p.selection === selection);
        if (price) ordered.push(price);
      }
      if (ordered.length !== selectionsFor(market).length) {
        skipped.push({ marketType, reason: 'incomplete' });
        continue;
      }

      const modelProbabilities = marketProbabilities(distribution, market);
      const fair = demargin(ordered.map(p => p.price));
      const overround = ordered.reduce((sum, p) => sum + 1 / p.price, 0);

      evaluations.push({
        market,
        overround,
        selections: ordered.map((price, index) => {
          const modelProbability = modelProbabilities.get(price.selection) ?? 0;
          return {
            price,
            probability: {
              marketType: market.key,
              selection: price.selection,
              modelProbability,
              fairImpliedProbability: fair[index],
              edge: modelProbability - fair[index],
            },
          };
        }),
      });
    }

    return { evaluations, skipped };
  }

  /**
   * Selections with a strictly positive edge of at least min_edge, at a price inside the configured range
   */
  valueSelections(evaluations: MarketEvaluation[]): Array<{ probability: MarketProbability; price: BestPrice }> {
    return evaluations.flatMap(evaluation =>
      evaluation.selections.filter(({ probability, price }) =>
        probability.edge > 0 &&
        probability.edge >= this.config.min_edge &&
        price.price >= this.config.min_price &&
        price.price <= this.config.max_price
      )
    );
  }

  /**
   * Whether a match at this minute (null before kickoff) is inside the evaluation window
   */
  isMinuteInWindow(minute: number | null): boolean {
    const effective = minute ?? 0;
    return effective >= this.config.min_minute && effective <= this.config.max_minute;
  }
}
