/**
 * Per-match pipeline: Model -> Market Evaluator -> Confidence Scorer -> Stake Sizer.
 * Pure and stateless per canonical match, so matches can be evaluated in parallel.
 */

import type {
  BestPrice,
  CanonicalMatchView,
  MarketProbability,
  MatchSummary,
  StakeRecommendation,
} from '../types';
import type { ScorelineModel } from '../model/scoreline-model';
import type { MarketEvaluator, SkippedMarket } from '../markets/market-evaluator';
import type { ConfidenceScorer } from '../scoring/confidence-scorer';
import type { StakeSizer } from '../staking/stake-sizer';

export interface EvaluatedCandidate {
  probability: MarketProbability;
  price: BestPrice;
  confidence: number;
  stake: StakeRecommendation | null;
}

export interface EvaluatedMatch {
  summary: MatchSummary;
  candidates: EvaluatedCandidate[];
  skippedMarkets: SkippedMarket[];
}

export interface MatchEvaluatorDeps {
  model: ScorelineModel;
  markets: MarketEvaluator;
  scorer: ConfidenceScorer;
  sizer: StakeSizer;
}

export class MatchEvaluator {
  private deps: MatchEvaluatorDeps;
  private verboseLogging: boolean;

  constructor(deps: MatchEvaluatorDeps) {
    this.deps = deps;
    this.verboseLogging = process.env.ENGINE_LOG_VERBOSE === 'true';
  }

  /**
   * Null when the match is outside the evaluation minute window
   */
  evaluate(view: CanonicalMatchView, now: Date): EvaluatedMatch | null {
    const { model, markets, scorer, sizer } = this.deps;
    const { match, liveState } = view;

    if (!markets.isMinuteInWindow(liveState?.minute ?? null)) {
      if (this.verboseLogging) {
        console.log(`[MODEL] ${match.matchId} skipped at minute ${liveState?.minute ?? 'pre-match'}`);
      }
      return null;
    }

    const output = model.evaluate(match, liveState, now);
    const { evaluations, skipped } = markets.evaluate(view, output.distribution);

    for (const entry of skipped) {
      console.log(`[MODEL] ${match.matchId} market ${entry.marketType} skipped (${entry.reason})`);
    }

    const scoring = {
      homeTeamId: match.normalizedHomeTeam,
      awayTeamId: match.normalizedAwayTeam,
      homeAdvantage: output.homeAdvantage,
      lowConfidence: output.lowConfidence,
      evaluations,
    };

    const candidates = markets.valueSelections(evaluations).map(({ probability, price }) => {
      const confidence = scorer.score(probability, scoring).score;
      const stake = sizer.size(probability.modelProbability, price.price, confidence);

      if (this.verboseLogging) {
        console.log(
          `[MODEL] ${match.matchId} ${probability.marketType}/${probability.selection} ` +
          `model=${probability.modelProbability.toFixed(4)} fair=${probability.fairImpliedProbability.toFixed(4)} ` +
          `edge=${probability.edge.toFixed(4)} confidence=${confidence.toFixed(1)} stake=${stake?.amount ?? '-'}`
        );
      }

      return { probability, price, confidence, stake };
    });

    const summary: MatchSummary = {
      matchId: match.matchId,
      homeTeam: match.normalizedHomeTeam,
      awayTeam: match.normalizedAwayTeam,
      competition: match.competition,
      kickoffTime: match.kickoffTime,
      minute: liveState?.minute ?? null,
      score: liveState ? { ...liveState.score } : null,
      expectedGoals: { ...output.residualRates },
      mostLikelyScore: output.distribution.mostLikelyScore(),
      lowConfidence: output.lowConfidence,
    };

    return { summary, candidates, skippedMarkets: skipped };
  }
}
