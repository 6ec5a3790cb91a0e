/**
 * Confidence Scorer
 *
 * Weighted ensemble of five signals, each normalized to [0, 1]:
 * - edge magnitude: edge / edge_saturation
 * - cross-market agreement: 1 - mean |model - fair| / agreement_tolerance over the match's markets
 * - recent form and head-to-head, oriented to the selection
 * - home/away factor from the home side's advantage multiplier
 * The result is scaled to [0, 100]. Low-confidence model output is capped at a ceiling.
 */

import type { ConfidenceConfig, ConfidenceWeights } from '../config/engine-config';
import type { MarketProbability } from '../types';
import type { Selection } from '../markets/market-keys';
import type { MarketEvaluation } from '../markets/market-evaluator';
import type { TeamContextProvider } from '../ratings/rating-store';

export interface ConfidenceInputs {
  edgeMagnitude: number;
  crossMarketAgreement: number;
  recentForm: number;
  headToHead: number;
  homeAway: number;
}

export interface ScoringContext {
  homeTeamId: string;
  awayTeamId: string;
  homeAdvantage: number;
  lowConfidence: boolean;
  evaluations: MarketEvaluation[];
}

export interface ConfidenceResult {
  score: number;
  inputs: ConfidenceInputs;
  capped: boolean;
}

const NEUTRAL = 0.5;

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Weighted sum scaled to [0, 100] and clipped
 */
export function combineConfidence(inputs: ConfidenceInputs, weights: ConfidenceWeights): number {
  const combined =
    weights.edge_magnitude * clamp01(inputs.edgeMagnitude) +
    weights.cross_market_agreement * clamp01(inputs.crossMarketAgreement) +
    weights.recent_form * clamp01(inputs.recentForm) +
    weights.head_to_head * clamp01(inputs.headToHead) +
    weights.home_away * clamp01(inputs.homeAway);

  return Math.min(100, Math.max(0, combined * 100));
}

export function crossMarketAgreement(evaluations: MarketEvaluation[], tolerance: number): number {
  const gaps = evaluations.flatMap(evaluation =>
    evaluation.selections.map(({ probability }) =>
      Math.abs(probability.modelProbability - probability.fairImpliedProbability)
    )
  );
  if (gaps.length === 0) return NEUTRAL;
  const meanGap = gaps.reduce((sum, gap) => sum + gap, 0) / gaps.length;
  return clamp01(1 - meanGap / tolerance);
}

function orientFormSignal(selection: Selection, homeForm: number, awayForm: number): number {
  switch (selection) {
    case 'home':
      return homeForm;
    case 'away':
      return awayForm;
    case 'draw':
      return 1 - Math.abs(homeForm - awayForm);
    default:
      return (homeForm + awayForm) / 2;
  }
}

function orientHeadToHead(selection: Selection, homeDominance: number): number {
  switch (selection) {
    case 'home':
      return homeDominance;
    case 'away':
      return 1 - homeDominance;
    case 'draw':
      return 1 - Math.abs(2 * homeDominance - 1);
    default:
      return NEUTRAL;
  }
}

function homeAwayFactor(selection: Selection, homeAdvantage: number): number {
  if (selection === 'home') return clamp01(NEUTRAL + (homeAdvantage - 1));
  if (selection === 'away') return clamp01(NEUTRAL - (homeAdvantage - 1));
  return NEUTRAL;
}

export class ConfidenceScorer {
  private config: ConfidenceConfig;
  private context: TeamContextProvider;

  constructor(config: ConfidenceConfig, context: TeamContextProvider) {
    this.config = config;
    this.context = context;
  }

  inputsFor(probability: MarketProbability, scoring: ScoringContext): ConfidenceInputs {
    const homeForm = this.context.recentForm(scoring.homeTeamId) ?? NEUTRAL;
    const awayForm = this.context.recentForm(scoring.awayTeamId) ?? NEUTRAL;
    const dominance = this.context.headToHead(scoring.homeTeamId, scoring.awayTeamId) ?? NEUTRAL;

    return {
      edgeMagnitude: clamp01(probability.edge / this.config.edge_saturation),
      crossMarketAgreement: crossMarketAgreement(scoring.evaluations, this.config.agreement_tolerance),
      recentForm: orientFormSignal(probability.selection, homeForm, awayForm),
      headToHead: orientHeadToHead(probability.selection, dominance),
      homeAway: homeAwayFactor(probability.selection, scoring.homeAdvantage),
    };
  }

  score(probability: MarketProbability, scoring: ScoringContext): ConfidenceResult {
    const inputs = this.inputsFor(probability, scoring);
    const raw = combineConfidence(inputs, this.config.weights);

    if (scoring.lowConfidence && raw > this.config.low_confidence_ceiling) {
      return { score: this.config.low_confidence_ceiling, inputs, capped: true };
    }
    return { score: raw, inputs, capped: false };
  }
}
