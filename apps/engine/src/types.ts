/**
 * Engine Domain Types
 *
 * Records exchanged between the source collaborators, the aggregator and the
 * decision pipeline. Quotes and canonical matches live for one refresh cycle only.
 */

import type { MarketKey, Selection } from './markets/market-keys';

export interface LiveScore {
  home: number;
  away: number;
}

/**
 * Fixture as described by one source. Names and kickoff are the source's own and
 * are only trusted after team-name normalization.
 */
export interface SourceFixture {
  sourceEventId: string;
  homeTeam: string;
  awayTeam: string;
  competition: string;
  kickoffTime: Date;
}

/**
 * Quote as produced by a source collaborator, before canonical identity is known
 */
export interface RawOddsQuote {
  sourceId: string;
  fixture: SourceFixture;
  marketType: string;
  selection: string;
  price: number; // decimal odds
  observedAt: Date;
  matchMinute: number | null; // null before kickoff
  liveScore: LiveScore | null;
}

export interface OddsQuote {
  readonly sourceId: string;
  readonly canonicalMatchId: string;
  readonly marketType: MarketKey;
  readonly selection: Selection;
  readonly price: number;
  readonly observedAt: Date;
  readonly matchMinute: number | null;
  readonly liveScore: LiveScore | null;
}

export interface CanonicalMatch {
  matchId: string;
  normalizedHomeTeam: string;
  normalizedAwayTeam: string;
  competition: string;
  kickoffTime: Date;
}

export interface LiveState {
  minute: number;
  score: LiveScore;
}

export interface BestPrice {
  marketType: MarketKey;
  selection: Selection;
  price: number;
  sourceId: string;
  observedAt: Date;
}

/**
 * One deduplicated, best-priced view of a fixture for a single cycle
 */
export interface CanonicalMatchView {
  match: CanonicalMatch;
  liveState: LiveState | null;
  sourceIds: string[];
  bestPrices: BestPrice[];
}

export interface TeamRating {
  teamId: string;
  attackStrength: number;
  defenseStrength: number;
  homeAdvantage: number;
  lastUpdated: Date;
}

export interface MarketProbability {
  marketType: MarketKey;
  selection: Selection;
  modelProbability: number;
  fairImpliedProbability: number;
  edge: number;
}

export interface StakeRecommendation {
  amount: number;
  currency: string;
  kellyFractionUsed: number;
  bracketBounds: { min: number; max: number };
}

export type GateReasonCode =
  | 'CONFIDENCE_BELOW_THRESHOLD'
  | 'DAILY_LOSS_LIMIT_REACHED'
  | 'STALE_SNAPSHOT'
  | 'DUPLICATE_POSITION'
  | 'PRICE_MOVED';

export type DecisionReasonCode = GateReasonCode | 'NO_STAKE' | 'SUPERSEDED';

export type GateDecision =
  | { outcome: 'Approved'; timestamp: Date; executionNote?: string }
  | { outcome: 'Rejected'; reasonCode: DecisionReasonCode; timestamp: Date; detail?: string };

export type BetSettlementStatus = 'open' | 'won' | 'lost' | 'void';

export interface BetRecord {
  betId: string;
  matchId: string;
  marketType: MarketKey;
  selection: Selection;
  stake: number;
  price: number;
  placedAt: Date;
  status: BetSettlementStatus;
  pnl: number | null;
  settledAt: Date | null;
}

export interface MatchSummary {
  matchId: string;
  homeTeam: string;
  awayTeam: string;
  competition: string;
  kickoffTime: Date;
  minute: number | null;
  score: LiveScore | null;
  expectedGoals: { home: number; away: number };
  mostLikelyScore: LiveScore;
  lowConfidence: boolean;
}

export interface RecommendationRecord {
  match: MatchSummary;
  marketType: MarketKey;
  selection: Selection;
  price: number;
  sourceId: string;
  modelProbability: number;
  fairImpliedProbability: number;
  edge: number;
  confidence: number;
  stake: StakeRecommendation | null;
  decision: GateDecision;
}

export interface OpenPosition {
  matchId: string;
  marketType: MarketKey;
  selection: Selection;
}

export interface ExecutionIntent {
  matchId: string;
  marketType: MarketKey;
  selection: Selection;
  price: number;
  sourceId: string;
  stake: StakeRecommendation;
  confidence: number;
  createdAt: Date;
}

/**
 * Position identity used for duplicate detection against open bets
 */
export function positionKey(matchId: string, marketType: string, selection: string): string {
  return `${matchId}::${marketType}::${selection}`;
}
