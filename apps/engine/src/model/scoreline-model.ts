/**
 * Scoreline Probability Model
 *
 * Pure function of (ratings, match state, configuration) to a final-score distribution.
 * Nothing is cached across cycles.
 */

import type { ModelConfig } from '../config/engine-config';
import type { CanonicalMatch, LiveState, TeamRating } from '../types';
import type { RatingsProvider } from '../ratings/rating-store';
import { adjustRatesForLiveState, type GoalRates } from './live-adjustment';
import { ScorelineDistribution } from './scoreline-distribution';

export interface ModelOutput {
  distribution: ScorelineDistribution;
  baseRates: GoalRates;
  residualRates: GoalRates;
  homeAdvantage: number;
  lowConfidence: boolean;
  lowConfidenceReasons: string[];
}

/**
 * Pre-match expected goals:
 *   home = avg x attack(home) x defense(away) x home advantage(home)
 *   away = avg x attack(away) x defense(home)
 * A missing rating counts as league average (1.0) with the default home advantage.
 */
export function baseGoalRates(home: TeamRating | null, away: TeamRating | null, config: ModelConfig): GoalRates {
  const avg = config.league_average_goals;
  const homeAdvantage = home?.homeAdvantage ?? config.default_home_advantage;

  return {
    home: avg * (home?.attackStrength ?? 1) * (away?.defenseStrength ?? 1) * homeAdvantage,
    away: avg * (away?.attackStrength ?? 1) * (home?.defenseStrength ?? 1),
  };
}

export class ScorelineModel {
  private config: ModelConfig;
  private ratings: RatingsProvider;

  constructor(config: ModelConfig, ratings: RatingsProvider) {
    this.config = config;
    this.ratings = ratings;
  }

  evaluate(match: CanonicalMatch, liveState: LiveState | null, now: Date): ModelOutput {
    const reasons: string[] = [];
    const home = this.usableRating(match.normalizedHomeTeam, now, reasons);
    const away = this.usableRating(match.normalizedAwayTeam, now, reasons);

    const baseRates = baseGoalRates(home, away, this.config);
    const residualRates = adjustRatesForLiveState(baseRates, liveState, this.config);
    const distribution = ScorelineDistribution.fromRates(
      residualRates.home,
      residualRates.away,
      this.config.scoreline_cutoff,
      this.config.rho,
      liveState?.score
    );

    if (reasons.length > 0) {
      console.warn(`[MODEL] ${match.matchId} using league-average priors: ${reasons.join('; ')}`);
    }

    return {
      distribution,
      baseRates,
      residualRates,
      homeAdvantage: home?.homeAdvantage ?? this.config.default_home_advantage,
      lowConfidence: reasons.length > 0,
      lowConfidenceReasons: reasons,
    };
  }

  private usableRating(teamId: string, now: Date, reasons: string[]): TeamRating | null {
    const rating = this.ratings.getRating(teamId);
    if (!rating) {
      reasons.push(`no rating for ${teamId}`);
      return null;
    }
    if (!this.ratings.isFresh(rating, now)) {
      reasons.push(`stale rating for ${teamId} (updated ${rating.lastUpdated.toISOString()})`);
      return null;
    }
    return rating;
  }
}
