/**
 * Live-state rate adjustment
 *
 * Pre-match rates are rescaled to the goals still to come:
 *   residual = base x remaining fraction x fatigue(minute) x trailing boost
 * Fatigue is either linear, max(0, 1 - rate x (minute - threshold)), or exponential,
 * exp(-rate x (minute - threshold)); both are non-increasing in minute.
 */

import type { ModelConfig } from '../config/engine-config';
import type { LiveState } from '../types';

export interface GoalRates {
  home: number;
  away: number;
}

export function remainingFraction(minute: number, matchLengthMinutes: number): number {
  return Math.max(0, Math.min(1, (matchLengthMinutes - minute) / matchLengthMinutes));
}

export function fatigueFactor(minute: number, fatigue: ModelConfig['fatigue']): number {
  const pastThreshold = minute - fatigue.threshold_minute;
  if (pastThreshold <= 0) return 1;

  if (fatigue.mode === 'exponential') {
    return Math.exp(-fatigue.rate_per_minute * pastThreshold);
  }
  return Math.max(0, 1 - fatigue.rate_per_minute * pastThreshold);
}

/**
 * Multiplier for a side that is behind by `deficit` goals
 */
export function trailingBoost(deficit: number, boost: ModelConfig['trailing_boost']): number {
  if (deficit <= 0) return 1;
  return 1 + Math.min(boost.cap, deficit * boost.per_goal);
}

export function adjustRatesForLiveState(base: GoalRates, liveState: LiveState | null, config: ModelConfig): GoalRates {
  if (!liveState) return { ...base };

  const { minute, score } = liveState;
  const timeScale = remainingFraction(minute, config.match_length_minutes) * fatigueFactor(minute, config.fatigue);

  return {
    home: base.home * timeScale * trailingBoost(score.away - score.home, config.trailing_boost),
    away: base.away * timeScale * trailingBoost(score.home - score.away, config.trailing_boost),
  };
}
