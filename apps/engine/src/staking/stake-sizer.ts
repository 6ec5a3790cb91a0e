/**
 * Stake Sizer
 *
 * Fractional Kelly bounded three ways: the Kelly max fraction, the confidence bracket's
 * [stake_min, stake_max], and the absolute per-bet cap.
 */

import type { StakeBracket, StakingConfig } from '../config/engine-config';
import type { StakeRecommendation } from '../types';

/**
 * Full Kelly fraction f* = (b*p - q) / b with b = price - 1, floored at 0
 */
export function kellyFraction(probability: number, price: number): number {
  const b = price - 1;
  if (!(b > 0)) return 0;
  const q = 1 - probability;
  return Math.max(0, (b * probability - q) / b);
}

/**
 * Bracket with the highest threshold at or below the confidence, if any
 */
export function selectBracket(brackets: StakeBracket[], confidence: number): StakeBracket | null {
  let selected: StakeBracket | null = null;
  for (const bracket of brackets) {
    if (confidence >= bracket.min_confidence) {
      selected = bracket;
    }
  }
  return selected;
}

function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export class StakeSizer {
  private config: StakingConfig;

  constructor(config: StakingConfig) {
    this.config = config;
  }

  /**
   * Stake for a selection, or null when Kelly finds no edge at this price or the
   * confidence sits below every bracket
   */
  size(modelProbability: number, price: number, confidence: number): StakeRecommendation | null {
    const fullKelly = kellyFraction(modelProbability, price);
    if (fullKelly <= 0) return null;

    const bracket = selectBracket(this.config.brackets, confidence);
    if (!bracket) return null;

    const fraction = Math.min(fullKelly * this.config.kelly_multiplier, this.config.kelly_max_fraction);
    const kellyStake = this.config.bankroll * fraction;
    const bracketed = Math.min(bracket.stake_max, Math.max(bracket.stake_min, kellyStake));
    const amount = roundCurrency(Math.min(bracketed, this.config.absolute_stake_cap));

    return {
      amount,
      currency: this.config.currency,
      kellyFractionUsed: fraction,
      bracketBounds: { min: bracket.stake_min, max: bracket.stake_max },
    };
  }
}
