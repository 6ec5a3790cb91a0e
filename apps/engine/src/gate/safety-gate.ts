/**
 * Safety Gate
 *
 * Ordered, short-circuiting checklist:
 *   1. confidence >= auto-act threshold
 *   2. realized loss (+ reserved exposure) < daily loss limit
 *   3. snapshot no older than the staleness tolerance
 *   4. no open position on (match, market, selection)
 *   5. current best price within tolerance of the price used for the edge
 * Checks 2-5 and the approval reservation run as one critical section, serialized across
 * overlapping cycles by the position ledger.
 */

import type { GateConfig } from '../config/engine-config';
import type { ExecutionIntent, GateDecision, GateReasonCode } from '../types';
import { positionKey } from '../types';
import { ageInSeconds } from '../../lib/time';
import type { BankrollContext } from './bankroll-context';
import type { Reservation } from './position-ledger';

export interface PriceLookup {
  currentPrice(matchId: string, marketType: string, selection: string): number | null;
}

export interface GateRequest {
  intent: ExecutionIntent;
  snapshotObservedAt: Date;
}

export interface GateResult {
  decision: GateDecision;
  reservation: Reservation | null;
}

export class SafetyGate {
  private config: GateConfig;
  private prices: PriceLookup;
  private clock: () => Date;

  constructor(config: GateConfig, prices: PriceLookup, clock: () => Date = () => new Date()) {
    this.config = config;
    this.prices = prices;
    this.clock = clock;
  }

  async evaluate(request: GateRequest, context: BankrollContext): Promise<GateResult> {
    const { intent } = request;
    const label = `${intent.matchId} ${intent.marketType}/${intent.selection}`;

    if (intent.confidence < this.config.auto_act_threshold) {
      return this.reject(
        label,
        'CONFIDENCE_BELOW_THRESHOLD',
        `confidence ${intent.confidence.toFixed(1)} < ${this.config.auto_act_threshold}`
      );
    }

    return context.runExclusive(() => {
      if (!context.withinLossLimit()) {
        return this.reject(
          label,
          'DAILY_LOSS_LIMIT_REACHED',
          `realized loss ${context.realizedLoss} + reserved ${context.reservedExposure} >= ${context.dailyLossLimit}`
        );
      }

      const now = this.clock();
      const age = ageInSeconds(now, request.snapshotObservedAt);
      if (age > this.config.snapshot_max_age_seconds) {
        return this.reject(label, 'STALE_SNAPSHOT', `snapshot is ${age.toFixed(0)}s old`);
      }

      const key = positionKey(intent.matchId, intent.marketType, intent.selection);
      if (context.hasPosition(key)) {
        return this.reject(label, 'DUPLICATE_POSITION', 'position already open');
      }

      const current = this.prices.currentPrice(intent.matchId, intent.marketType, intent.selection);
      if (current === null) {
        return this.reject(label, 'PRICE_MOVED', 'selection no longer quoted');
      }
      const movement = Math.abs(current - intent.price) / intent.price;
      if (movement > this.config.price_movement_tolerance) {
        return this.reject(label, 'PRICE_MOVED', `price moved ${intent.price} -> ${current}`);
      }

      const reservation = context.reserve(key, intent.stake.amount);
      console.log(`[GATE] APPROVED ${label} stake ${intent.stake.amount} ${intent.stake.currency} @ ${intent.price}`);
      const decision: GateDecision = { outcome: 'Approved', timestamp: now };
      return { decision, reservation };
    });
  }

  private reject(label: string, reasonCode: GateReasonCode, detail: string): GateResult {
    console.log(`[GATE] REJECTED ${label}: ${reasonCode} (${detail})`);
    return {
      decision: { outcome: 'Rejected', reasonCode, timestamp: this.clock(), detail },
      reservation: null,
    };
  }
}
