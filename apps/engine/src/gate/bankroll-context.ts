/**
 * Bankroll Context
 *
 * One consistent view of bankroll and history state per refresh cycle: realized loss
 * since the UTC start of day and open positions from the history store, plus the
 * engine's position ledger (approvals of this and any overlapping cycle still in flight).
 * Mutated only inside runExclusive.
 */

import type { HistoryStore } from '../persistence/history-store';
import { positionKey } from '../types';
import { startOfUtcDay } from '../../lib/time';
import { PositionLedger, type Reservation } from './position-ledger';

export class BankrollContext {
  readonly realizedLoss: number;
  readonly dailyLossLimit: number;
  private positions: Set<string>;
  private ledger: PositionLedger;
  private confirmed = 0; // stakes this cycle approved that are now recorded bets

  constructor(params: {
    realizedPnl: number;
    openPositionKeys: Iterable<string>;
    dailyLossLimit: number;
    ledger?: PositionLedger;
  }) {
    this.realizedLoss = Math.max(0, -params.realizedPnl);
    this.dailyLossLimit = params.dailyLossLimit;
    this.positions = new Set(params.openPositionKeys);
    this.ledger = params.ledger ?? new PositionLedger();
  }

  static async open(
    history: HistoryStore,
    dailyLossLimit: number,
    now: Date,
    ledger?: PositionLedger
  ): Promise<BankrollContext> {
    const [realizedPnl, openPositions] = await Promise.all([
      history.queryRealizedPnl(startOfUtcDay(now)),
      history.queryOpenPositions(),
    ]);

    return new BankrollContext({
      realizedPnl,
      openPositionKeys: openPositions.map(p => positionKey(p.matchId, p.marketType, p.selection)),
      dailyLossLimit,
      ledger,
    });
  }

  /**
   * In-flight approvals of every cycle plus this cycle's recorded approvals
   */
  get reservedExposure(): number {
    return this.ledger.inFlightExposure + this.confirmed;
  }

  /**
   * Realized loss plus reserved exposure, strictly below the limit
   */
  withinLossLimit(): boolean {
    return this.realizedLoss + this.reservedExposure < this.dailyLossLimit;
  }

  hasPosition(key: string): boolean {
    return this.positions.has(key) || this.ledger.hasPosition(key);
  }

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    return this.ledger.runExclusive(task);
  }

  /**
   * Call inside runExclusive, after the checks pass
   */
  reserve(key: string, amount: number): Reservation {
    return this.ledger.reserve(key, amount);
  }

  /**
   * The approved bet has been written to the history store
   */
  confirm(reservation: Reservation): Promise<void> {
    return this.runExclusive(() => {
      if (this.ledger.confirm(reservation)) {
        this.confirmed += reservation.amount;
      }
    });
  }

  /**
   * Undo a reservation whose intent the execution collaborator did not accept
   */
  release(reservation: Reservation): Promise<void> {
    return this.runExclusive(() => {
      this.ledger.release(reservation);
    });
  }
}
