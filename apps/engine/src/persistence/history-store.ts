/**
 * History Store
 *
 * The engine's narrow contract with the persistence collaborator. The store is ground
 * truth for open positions and realized P&L; the engine never re-derives history.
 */

import type { BetRecord, OpenPosition } from '../types';

export interface HistoryStore {
  recordBet(bet: BetRecord): Promise<void>;
  queryOpenPositions(matchId?: string): Promise<OpenPosition[]>;
  /** Sum of P&L of bets settled at or after `since` (losses negative) */
  queryRealizedPnl(since: Date): Promise<number>;
}

export type SettlementOutcome = 'won' | 'lost' | 'void';

/**
 * In-process store for replay runs and tests
 */
export class InMemoryHistoryStore implements HistoryStore {
  private bets: Map<string, BetRecord> = new Map();

  constructor(initial: BetRecord[] = []) {
    for (const bet of initial) {
      this.bets.set(bet.betId, { ...bet });
    }
  }

  async recordBet(bet: BetRecord): Promise<void> {
    if (this.bets.has(bet.betId)) {
      throw new Error(`Bet ${bet.betId} is already recorded`);
    }
    this.bets.set(bet.betId, { ...bet });
  }

  async queryOpenPositions(matchId?: string): Promise<OpenPosition[]> {
    return [...this.bets.values()]
      .filter(bet => bet.status === 'open' && (matchId === undefined || bet.matchId === matchId))
      .map(({ matchId: id, marketType, selection }) => ({ matchId: id, marketType, selection }));
  }

  async queryRealizedPnl(since: Date): Promise<number> {
    let total = 0;
    for (const bet of this.bets.values()) {
      if (bet.status === 'open' || bet.pnl === null || !bet.settledAt) continue;
      if (bet.settledAt.getTime() >= since.getTime()) {
        total += bet.pnl;
      }
    }
    return total;
  }

  /**
   * Settle an open bet: won pays stake x (price - 1), lost costs the stake, void returns it
   */
  settle(betId: string, outcome: SettlementOutcome, settledAt: Date = new Date()): BetRecord {
    const bet = this.bets.get(betId);
    if (!bet) {
      throw new Error(`Bet ${betId} not found`);
    }
    if (bet.status !== 'open') {
      throw new Error(`Bet ${betId} is already settled (${bet.status})`);
    }

    const pnl = outcome === 'won' ? bet.stake * (bet.price - 1) : outcome === 'lost' ? -bet.stake : 0;
    const settled: BetRecord = { ...bet, status: outcome, pnl, settledAt };
    this.bets.set(betId, settled);
    return settled;
  }

  list(): BetRecord[] {
    return [...this.bets.values()].map(bet => ({ ...bet }));
  }
}
