import type { CanonicalMatchView } from '../types';
import { positionKey } from '../types';
import type { PriceLookup } from '../gate/safety-gate';

/**
 * Latest best price per (match, market, selection), replaced wholesale by each current cycle
 */
export class PriceBook implements PriceLookup {
  private prices: Map<string, number> = new Map();

  update(views: CanonicalMatchView[]): void {
    const next = new Map<string, number>();
    for (const view of views) {
      for (const price of view.bestPrices) {
        next.set(positionKey(view.match.matchId, price.marketType, price.selection), price.price);
      }
    }
    this.prices = next;
  }

  currentPrice(matchId: string, marketType: string, selection: string): number | null {
    return this.prices.get(positionKey(matchId, marketType, selection)) ?? null;
  }
}
