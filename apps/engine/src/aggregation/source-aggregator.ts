/**
 * Source Aggregator
 *
 * Merges one cycle's quotes from every source into one deduplicated, best-priced view
 * per canonical match. Pure: it never touches the history store.
 */

import type { AggregationConfig } from '../config/engine-config';
import type { BestPrice, CanonicalMatchView, LiveState, OddsQuote, RawOddsQuote } from '../types';
import type { TeamNameResolver } from '../../adapters/TeamResolver';
import { isSelectionOf, parseMarketKey, parseSelection } from '../markets/market-keys';
import { ageInSeconds } from '../../lib/time';
import {
  canonicalMatchId,
  clusterFixtures,
  fixtureKey,
  type FixtureCluster,
  type NormalizedFixture,
} from './match-identity';

export type ExclusionReason = 'ambiguous' | 'suspect' | 'id_collision';

export interface ExcludedMatch {
  matchId: string;
  reason: ExclusionReason;
  detail: string;
}

export interface AggregationResult {
  views: CanonicalMatchView[];
  excluded: ExcludedMatch[];
  staleDropped: number;
  unsupportedDropped: number;
}

interface PendingQuote {
  fixture: NormalizedFixture;
  quote: Omit<OddsQuote, 'canonicalMatchId'>;
}

export class SourceAggregator {
  private config: AggregationConfig;
  private resolver: TeamNameResolver;
  private verboseLogging: boolean;

  constructor(config: AggregationConfig, resolver: TeamNameResolver) {
    this.config = config;
    this.resolver = resolver;
    this.verboseLogging = process.env.ENGINE_LOG_VERBOSE === 'true';
  }

  aggregate(rawQuotes: RawOddsQuote[], now: Date): AggregationResult {
    let staleDropped = 0;
    let unsupportedDropped = 0;
    const pending: PendingQuote[] = [];
    const fixtures = new Map<string, NormalizedFixture>();

    for (const raw of rawQuotes) {
      if (ageInSeconds(now, raw.observedAt) > this.config.snapshot_staleness_seconds) {
        staleDropped++;
        continue;
      }

      const market = parseMarketKey(raw.marketType);
      const selection = parseSelection(raw.selection);
      if (!market || !selection || !isSelectionOf(market, selection) || !(raw.price > 1)) {
        unsupportedDropped++;
        if (this.verboseLogging) {
          console.log(`[AGGREGATOR] Unsupported quote from ${raw.sourceId}: ${raw.marketType}/${raw.selection} @ ${raw.price}`);
        }
        continue;
      }

      const key = fixtureKey(raw.sourceId, raw.fixture.sourceEventId);
      let fixture = fixtures.get(key);
      if (!fixture) {
        fixture = {
          sourceId: raw.sourceId,
          sourceEventId: raw.fixture.sourceEventId,
          homeTeamId: this.resolver.resolveTeam(raw.fixture.homeTeam),
          awayTeamId: this.resolver.resolveTeam(raw.fixture.awayTeam),
          competition: raw.fixture.competition,
          kickoffTime: raw.fixture.kickoffTime,
        };
        fixtures.set(key, fixture);
      }

      pending.push({
        fixture,
        quote: {
          sourceId: raw.sourceId,
          marketType: market.key,
          selection,
          price: raw.price,
          observedAt: raw.observedAt,
          matchMinute: raw.matchMinute,
          liveScore: raw.liveScore,
        },
      });
    }

    if (staleDropped > 0) {
      console.log(`[AGGREGATOR] Dropped ${staleDropped} stale quotes (older than ${this.config.snapshot_staleness_seconds}s)`);
    }

    const toleranceMs = this.config.match_time_tolerance_minutes * 60 * 1000;
    const clusters = clusterFixtures([...fixtures.values()], toleranceMs);

    const clusterByFixture = new Map<NormalizedFixture, FixtureCluster>();
    for (const cluster of clusters) {
      for (const member of cluster.members) {
        clusterByFixture.set(member, cluster);
      }
    }

    const clustersById = new Map<string, FixtureCluster[]>();
    for (const cluster of clusters) {
      const id = canonicalMatchId(cluster.homeTeamId, cluster.awayTeamId, cluster.anchorKickoff);
      clustersById.set(id, [...(clustersById.get(id) ?? []), cluster]);
    }

    const quotesByCluster = new Map<FixtureCluster, PendingQuote[]>();
    for (const entry of pending) {
      const cluster = clusterByFixture.get(entry.fixture);
      if (!cluster) continue; // fixture was ambiguous and joined no cluster
      quotesByCluster.set(cluster, [...(quotesByCluster.get(cluster) ?? []), entry]);
    }

    const views: CanonicalMatchView[] = [];
    const excluded: ExcludedMatch[] = [];

    for (const [matchId, group] of [...clustersById.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      const ambiguous = group.find(cluster => cluster.ambiguous);
      if (ambiguous) {
        excluded.push({ matchId, reason: 'ambiguous', detail: ambiguous.ambiguityDetail ?? 'multiple candidate fixtures' });
        continue;
      }
      if (group.length > 1) {
        excluded.push({ matchId, reason: 'id_collision', detail: `${group.length} fixtures share this id` });
        continue;
      }

      const cluster = group[0];
      const quotes = (quotesByCluster.get(cluster) ?? []).map(entry => ({ ...entry.quote, canonicalMatchId: matchId }));
      const best = this.selectBestPrices(quotes);

      if (best.kind === 'Suspect') {
        excluded.push({ matchId, reason: 'suspect', detail: best.detail });
        continue;
      }

      views.push({
        match: {
          matchId,
          normalizedHomeTeam: cluster.homeTeamId,
          normalizedAwayTeam: cluster.awayTeamId,
          competition: cluster.competition,
          kickoffTime: cluster.anchorKickoff,
        },
        liveState: this.latestLiveState(quotes),
        sourceIds: [...new Set(quotes.map(q => q.sourceId))].sort(),
        bestPrices: best.prices,
      });
    }

    for (const entry of excluded) {
      console.warn(`[AGGREGATOR] Excluded ${entry.matchId} (${entry.reason}): ${entry.detail}`);
    }

    return { views, excluded, staleDropped, unsupportedDropped };
  }

  /**
   * Newest quote per (source, market, selection), then the highest price per
   * (market, selection) unless sources disagree beyond the discrepancy tolerance
   */
  private selectBestPrices(
    quotes: OddsQuote[]
  ): { kind: 'Ok'; prices: BestPrice[] } | { kind: 'Suspect'; detail: string } {
    const newest = new Map<string, OddsQuote>();
    for (const quote of quotes) {
      const key = `${quote.sourceId}|${quote.marketType}|${quote.selection}`;
      const current = newest.get(key);
      if (!current || quote.observedAt.getTime() > current.observedAt.getTime()) {
        newest.set(key, quote);
      }
    }

    const bySelection = new Map<string, OddsQuote[]>();
    for (const quote of [...newest.values()].sort((a, b) => a.sourceId.localeCompare(b.sourceId))) {
      const key = `${quote.marketType}|${quote.selection}`;
      bySelection.set(key, [...(bySelection.get(key) ?? []), quote]);
    }

    const prices: BestPrice[] = [];
    for (const [key, group] of bySelection) {
      const low = Math.min(...group.map(q => q.price));
      const high = Math.max(...group.map(q => q.price));
      const divergence = (high - low) / low;
      if (divergence > this.config.price_discrepancy_tolerance) {
        return {
          kind: 'Suspect',
          detail: `${key} prices diverge by ${(divergence * 100).toFixed(1)}% (${low} vs ${high})`,
        };
      }

      const best = group.reduce((winner, quote) => (quote.price > winner.price ? quote : winner));
      prices.push({
        marketType: best.marketType,
        selection: best.selection,
        price: best.price,
        sourceId: best.sourceId,
        observedAt: best.observedAt,
      });
    }

    return { kind: 'Ok', prices };
  }

  /**
   * From the newest quote that carries both minute and score; sources without a live
   * feed do not blank it out
   */
  private latestLiveState(quotes: OddsQuote[]): LiveState | null {
    let latest: LiveState | null = null;
    let latestAt = -Infinity;
    for (const quote of quotes) {
      if (quote.matchMinute === null || quote.liveScore === null) continue;
      if (quote.observedAt.getTime() > latestAt) {
        latestAt = quote.observedAt.getTime();
        latest = { minute: quote.matchMinute, score: { ...quote.liveScore } };
      }
    }
    return latest;
  }
}
