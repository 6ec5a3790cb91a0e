/**
 * Odds Source Adapter Interface
 *
 * Defines the contract for source collaborators that supply live odds quotes.
 * How a source acquires its prices is its own concern; the engine only sees quotes.
 */

import type { RawOddsQuote } from '../src/types';

export interface OddsSourceAdapter {
  /**
   * Source id used in quotes and cycle reports
   */
  getName(): string;

  /**
   * Whether the source can be used; unavailable sources are left out at startup
   */
  isAvailable(): Promise<boolean>;

  /**
   * Fetch the source's current quotes. Implementations stop work when the signal aborts.
   */
  fetchQuotes(signal: AbortSignal): Promise<RawOddsQuote[]>;
}

export interface AdapterConfig {
  provider: string;
  enabled: boolean;
  config: Record<string, unknown>;
}

export interface SourcesConfig {
  sources: Record<string, AdapterConfig>;
}
