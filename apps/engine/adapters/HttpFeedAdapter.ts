/**
 * HTTP Feed Source Adapter
 *
 * Fetches a JSON array of quotes from an acquisition service that exposes one source's
 * live odds over HTTP.
 */

import type { RawOddsQuote } from '../src/types';
import type { OddsSourceAdapter } from './OddsSourceAdapter';
import { parseQuoteRows } from './quote-parser';

export interface HttpFeedConfig {
  sourceId: string;
  url: string;
  /** Name of the environment variable holding the feed's API key, if it needs one */
  apiKeyEnv?: string;
}

export class HttpFeedAdapter implements OddsSourceAdapter {
  private sourceId: string;
  private url: string;
  private apiKey: string;

  constructor(config: HttpFeedConfig) {
    this.sourceId = config.sourceId;
    this.url = config.url;
    this.apiKey = config.apiKeyEnv ? process.env[config.apiKeyEnv] || '' : '';

    if (config.apiKeyEnv && !this.apiKey) {
      console.warn(`[SOURCE:${this.sourceId}] ${config.apiKeyEnv} is not set; requests go out without an API key`);
    }
  }

  getName(): string {
    return this.sourceId;
  }

  async isAvailable(): Promise<boolean> {
    return this.url.length > 0;
  }

  async fetchQuotes(signal: AbortSignal): Promise<RawOddsQuote[]> {
    const headers: Record<string, string> = { 'Accept': 'application/json' };
    if (this.apiKey) {
      headers['X-Api-Key'] = this.apiKey;
    }

    const response = await fetch(this.url, { method: 'GET', headers, signal });

    if (!response.ok) {
      const errorBody = await response.text();
      console.error(`[SOURCE:${this.sourceId}] ERROR ${response.status} ${response.statusText} for ${this.url}`);
      console.error(errorBody.slice(0, 800));
      throw new Error(`Feed error: ${response.status} ${response.statusText}`);
    }

    const data: unknown = await response.json();
    return parseQuoteRows(this.sourceId, data).quotes;
  }
}
