/**
 * File Replay Source Adapter
 *
 * Reads quote snapshots from a local JSON file in data/replay/.
 * Used for development, replays and tests without external feed dependencies.
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import type { RawOddsQuote } from '../src/types';
import type { OddsSourceAdapter } from './OddsSourceAdapter';
import { parseQuoteRows } from './quote-parser';

export interface FileReplayConfig {
  sourceId: string;
  path: string;
  /** Shift every timestamp so the newest quote was observed "now" */
  rebaseToNow?: boolean;
}

export class FileReplayAdapter implements OddsSourceAdapter {
  private sourceId: string;
  private filePath: string;
  private rebaseToNow: boolean;
  private clock: () => Date;

  constructor(config: FileReplayConfig, clock: () => Date = () => new Date()) {
    this.sourceId = config.sourceId;
    this.filePath = config.path;
    this.rebaseToNow = config.rebaseToNow ?? false;
    this.clock = clock;
  }

  getName(): string {
    return this.sourceId;
  }

  async isAvailable(): Promise<boolean> {
    return existsSync(this.filePath);
  }

  async fetchQuotes(signal: AbortSignal): Promise<RawOddsQuote[]> {
    if (!existsSync(this.filePath)) {
      throw new Error(`Replay file not found: ${this.filePath}`);
    }

    const content = await fs.readFile(this.filePath, { encoding: 'utf8', signal });
    const { quotes } = parseQuoteRows(this.sourceId, JSON.parse(content));

    if (!this.rebaseToNow || quotes.length === 0) {
      return quotes;
    }

    const newest = Math.max(...quotes.map(q => q.observedAt.getTime()));
    const offset = this.clock().getTime() - newest;

    // Kickoff moves with the quotes so fixture identity stays consistent
    return quotes.map(quote => ({
      ...quote,
      fixture: { ...quote.fixture, kickoffTime: new Date(quote.fixture.kickoffTime.getTime() + offset) },
      observedAt: new Date(quote.observedAt.getTime() + offset),
    }));
  }
}
