/**
 * Raw Quote Parser
 *
 * Validates source rows field by field. Rows that fail validation are skipped and
 * counted, never guessed at.
 *
 * Row shape (JSON):
 *   { eventId, homeTeam, awayTeam, competition, kickoff, market, selection, price,
 *     observedAt, minute?, score?: { home, away } }
 */

import type { LiveScore, RawOddsQuote } from '../src/types';
import { toDate } from '../lib/time';

export interface ParsedQuotes {
  quotes: RawOddsQuote[];
  skipped: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  if (typeof value === 'number') return String(value);
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

function goals(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : null;
}

function parseScore(value: unknown): LiveScore | null | undefined {
  if (value === undefined || value === null) return null;
  if (!isRecord(value)) return undefined;
  const home = goals(value.home);
  const away = goals(value.away);
  return home === null || away === null ? undefined : { home, away };
}

function parseMinute(value: unknown): number | null | undefined {
  if (value === undefined || value === null) return null;
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined;
}

export function parseQuoteRow(sourceId: string, row: unknown): RawOddsQuote | null {
  if (!isRecord(row)) return null;

  const sourceEventId = nonEmptyString(row.eventId);
  const homeTeam = nonEmptyString(row.homeTeam);
  const awayTeam = nonEmptyString(row.awayTeam);
  const marketType = nonEmptyString(row.market);
  const selection = nonEmptyString(row.selection);
  const kickoffTime = toDate(row.kickoff);
  const observedAt = toDate(row.observedAt);
  const price = typeof row.price === 'number' ? row.price : Number(row.price);
  const matchMinute = parseMinute(row.minute);
  const liveScore = parseScore(row.score);

  if (!sourceEventId || !homeTeam || !awayTeam || !marketType || !selection) return null;
  if (!kickoffTime || !observedAt) return null;
  if (!Number.isFinite(price) || price <= 1) return null;
  if (matchMinute === undefined || liveScore === undefined) return null;

  return {
    sourceId,
    fixture: {
      sourceEventId,
      homeTeam,
      awayTeam,
      competition: nonEmptyString(row.competition) ?? 'unknown',
      kickoffTime,
    },
    marketType,
    selection,
    price,
    observedAt,
    matchMinute,
    liveScore,
  };
}

/**
 * Accepts either a bare array of rows or an object with a `quotes` array
 */
export function parseQuoteRows(sourceId: string, payload: unknown): ParsedQuotes {
  const rows = Array.isArray(payload)
    ? payload
    : isRecord(payload) && Array.isArray(payload.quotes)
      ? payload.quotes
      : null;

  if (!rows) {
    throw new Error(`[SOURCE:${sourceId}] Unexpected payload structure: expected an array of quotes`);
  }

  const quotes: RawOddsQuote[] = [];
  let skipped = 0;
  for (const row of rows) {
    const quote = parseQuoteRow(sourceId, row);
    if (quote) {
      quotes.push(quote);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    console.warn(`[SOURCE:${sourceId}] Skipped ${skipped} malformed quote rows`);
  }

  return { quotes, skipped };
}
