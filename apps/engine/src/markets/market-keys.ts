/**
 * Market Keys
 *
 * Markets the evaluator can price from a scoreline distribution:
 * - 1x2: home / draw / away
 * - totals_<line>: over / under a half-goal line (e.g. totals_2.5)
 * - btts: both teams to score, yes / no
 */

export type TotalsMarketKey = `totals_${number}`;
export type MarketKey = '1x2' | 'btts' | TotalsMarketKey;

export type Selection = 'home' | 'draw' | 'away' | 'over' | 'under' | 'yes' | 'no';

export type ParsedMarket =
  | { kind: '1x2'; key: '1x2' }
  | { kind: 'btts'; key: 'btts' }
  | { kind: 'totals'; key: TotalsMarketKey; line: number };

const MARKET_ALIASES: Record<string, string> = {
  '1x2': '1x2',
  'h2h': '1x2',
  'match_result': '1x2',
  'moneyline': '1x2',
  'btts': 'btts',
  'both_teams_to_score': 'btts',
};

const SELECTION_ALIASES: Record<string, Selection> = {
  '1': 'home',
  'home': 'home',
  'x': 'draw',
  'draw': 'draw',
  '2': 'away',
  'away': 'away',
  'over': 'over',
  'under': 'under',
  'yes': 'yes',
  'gg': 'yes',
  'no': 'no',
  'ng': 'no',
};

/**
 * Half-goal lines only; an integer line has a push outcome the grid cannot price
 */
export function isHalfGoalLine(line: number): boolean {
  return Number.isFinite(line) && line > 0 && Math.abs((line * 2) % 2) === 1;
}

export function totalsKey(line: number): TotalsMarketKey {
  return `totals_${line}`;
}

/**
 * Parse a market type string from a source into a supported market.
 * Accepts "1x2", "btts", "totals_2.5", "over_under_2.5", "ou2.5" and a few aliases.
 */
export function parseMarketKey(raw: string): ParsedMarket | null {
  const normalized = raw.trim().toLowerCase();
  const alias = MARKET_ALIASES[normalized];

  if (alias === '1x2') return { kind: '1x2', key: '1x2' };
  if (alias === 'btts') return { kind: 'btts', key: 'btts' };

  const totalsMatch = normalized.match(/^(?:totals|total|over_under|ou)[_\s]?(\d+(?:\.\d+)?)$/);
  if (!totalsMatch) return null;

  const line = Number(totalsMatch[1]);
  if (!isHalfGoalLine(line)) return null;

  return { kind: 'totals', key: totalsKey(line), line };
}

export function parseSelection(raw: string): Selection | null {
  return SELECTION_ALIASES[raw.trim().toLowerCase()] ?? null;
}

/**
 * Every selection that makes a market complete
 */
export function selectionsFor(market: ParsedMarket): Selection[] {
  switch (market.kind) {
    case '1x2':
      return ['home', 'draw', 'away'];
    case 'totals':
      return ['over', 'under'];
    case 'btts':
      return ['yes', 'no'];
  }
}

export function isSelectionOf(market: ParsedMarket, selection: Selection): boolean {
  return selectionsFor(market).includes(selection);
}
