/**
 * Source Id Normalization
 *
 * Normalizes odds source names from configuration and feeds to consistent identifiers.
 * Handles aliases, case folding, and trimming.
 */

const SOURCE_ALIASES: Record<string, string> = {
  'sportpesa': 'sportpesa',
  'sport pesa': 'sportpesa',
  'sportpesa.co.ke': 'sportpesa',
  '1xbet': '1xbet',
  'onexbet': '1xbet',
  '1x bet': '1xbet',
  'betika': 'betika',
  'betika.com': 'betika',
  'odibets': 'odibets',
  'odi bets': 'odibets',
  'mozzart': 'mozzart',
  'mozzartbet': 'mozzart',
  'betway': 'betway',
  'bet way': 'betway',
  'pinnacle': 'pinnacle',
  'pinny': 'pinnacle',
  'betfair': 'betfair',
  'betfair exchange': 'betfair',
};

/**
 * Normalize a source name to a consistent identifier
 *
 * @param rawName - Source name as configured or reported (e.g., "SportPesa", "1xBet.com")
 * @returns Normalized id (e.g., "sportpesa", "1xbet"), or "unknown"
 */
export function normalizeSourceId(rawName: string | null | undefined): string {
  if (!rawName) {
    return 'unknown';
  }

  const normalized = rawName.trim().toLowerCase();

  if (SOURCE_ALIASES[normalized]) {
    return SOURCE_ALIASES[normalized];
  }

  // Remove domain suffixes
  const cleaned = normalized
    .replace(/\.com$/i, '')
    .replace(/\.co\.ke$/i, '')
    .replace(/\.net$/i, '')
    .replace(/\.ag$/i, '')
    .replace(/\s+sportsbook$/i, '');

  if (SOURCE_ALIASES[cleaned]) {
    return SOURCE_ALIASES[cleaned];
  }

  const slug = cleaned.replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return slug || 'unknown';
}
