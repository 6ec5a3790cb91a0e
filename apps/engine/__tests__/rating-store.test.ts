/**
 * Rating Store Tests
 */

import * as path from 'path';
import { RatingStore } from '../src/ratings/rating-store';

const RATINGS_FILE = path.join(__dirname, '../data/ratings.yml');

describe('RatingStore', () => {
  let store: RatingStore;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    store = RatingStore.fromFile(RATINGS_FILE, 168);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('loads the bundled ratings', () => {
    expect(store.size).toBe(6);
    expect(store.getRating('gor-mahia')).toEqual({
      teamId: 'gor-mahia',
      attackStrength: 1.32,
      defenseStrength: 0.78,
      homeAdvantage: 1.18,
      lastUpdated: new Date('2026-10-17T06:00:00Z'),
    });
    expect(store.getRating('bandari')).toBeNull();
  });

  test('freshness is bounded by the maximum age', () => {
    const rating = store.getRating('arsenal');
    if (!rating) throw new Error('arsenal rating missing');

    expect(store.isFresh(rating, new Date('2026-10-24T06:00:00Z'))).toBe(true);
    expect(store.isFresh(rating, new Date('2026-10-24T06:00:01Z'))).toBe(false);
  });

  test('recent form is points per game scaled to [0, 1]', () => {
    // WWDWL = 10 of 15 points
    expect(store.recentForm('gor-mahia')).toBeCloseTo(10 / 15, 10);
    expect(store.recentForm('bandari')).toBeNull();
  });

  test('head-to-head combines meetings at both venues', () => {
    // 6 + 4 wins and 3 + 4 draws in 20 meetings
    expect(store.headToHead('gor-mahia', 'afc-leopards')).toBeCloseTo(0.675, 10);
    expect(store.headToHead('afc-leopards', 'gor-mahia')).toBeCloseTo(0.325, 10);
    expect(store.headToHead('tusker', 'arsenal')).toBeNull();
  });

  test('upsert keeps the last five results', () => {
    store.upsert(
      { teamId: 'bandari', attackStrength: 0.9, defenseStrength: 1.1, homeAdvantage: 1.05, lastUpdated: new Date() },
      ['L', 'L', 'W', 'W', 'W', 'W', 'W']
    );

    expect(store.recentForm('bandari')).toBe(1);
  });

  test('rejects non-positive strengths', () => {
    expect(() => store.upsert({
      teamId: 'bandari',
      attackStrength: 0,
      defenseStrength: 1.1,
      homeAdvantage: 1.05,
      lastUpdated: new Date(),
    })).toThrow('[RATINGS] Strengths for bandari must be strictly positive');
  });

  test('skips entries without the required fields', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const parsed = RatingStore.parse([
      'teams:',
      '  tusker: { attack: 1.05, defense: 0.92, last_updated: "2026-10-17T06:00:00Z" }',
      '  ulinzi-stars: { attack: 0.88 }',
    ].join('\n'), 168);

    expect(parsed.size).toBe(1);
    expect(parsed.getRating('tusker')?.homeAdvantage).toBe(1);
  });

  test('an empty team entry is skipped and a malformed head-to-head list is ignored', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const parsed = RatingStore.parse([
      'teams:',
      '  tusker: { attack: 1.05, defense: 0.92, last_updated: "2026-10-17T06:00:00Z" }',
      '  bandari:',
      'head_to_head: { home: tusker, away: bandari }',
    ].join('\n'), 168);

    expect(parsed.size).toBe(1);
    expect(parsed.getRating('bandari')).toBeNull();
    expect(parsed.headToHead('tusker', 'bandari')).toBeNull();
    expect(warn).toHaveBeenCalledWith('[RATINGS] Skipping bandari: entry is empty');
  });
});
