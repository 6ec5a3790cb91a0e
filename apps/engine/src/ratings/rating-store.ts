/**
 * Rating Store
 *
 * Per-team attack/defense strengths with freshness metadata, plus the recent-form and
 * head-to-head signals the confidence scorer reads. Loaded from data/ratings.yml and
 * refreshed through upsert by the external stats collaborator.
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import type { TeamRating } from '../types';
import { toDate } from '../../lib/time';

export interface RatingsProvider {
  getRating(teamId: string): TeamRating | null;
  isFresh(rating: TeamRating, now: Date): boolean;
}

/**
 * Auxiliary team signals, each in [0, 1]; null when unknown
 */
export interface TeamContextProvider {
  recentForm(teamId: string): number | null;
  /** Historical dominance of the home side over this opponent (0.5 = even) */
  headToHead(homeTeamId: string, awayTeamId: string): number | null;
}

export type FormResult = 'W' | 'D' | 'L';

export interface HeadToHeadRecord {
  homeTeamId: string;
  awayTeamId: string;
  homeWins: number;
  draws: number;
  awayWins: number;
}

const FORM_WINDOW = 5;
const FORM_POINTS: Record<FormResult, number> = { W: 3, D: 1, L: 0 };

function isFormResult(value: string): value is FormResult {
  return value === 'W' || value === 'D' || value === 'L';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function count(value: unknown): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : 0;
}

export class RatingStore implements RatingsProvider, TeamContextProvider {
  private ratings: Map<string, TeamRating> = new Map();
  private form: Map<string, FormResult[]> = new Map();
  private headToHeadRecords: HeadToHeadRecord[] = [];
  private maxAgeMs: number;

  constructor(maxAgeHours: number) {
    this.maxAgeMs = maxAgeHours * 60 * 60 * 1000;
  }

  static fromFile(filePath: string, maxAgeHours: number): RatingStore {
    if (!fs.existsSync(filePath)) {
      throw new Error(`[RATINGS] Ratings file not found: ${filePath}`);
    }
    const store = RatingStore.parse(fs.readFileSync(filePath, 'utf8'), maxAgeHours);
    console.log(`[RATINGS] Loaded ${store.size} team ratings from ${filePath}`);
    return store;
  }

  static parse(content: string, maxAgeHours: number): RatingStore {
    const data: unknown = yaml.load(content) ?? {};
    if (!isPlainObject(data)) {
      throw new Error('[RATINGS] Ratings file must be a mapping');
    }
    const store = new RatingStore(maxAgeHours);

    const teams = isPlainObject(data.teams) ? data.teams : {};
    for (const [teamId, entry] of Object.entries(teams)) {
      if (!isPlainObject(entry)) {
        console.warn(`[RATINGS] Skipping ${teamId}: entry is empty`);
        continue;
      }
      const lastUpdated = toDate(entry.last_updated);
      if (typeof entry.attack !== 'number' || typeof entry.defense !== 'number' || !lastUpdated) {
        console.warn(`[RATINGS] Skipping ${teamId}: attack, defense and last_updated are required`);
        continue;
      }
      const homeAdvantage = typeof entry.home_advantage === 'number' ? entry.home_advantage : 1;
      const form = typeof entry.form === 'string' ? entry.form.toUpperCase().split('').filter(isFormResult) : [];

      store.upsert(
        { teamId, attackStrength: entry.attack, defenseStrength: entry.defense, homeAdvantage, lastUpdated },
        form
      );
    }

    const records: unknown[] = Array.isArray(data.head_to_head) ? data.head_to_head : [];
    for (const record of records) {
      if (!isPlainObject(record) || typeof record.home !== 'string' || typeof record.away !== 'string') continue;
      store.addHeadToHead({
        homeTeamId: record.home,
        awayTeamId: record.away,
        homeWins: count(record.home_wins),
        draws: count(record.draws),
        awayWins: count(record.away_wins),
      });
    }

    return store;
  }

  get size(): number {
    return this.ratings.size;
  }

  /**
   * Insert or replace a team's rating (and, when given, its recent results, newest last)
   */
  upsert(rating: TeamRating, recentResults?: FormResult[]): void {
    if (!(rating.attackStrength > 0) || !(rating.defenseStrength > 0) || !(rating.homeAdvantage > 0)) {
      throw new Error(`[RATINGS] Strengths for ${rating.teamId} must be strictly positive`);
    }
    this.ratings.set(rating.teamId, { ...rating });
    if (recentResults) {
      this.form.set(rating.teamId, recentResults.slice(-FORM_WINDOW));
    }
  }

  addHeadToHead(record: HeadToHeadRecord): void {
    this.headToHeadRecords.push({ ...record });
  }

  getRating(teamId: string): TeamRating | null {
    return this.ratings.get(teamId) ?? null;
  }

  isFresh(rating: TeamRating, now: Date): boolean {
    return now.getTime() - rating.lastUpdated.getTime() <= this.maxAgeMs;
  }

  /**
   * Points per game over the last five results, scaled to [0, 1]
   */
  recentForm(teamId: string): number | null {
    const results = this.form.get(teamId);
    if (!results || results.length === 0) return null;
    const points = results.reduce((sum, result) => sum + FORM_POINTS[result], 0);
    return points / (3 * results.length);
  }

  /**
   * (wins + half the draws) / meetings for the home side, across both venues
   */
  headToHead(homeTeamId: string, awayTeamId: string): number | null {
    let wins = 0;
    let draws = 0;
    let meetings = 0;

    for (const record of this.headToHeadRecords) {
      if (record.homeTeamId === homeTeamId && record.awayTeamId === awayTeamId) {
        wins += record.homeWins;
      } else if (record.homeTeamId === awayTeamId && record.awayTeamId === homeTeamId) {
        wins += record.awayWins;
      } else {
        continue;
      }
      draws += record.draws;
      meetings += record.homeWins + record.draws + record.awayWins;
    }

    return meetings === 0 ? null : (wins + draws / 2) / meetings;
  }
}
