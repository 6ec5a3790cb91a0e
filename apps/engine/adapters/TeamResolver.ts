import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';

/**
 * Anything that maps a source's team name to a canonical team id
 */
export interface TeamNameResolver {
  resolveTeam(providerName: string): string;
}

export interface TeamResolverOptions {
  /** Inline alias table (alias -> canonical id); skips file loading */
  aliases?: Record<string, string>;
  aliasesPath?: string;
}

const CLUB_TOKENS = new Set(['fc', 'afc', 'cf', 'sc', 'ac', 'sk']);

export class TeamResolver implements TeamNameResolver {
  private aliases: Map<string, string> = new Map();
  private verboseLogging: boolean;
  private resolvedTeams: Set<string> = new Set(); // Track names we've already logged

  constructor(options: TeamResolverOptions = {}) {
    this.verboseLogging = process.env.ENGINE_LOG_VERBOSE === 'true';
    if (options.aliases) {
      this.addAliases(options.aliases);
    } else {
      this.loadAliases(options.aliasesPath);
    }
  }

  private loadAliases(explicitPath?: string): void {
    // Priority: TEAM_ALIASES_PATH, explicit path, bundled config
    const aliasPath =
      process.env.TEAM_ALIASES_PATH || explicitPath || path.join(__dirname, '../config/team_aliases.yml');

    if (!fs.existsSync(aliasPath)) {
      throw new Error(`[TEAM_RESOLVER] team_aliases.yml not found: ${aliasPath}`);
    }

    const aliasData: unknown = yaml.load(fs.readFileSync(aliasPath, 'utf8'));
    if (!aliasData || typeof aliasData !== 'object' || Array.isArray(aliasData)) {
      throw new Error('[TEAM_RESOLVER] Invalid YAML structure: expected object with team aliases');
    }

    // Handle nested structure with 'aliases' key
    const aliases: unknown = 'aliases' in aliasData ? aliasData.aliases : aliasData;
    if (!aliases || typeof aliases !== 'object' || Array.isArray(aliases)) {
      throw new Error('[TEAM_RESOLVER] Invalid YAML structure: missing or invalid aliases section');
    }

    const table: Record<string, string> = {};
    for (const [alias, teamId] of Object.entries(aliases)) {
      if (typeof teamId === 'string' && teamId.trim()) {
        table[alias] = teamId;
      }
    }
    this.addAliases(table);

    console.log(`[TEAM_RESOLVER] Loaded ${this.aliases.size} team aliases from ${aliasPath}`);
  }

  private addAliases(table: Record<string, string>): void {
    for (const [alias, teamId] of Object.entries(table)) {
      const key = this.normalizeTeamName(alias);
      const existing = this.aliases.get(key);
      if (existing && existing !== teamId) {
        throw new Error(`[TEAM_RESOLVER] Alias "${alias}" maps to both "${existing}" and "${teamId}"`);
      }
      this.aliases.set(key, teamId);
    }
  }

  /**
   * Lower-case, strip diacritics and punctuation, collapse whitespace and drop club tokens
   * ("FC", "AFC", ...)
   */
  normalizeTeamName(name: string): string {
    const noDiacritics = name.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
    const words = noDiacritics
      .toLowerCase()
      .replace(/&/g, ' and ')
      .replace(/\./g, '')
      .replace(/[^a-z0-9\s]/g, ' ')
      .split(/\s+/)
      .filter(word => word.length > 0);

    const trimmed = words.filter((word, index) =>
      !(CLUB_TOKENS.has(word) && (index === 0 || index === words.length - 1) && words.length > 1)
    );
    return trimmed.join(' ');
  }

  /**
   * Resolve a provider team name to a canonical team id
   * @param providerName - Team name from the source (e.g., "Man Utd", "Manchester United FC")
   * @returns Canonical id (e.g., "manchester-united"); unknown names fall back to their slug
   */
  resolveTeam(providerName: string): string {
    const normalized = this.normalizeTeamName(providerName);
    const aliasMatch = this.aliases.get(normalized);
    const teamId = aliasMatch ?? normalized.replace(/\s+/g, '-');

    if (this.verboseLogging && !this.resolvedTeams.has(providerName)) {
      const via = aliasMatch ? 'alias' : 'slug';
      console.log(`[TEAM_RESOLVER] ${via} match: ${providerName} -> ${teamId}`);
      this.resolvedTeams.add(providerName);
    }

    return teamId;
  }
}
