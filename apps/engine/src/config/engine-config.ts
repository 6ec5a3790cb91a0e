/**
 * Engine Configuration Loader
 *
 * Loads, merges and validates the engine configuration from engine.yml.
 * Validation is all-or-nothing: any violation is fatal at startup.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';

export type FatigueMode = 'linear' | 'exponential';

export interface StakeBracket {
  min_confidence: number;
  stake_min: number;
  stake_max: number;
}

export type ConfidenceWeights = {
  edge_magnitude: number;
  cross_market_agreement: number;
  recent_form: number;
  head_to_head: number;
  home_away: number;
};

export interface AggregationConfig {
  match_time_tolerance_minutes: number;
  price_discrepancy_tolerance: number; // relative, e.g. 0.15 = 15%
  snapshot_staleness_seconds: number;
}

export interface ModelConfig {
  scoreline_cutoff: number;
  rho: number;
  league_average_goals: number;
  default_home_advantage: number;
  match_length_minutes: number;
  rating_max_age_hours: number;
  fatigue: {
    mode: FatigueMode;
    threshold_minute: number;
    rate_per_minute: number;
  };
  trailing_boost: {
    per_goal: number;
    cap: number;
  };
}

export interface EvaluationConfig {
  min_minute: number;
  max_minute: number;
  min_price: number;
  max_price: number;
  min_edge: number; // value selections need edge > 0 and edge >= min_edge
}

export interface ConfidenceConfig {
  weights: ConfidenceWeights;
  edge_saturation: number;
  agreement_tolerance: number;
  low_confidence_ceiling: number;
}

export interface StakingConfig {
  bankroll: number;
  currency: string;
  kelly_multiplier: number;
  kelly_max_fraction: number;
  absolute_stake_cap: number;
  brackets: StakeBracket[];
}

export interface GateConfig {
  auto_act_threshold: number;
  daily_loss_limit: number;
  snapshot_max_age_seconds: number;
  price_movement_tolerance: number; // relative
}

export interface ProfileOverrides {
  evaluation?: Partial<EvaluationConfig>;
  staking?: Partial<StakingConfig>;
  gate?: Partial<GateConfig>;
}

export interface EngineConfig {
  refresh_interval_seconds: number;
  cycle_timeout_ms: number;
  source_timeout_ms: number;
  aggregation: AggregationConfig;
  model: ModelConfig;
  evaluation: EvaluationConfig;
  confidence: ConfidenceConfig;
  staking: StakingConfig;
  gate: GateConfig;
  profiles?: Record<string, ProfileOverrides>;
  active_profile?: string | null;
}

export class EngineConfigError extends Error {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`Invalid engine configuration:\n  - ${violations.join('\n  - ')}`);
    this.name = 'EngineConfigError';
    this.violations = violations;
  }
}

const WEIGHT_SUM_TOLERANCE = 1e-9;

const WEIGHT_NAMES: ReadonlyArray<keyof ConfidenceWeights> = [
  'edge_magnitude',
  'cross_market_agreement',
  'recent_form',
  'head_to_head',
  'home_away',
];

const TOP_LEVEL_KEYS = [
  'refresh_interval_seconds',
  'cycle_timeout_ms',
  'source_timeout_ms',
  'aggregation',
  'model',
  'evaluation',
  'confidence',
  'staking',
  'gate',
  'profiles',
  'active_profile',
];

const SECTION_KEYS: Record<string, string[]> = {
  aggregation: ['match_time_tolerance_minutes', 'price_discrepancy_tolerance', 'snapshot_staleness_seconds'],
  model: [
    'scoreline_cutoff',
    'rho',
    'league_average_goals',
    'default_home_advantage',
    'match_length_minutes',
    'rating_max_age_hours',
    'fatigue',
    'trailing_boost',
  ],
  'model.fatigue': ['mode', 'threshold_minute', 'rate_per_minute'],
  'model.trailing_boost': ['per_goal', 'cap'],
  evaluation: ['min_minute', 'max_minute', 'min_price', 'max_price', 'min_edge'],
  confidence: ['weights', 'edge_saturation', 'agreement_tolerance', 'low_confidence_ceiling'],
  staking: ['bankroll', 'currency', 'kelly_multiplier', 'kelly_max_fraction', 'absolute_stake_cap', 'brackets'],
  gate: ['auto_act_threshold', 'daily_loss_limit', 'snapshot_max_age_seconds', 'price_movement_tolerance'],
};

const PROFILE_SECTIONS = ['evaluation', 'staking', 'gate'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositive(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isNonNegative(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function isConfidence(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 100;
}

function unknownKeysIn(value: unknown, known: string[], prefix: string): string[] {
  if (!isPlainObject(value)) return [];
  return Object.keys(value)
    .filter(key => !known.includes(key))
    .map(key => `unknown configuration key: ${prefix}${key}`);
}

/**
 * Keys the engine does not read, at the top level, inside each section and inside profiles
 */
export function findUnknownKeys(root: Record<string, unknown>): string[] {
  const errors = unknownKeysIn(root, TOP_LEVEL_KEYS, '');

  for (const [section, known] of Object.entries(SECTION_KEYS)) {
    let value: unknown = root;
    for (const part of section.split('.')) {
      value = isPlainObject(value) ? value[part] : undefined;
    }
    errors.push(...unknownKeysIn(value, known, `${section}.`));
  }

  const profiles = root.profiles;
  if (isPlainObject(profiles)) {
    for (const [name, overrides] of Object.entries(profiles)) {
      if (!isPlainObject(overrides)) {
        errors.push(`profiles.${name} must be a mapping`);
        continue;
      }
      errors.push(...unknownKeysIn(overrides, PROFILE_SECTIONS, `profiles.${name}.`));
      for (const section of PROFILE_SECTIONS) {
        errors.push(...unknownKeysIn(overrides[section], SECTION_KEYS[section], `profiles.${name}.${section}.`));
      }
    }
  }

  return errors;
}

/**
 * Validate the stake bracket table.
 * Thresholds strictly increasing, bounds non-negative and min <= max.
 */
export function validateBrackets(brackets: unknown): string[] {
  const errors: string[] = [];

  if (!Array.isArray(brackets) || brackets.length === 0) {
    return ['staking.brackets must be a non-empty list'];
  }

  let previousThreshold: number | null = null;
  brackets.forEach((entry: unknown, index) => {
    if (!isPlainObject(entry)) {
      errors.push(`staking.brackets[${index}] must be an object`);
      return;
    }
    const { min_confidence, stake_min, stake_max } = entry;

    if (!isConfidence(min_confidence)) {
      errors.push(`staking.brackets[${index}].min_confidence must be within [0, 100]`);
    } else {
      if (previousThreshold !== null && min_confidence <= previousThreshold) {
        errors.push(
          `staking.brackets[${index}].min_confidence (${min_confidence}) must be greater than the previous threshold (${previousThreshold})`
        );
      }
      previousThreshold = min_confidence;
    }

    if (!isNonNegative(stake_min)) {
      errors.push(`staking.brackets[${index}].stake_min must be a non-negative number`);
    }
    if (!isNonNegative(stake_max)) {
      errors.push(`staking.brackets[${index}].stake_max must be a non-negative number`);
    }
    if (isNonNegative(stake_min) && isNonNegative(stake_max) && stake_min > stake_max) {
      errors.push(`staking.brackets[${index}] has stake_min (${stake_min}) greater than stake_max (${stake_max})`);
    }
  });

  return errors;
}

/**
 * Collect every violation in a parsed configuration
 */
export function validateEngineConfig(config: EngineConfig): string[] {
  const errors: string[] = [];
  const check = (ok: boolean, message: string) => {
    if (!ok) errors.push(message);
  };

  check(isPositive(config.refresh_interval_seconds), 'refresh_interval_seconds must be positive');
  check(isPositive(config.cycle_timeout_ms), 'cycle_timeout_ms must be positive');
  check(isPositive(config.source_timeout_ms), 'source_timeout_ms must be positive');
  if (isPositive(config.source_timeout_ms) && isPositive(config.cycle_timeout_ms)) {
    check(config.source_timeout_ms <= config.cycle_timeout_ms, 'source_timeout_ms must not exceed cycle_timeout_ms');
  }
  if (isPositive(config.cycle_timeout_ms) && isPositive(config.refresh_interval_seconds)) {
    check(
      config.cycle_timeout_ms < config.refresh_interval_seconds * 1000,
      'cycle_timeout_ms must be shorter than refresh_interval_seconds'
    );
  }

  const { aggregation, model, evaluation, confidence, staking, gate } = config;

  if (!isPlainObject(aggregation)) {
    errors.push('aggregation section is missing');
  } else {
    check(isPositive(aggregation.match_time_tolerance_minutes), 'aggregation.match_time_tolerance_minutes must be positive');
    check(isPositive(aggregation.price_discrepancy_tolerance), 'aggregation.price_discrepancy_tolerance must be positive');
    check(isPositive(aggregation.snapshot_staleness_seconds), 'aggregation.snapshot_staleness_seconds must be positive');
  }

  if (!isPlainObject(model)) {
    errors.push('model section is missing');
  } else {
    check(
      Number.isInteger(model.scoreline_cutoff) && model.scoreline_cutoff >= 1,
      'model.scoreline_cutoff must be an integer >= 1'
    );
    check(
      typeof model.rho === 'number' && Number.isFinite(model.rho) && Math.abs(model.rho) < 1,
      'model.rho must be a number with |rho| < 1'
    );
    check(isPositive(model.league_average_goals), 'model.league_average_goals must be positive');
    check(isPositive(model.default_home_advantage), 'model.default_home_advantage must be positive');
    check(isPositive(model.match_length_minutes), 'model.match_length_minutes must be positive');
    check(isPositive(model.rating_max_age_hours), 'model.rating_max_age_hours must be positive');

    if (!isPlainObject(model.fatigue)) {
      errors.push('model.fatigue section is missing');
    } else {
      check(
        model.fatigue.mode === 'linear' || model.fatigue.mode === 'exponential',
        'model.fatigue.mode must be "linear" or "exponential"'
      );
      check(isNonNegative(model.fatigue.threshold_minute), 'model.fatigue.threshold_minute must be non-negative');
      check(isNonNegative(model.fatigue.rate_per_minute), 'model.fatigue.rate_per_minute must be non-negative');
    }

    if (!isPlainObject(model.trailing_boost)) {
      errors.push('model.trailing_boost section is missing');
    } else {
      check(isNonNegative(model.trailing_boost.per_goal), 'model.trailing_boost.per_goal must be non-negative');
      check(isNonNegative(model.trailing_boost.cap), 'model.trailing_boost.cap must be non-negative');
    }
  }

  if (!isPlainObject(evaluation)) {
    errors.push('evaluation section is missing');
  } else {
    check(isNonNegative(evaluation.min_minute), 'evaluation.min_minute must be non-negative');
    check(isNonNegative(evaluation.max_minute), 'evaluation.max_minute must be non-negative');
    check(evaluation.min_minute <= evaluation.max_minute, 'evaluation.min_minute must not exceed evaluation.max_minute');
    check(isPositive(evaluation.min_price) && evaluation.min_price > 1, 'evaluation.min_price must be greater than 1');
    check(evaluation.min_price < evaluation.max_price, 'evaluation.min_price must be below evaluation.max_price');
    check(isNonNegative(evaluation.min_edge), 'evaluation.min_edge must be non-negative');
  }

  if (!isPlainObject(confidence) || !isPlainObject(confidence.weights)) {
    errors.push('confidence.weights section is missing');
  } else {
    const weights: Record<string, unknown> = confidence.weights;
    for (const name of WEIGHT_NAMES) {
      check(isNonNegative(weights[name]), `confidence.weights.${name} must be a non-negative number`);
    }
    for (const name of Object.keys(weights)) {
      check(WEIGHT_NAMES.some(known => known === name), `confidence.weights.${name} is not a known signal`);
    }
    const sum = WEIGHT_NAMES.reduce((acc, name) => {
      const weight = weights[name];
      return acc + (isNonNegative(weight) ? weight : 0);
    }, 0);
    check(
      Math.abs(sum - 1) <= WEIGHT_SUM_TOLERANCE,
      `confidence.weights must sum to 1 (got ${sum})`
    );
    check(isPositive(confidence.edge_saturation), 'confidence.edge_saturation must be positive');
    check(isPositive(confidence.agreement_tolerance), 'confidence.agreement_tolerance must be positive');
    check(isConfidence(confidence.low_confidence_ceiling), 'confidence.low_confidence_ceiling must be within [0, 100]');
  }

  if (!isPlainObject(staking)) {
    errors.push('staking section is missing');
  } else {
    check(isPositive(staking.bankroll), 'staking.bankroll must be positive');
    check(typeof staking.currency === 'string' && staking.currency.length > 0, 'staking.currency must be set');
    check(isPositive(staking.kelly_multiplier), 'staking.kelly_multiplier must be positive');
    check(
      isPositive(staking.kelly_max_fraction) && staking.kelly_max_fraction <= 1,
      'staking.kelly_max_fraction must be within (0, 1]'
    );
    check(isPositive(staking.absolute_stake_cap), 'staking.absolute_stake_cap must be positive');

    const bracketErrors = validateBrackets(staking.brackets);
    errors.push(...bracketErrors);

    if (bracketErrors.length === 0 && isPositive(staking.absolute_stake_cap)) {
      const highestMinimum = Math.max(...staking.brackets.map(b => b.stake_min));
      check(
        staking.absolute_stake_cap >= highestMinimum,
        `staking.absolute_stake_cap (${staking.absolute_stake_cap}) is below a bracket minimum (${highestMinimum})`
      );
    }
  }

  if (!isPlainObject(gate)) {
    errors.push('gate section is missing');
  } else {
    check(isConfidence(gate.auto_act_threshold), 'gate.auto_act_threshold must be within [0, 100]');
    check(isPositive(gate.daily_loss_limit), 'gate.daily_loss_limit must be positive');
    check(isPositive(gate.snapshot_max_age_seconds), 'gate.snapshot_max_age_seconds must be positive');
    check(isPositive(gate.price_movement_tolerance), 'gate.price_movement_tolerance must be positive');
  }

  return errors;
}

/**
 * Apply the active strategy profile on top of the base sections
 */
export function applyProfile(config: EngineConfig, profileName?: string | null): EngineConfig {
  const name = profileName ?? config.active_profile ?? null;
  if (!name) return config;

  const overrides = config.profiles?.[name];
  if (!overrides) {
    const available = Object.keys(config.profiles ?? {}).join(', ') || 'none';
    throw new EngineConfigError([`profile "${name}" not found (available: ${available})`]);
  }

  return {
    ...config,
    active_profile: name,
    evaluation: { ...config.evaluation, ...overrides.evaluation },
    staking: { ...config.staking, ...overrides.staking },
    gate: { ...config.gate, ...overrides.gate },
  };
}

/**
 * Parse YAML text into a validated configuration
 */
export function parseEngineConfig(content: string, profileName?: string | null): EngineConfig {
  const parsed = yaml.load(content);
  if (!isPlainObject(parsed)) {
    throw new EngineConfigError(['configuration root must be a mapping']);
  }

  // Shape is checked field by field below
  const unknownKeys = findUnknownKeys(parsed);
  if (unknownKeys.length > 0) {
    throw new EngineConfigError(unknownKeys);
  }

  const merged = applyProfile(parsed as unknown as EngineConfig, profileName);
  const errors = validateEngineConfig(merged);
  if (errors.length > 0) {
    throw new EngineConfigError(errors);
  }

  return merged;
}

export function defaultConfigPath(): string {
  return path.join(__dirname, '../../config/engine.yml');
}

/**
 * Resolve the config path: ENGINE_CONFIG_PATH, then the explicit path, then the bundled file
 */
export function resolveConfigPath(explicitPath?: string): string {
  if (process.env.ENGINE_CONFIG_PATH) {
    return process.env.ENGINE_CONFIG_PATH;
  }
  return explicitPath ?? defaultConfigPath();
}

let cachedConfig: EngineConfig | null = null;

/**
 * Load the engine configuration (cached after the first successful load)
 */
export function loadEngineConfig(options: { configPath?: string; profile?: string | null } = {}): EngineConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = resolveConfigPath(options.configPath);
  if (!fs.existsSync(configPath)) {
    throw new EngineConfigError([`config file not found: ${configPath}`]);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  cachedConfig = parseEngineConfig(content, options.profile);

  const profile = cachedConfig.active_profile ? ` (profile: ${cachedConfig.active_profile})` : '';
  console.log(`[CONFIG] Loaded engine configuration from ${configPath}${profile}`);

  return cachedConfig;
}

/**
 * Clear the cached configuration (useful for testing)
 */
export function clearEngineConfigCache(): void {
  cachedConfig = null;
}
