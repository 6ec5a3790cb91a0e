/**
 * Adapter Factory
 *
 * Creates and configures odds source adapters from sources.yml.
 */

import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import type { OddsSourceAdapter, AdapterConfig, SourcesConfig } from './OddsSourceAdapter';
import { FileReplayAdapter } from './FileReplayAdapter';
import { HttpFeedAdapter } from './HttpFeedAdapter';
import { normalizeSourceId } from '../lib/source-normalizer';

function readString(config: Record<string, unknown>, key: string): string | undefined {
  const value = config[key];
  return typeof value === 'string' && value.trim() ? value : undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(detail: string): Error {
  return new Error(`Invalid sources configuration: ${detail}`);
}

export class AdapterFactory {
  private config: SourcesConfig;
  private baseDir: string;

  constructor(configPath: string = path.join(__dirname, '../config/sources.yml')) {
    const configFile = fs.readFileSync(configPath, 'utf8');
    this.config = AdapterFactory.parse(configFile);
    this.baseDir = path.dirname(configPath);
  }

  static parse(content: string): SourcesConfig {
    const parsed: unknown = yaml.load(content);
    if (!isPlainObject(parsed) || !isPlainObject(parsed.sources)) {
      throw invalid('expected a "sources" mapping');
    }

    const sources: Record<string, AdapterConfig> = {};
    for (const [name, entry] of Object.entries(parsed.sources)) {
      if (!isPlainObject(entry)) {
        throw invalid(`source '${name}' must be a mapping with provider and enabled`);
      }
      const { provider, enabled, config } = entry;
      if (typeof provider !== 'string' || !provider.trim()) {
        throw invalid(`source '${name}' needs a provider`);
      }
      if (typeof enabled !== 'boolean') {
        throw invalid(`source '${name}' needs enabled: true or false`);
      }
      if (config !== undefined && config !== null && !isPlainObject(config)) {
        throw invalid(`source '${name}' config must be a mapping`);
      }
      sources[name] = { provider, enabled, config: isPlainObject(config) ? config : {} };
    }

    return { sources };
  }

  /**
   * Create an adapter by source name
   */
  createAdapter(sourceName: string): OddsSourceAdapter {
    const adapterConfig = this.config.sources[sourceName];

    if (!adapterConfig) {
      throw new Error(`Source '${sourceName}' not found in configuration`);
    }

    if (!adapterConfig.enabled) {
      throw new Error(`Source '${sourceName}' is disabled`);
    }

    const sourceId = normalizeSourceId(sourceName);
    const settings = adapterConfig.config;

    switch (adapterConfig.provider) {
      case 'file-replay': {
        const filePath = readString(settings, 'path');
        if (!filePath) {
          throw new Error(`Source '${sourceName}' (file-replay) needs config.path`);
        }
        return new FileReplayAdapter({
          sourceId,
          path: path.resolve(this.baseDir, filePath),
          rebaseToNow: settings.rebase_to_now === true,
        });
      }

      case 'http-feed': {
        const url = readString(settings, 'url');
        if (!url) {
          throw new Error(`Source '${sourceName}' (http-feed) needs config.url`);
        }
        return new HttpFeedAdapter({ sourceId, url, apiKeyEnv: readString(settings, 'api_key_env') });
      }

      default:
        throw new Error(`Unknown source provider: ${adapterConfig.provider}`);
    }
  }

  /**
   * Create every enabled adapter
   */
  createEnabledAdapters(): OddsSourceAdapter[] {
    return this.getEnabledSources().map(name => this.createAdapter(name));
  }

  /**
   * Create every enabled adapter whose source reports itself available; the rest are
   * logged and left out of the cycle
   */
  async createAvailableAdapters(): Promise<OddsSourceAdapter[]> {
    const adapters = this.createEnabledAdapters();
    const availability = await Promise.all(adapters.map(adapter => adapter.isAvailable()));

    return adapters.filter((adapter, index) => {
      if (!availability[index]) {
        console.warn(`[SOURCE:${adapter.getName()}] Not available, skipping`);
      }
      return availability[index];
    });
  }

  getEnabledSources(): string[] {
    return Object.keys(this.config.sources).filter(
      name => this.config.sources[name].enabled
    );
  }
}
