/**
 * Adapter Factory
 *
 * Creates and configures data source adapters based on configuration.
 */

import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { AdapterConfig, DataSourceAdapter, DataSourcesConfig } from './DataSourceAdapter';
import { MockAdapter } from './MockAdapter';

export const DEFAULT_DATASOURCES_PATH = path.join(__dirname, '../config/datasources.yml');

function isDataSourcesConfig(value: unknown): value is DataSourcesConfig {
  return (
    typeof value === 'object' &&
    value !== null &&
    'defaultAdapter' in value &&
    typeof value.defaultAdapter === 'string' &&
    'adapters' in value &&
    typeof value.adapters === 'object' &&
    value.adapters !== null
  );
}

export class AdapterFactory {
  private config: DataSourcesConfig;
  private baseDir: string;

  constructor(configPath: string = process.env.DATASOURCES_CONFIG_PATH || DEFAULT_DATASOURCES_PATH) {
    const configFile = fs.readFileSync(configPath, 'utf8');
    const parsed = yaml.load(configFile);
    if (!isDataSourcesConfig(parsed)) {
      throw new Error(`Invalid data sources configuration in ${configPath}`);
    }
    this.config = parsed;
    this.baseDir = path.dirname(configPath);
  }

  /**
   * Create an adapter by name
   */
  async createAdapter(adapterName?: string): Promise<DataSourceAdapter> {
    const name = adapterName || this.config.defaultAdapter;
    const adapterConfig = this.config.adapters[name];

    if (!adapterConfig) {
      throw new Error(`Adapter '${name}' not found in configuration`);
    }

    if (!adapterConfig.enabled) {
      throw new Error(`Adapter '${name}' is disabled`);
    }

    switch (adapterConfig.provider) {
      case 'mock': {
        // RATINGS_DATA_PATH wins; relative paths resolve against the config file
        const dataPath = process.env.RATINGS_DATA_PATH || path.resolve(this.baseDir, adapterConfig.config.dataPath);
        return new MockAdapter({ ...adapterConfig.config, dataPath });
      }

      case 'competition-api':
        throw new Error('Competition API adapter not yet implemented');

      default:
        throw new Error(`Unknown adapter provider: ${adapterConfig.provider}`);
    }
  }

  /**
   * Get list of enabled adapters
   */
  getAvailableAdapters(): string[] {
    return Object.keys(this.config.adapters).filter(name => this.config.adapters[name].enabled);
  }

  getAdapterConfig(adapterName: string): AdapterConfig | undefined {
    return this.config.adapters[adapterName];
  }
}
