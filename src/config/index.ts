import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { ConfigSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, toError } from '../errors/index.js';

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private config: Config;

  constructor(private readonly configPath: string = join(process.cwd(), 'config', 'default.json')) {
    loadEnv();

    this.config = this.deepClone(defaultConfig);
    this.loadFromFile();
    this.loadFromEnv();
    this.validate();
  }

  private deepClone(obj: Config): Config {
    return structuredClone(obj);
  }

  /**
   * Load configuration from JSON file
   */
  private loadFromFile(): void {
    if (!existsSync(this.configPath)) {
      return;
    }

    let fileConfig: unknown;
    try {
      fileConfig = JSON.parse(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load config file: ${toError(error).message}`,
        { path: this.configPath },
        toError(error)
      );
    }

    if (fileConfig && typeof fileConfig === 'object' && !Array.isArray(fileConfig)) {
      this.mergeConfig(fileConfig);
    }
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    const env = process.env;
    // Values land as raw strings; the schema rejects anything out of range
    const raw: Record<string, Record<string, unknown>> = this.config;

    const set = (section: keyof Config, key: string, value: unknown): void => {
      const target = raw[section];
      if (target) {
        target[key] = value;
      }
    };

    // Logging configuration
    if (env['CRATEDOC_LOG_LEVEL']) {
      set('logging', 'level', env['CRATEDOC_LOG_LEVEL']);
    }
    if (env['CRATEDOC_LOG_FORMAT']) {
      set('logging', 'format', env['CRATEDOC_LOG_FORMAT']);
    }
    if (env['CRATEDOC_LOG_DIR']) {
      set('logging', 'dir', env['CRATEDOC_LOG_DIR']);
    }
    if (env['CRATEDOC_LOG_MAX_FILES']) {
      set('logging', 'maxFiles', parseInt(env['CRATEDOC_LOG_MAX_FILES'], 10));
    }
    if (env['CRATEDOC_LOG_MAX_SIZE']) {
      set('logging', 'maxSize', env['CRATEDOC_LOG_MAX_SIZE']);
    }

    // MCP configuration
    if (env['CRATEDOC_SERVER_NAME']) {
      set('mcp', 'serverName', env['CRATEDOC_SERVER_NAME']);
    }
    if (env['CRATEDOC_SERVER_VERSION']) {
      set('mcp', 'serverVersion', env['CRATEDOC_SERVER_VERSION']);
    }

    // Docs configuration
    if (env['CRATEDOC_REMOTE_HOST']) {
      set('docs', 'remoteHost', env['CRATEDOC_REMOTE_HOST']);
    }
    if (env['CRATEDOC_DOCS_VERSION']) {
      set('docs', 'version', env['CRATEDOC_DOCS_VERSION']);
    }
    if (env['CRATEDOC_MANIFEST_FILE']) {
      set('docs', 'manifestFile', env['CRATEDOC_MANIFEST_FILE']);
    }
    if (env['CRATEDOC_BUILD_DOC_DIR']) {
      set('docs', 'buildDocDir', env['CRATEDOC_BUILD_DOC_DIR']);
    }

    // Store configuration
    if (env['CRATEDOC_DATA_DIR']) {
      set('store', 'dataDir', env['CRATEDOC_DATA_DIR']);
    }
    if (env['CRATEDOC_SEARCH_LIMIT']) {
      set('store', 'searchLimit', parseInt(env['CRATEDOC_SEARCH_LIMIT'], 10));
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(): void {
    const result = ConfigSchema.safeParse(this.config);
    if (!result.success) {
      throw new ConfigurationError(`Configuration validation failed: ${result.error.message}`, {
        issues: result.error.issues,
      });
    }
    this.config = result.data;
  }

  /**
   * Shallow-merge each section of a parsed config file into the current config
   */
  private mergeConfig(source: object): void {
    const target: Record<string, unknown> = this.config;
    for (const [key, value] of Object.entries(source)) {
      const current = target[key];
      if (
        value &&
        typeof value === 'object' &&
        !Array.isArray(value) &&
        current &&
        typeof current === 'object'
      ) {
        Object.assign(current, value);
      } else if (value !== undefined) {
        target[key] = value;
      }
    }
  }

  public getConfig(): Config {
    return this.config;
  }
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export type { Config, DocsConfig, StoreConfig } from './schema.js';
