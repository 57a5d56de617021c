import type { Config } from './schema.js';

/**
 * Default configuration values
 * These are used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  logging: {
    level: 'info',
    format: 'json',
    dir: undefined,
    maxFiles: 10,
    maxSize: '10m',
  },
  mcp: {
    serverName: 'cratedoc',
    serverVersion: '0.1.0',
    transport: 'stdio',
  },
  docs: {
    remoteHost: 'docs.rs',
    version: 'latest',
    manifestFile: 'Cargo.toml',
    buildDocDir: 'target/doc',
  },
  store: {
    dataDir: 'data/rustdoc',
    searchLimit: 50,
  },
};
