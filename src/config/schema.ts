import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const TransportSchema = z.enum(['stdio']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('json'),
  // File transports are only created when a directory is configured
  dir: z.string().optional(),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z.string().default('10m'),
});

export const MCPConfigSchema = z.object({
  serverName: z.string().default('cratedoc'),
  serverVersion: z.string().default('0.1.0'),
  transport: TransportSchema.default('stdio'),
});

export const DocsConfigSchema = z.object({
  remoteHost: z.string().min(1).default('docs.rs'),
  version: z.string().min(1).default('latest'),
  manifestFile: z.string().min(1).default('Cargo.toml'),
  buildDocDir: z.string().min(1).default('target/doc'),
});

export const StoreConfigSchema = z.object({
  dataDir: z.string().min(1).default('data/rustdoc'),
  searchLimit: z.number().int().min(1).max(500).default(50),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  logging: LoggingConfigSchema,
  mcp: MCPConfigSchema,
  docs: DocsConfigSchema,
  store: StoreConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type DocsConfig = z.infer<typeof DocsConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
