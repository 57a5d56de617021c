import type { Config } from './config/schema.js';
import type { Logger } from './logger/index.js';
import { createExecutors } from './commands/executor.js';
import type { CommandContext } from './commands/rustdoc-command.js';
import { convertRustdocToMarkdown } from './rustdoc/converter.js';
import { RustdocStore } from './rustdoc/store.js';
import { NodeFs } from './utils/fs.js';
import { FetchHttpClient } from './utils/http.js';

/**
 * Build the process-wide command context. Call once at startup; the store
 * inside is shared by every invocation.
 */
export function createCommandContext(config: Config, logger: Logger, worktrees: string[]): CommandContext {
  const store = new RustdocStore({
    dataDir: config.store.dataDir,
    searchLimit: config.store.searchLimit,
    convert: convertRustdocToMarkdown,
    logger: logger.child({ component: 'store' }),
  });

  return {
    store,
    fs: new NodeFs(),
    http: new FetchHttpClient(`${config.mcp.serverName}/${config.mcp.serverVersion}`),
    convert: convertRustdocToMarkdown,
    docs: config.docs,
    logger,
    worktrees,
    executors: createExecutors(),
  };
}
