#!/usr/bin/env node

/**
 * cratedoc MCP Server - Entry Point
 * Serves Rust crate documentation over the Model Context Protocol
 */

import { getConfig } from './config/index.js';
import { getLogger } from './logger/index.js';
import { CrateDocMCPServer } from './server.js';
import { createCommandContext } from './context.js';
import { ConfigurationError } from './errors/index.js';

async function main(): Promise<void> {
  try {
    const config = getConfig();
    const logger = getLogger(config.logging);

    logger.info('Starting cratedoc MCP Server', {
      version: config.mcp.serverVersion,
    });

    // Worktrees come from the command line; the current directory otherwise
    const worktrees = process.argv.slice(2);
    const context = createCommandContext(config, logger, worktrees.length > 0 ? worktrees : [process.cwd()]);

    const server = new CrateDocMCPServer(config, logger, context);
    await server.start();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('Configuration error:', error.message);
      process.exit(1);
    }

    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
