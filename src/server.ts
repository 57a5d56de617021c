import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from './logger/index.js';
import type { Config } from './config/schema.js';
import { LifecycleManager } from './lifecycle/index.js';
import { RustdocCommand } from './commands/rustdoc-command.js';
import type { CommandContext } from './commands/rustdoc-command.js';
import { listAllTools, callTool, type ToolRuntime } from './tools/index.js';
import { toError } from './errors/index.js';

/**
 * cratedoc MCP Server
 * Serves the rustdoc command over the Model Context Protocol
 */
export class CrateDocMCPServer {
  private server: Server;
  private logger: Logger;
  private config: Config;
  private lifecycle: LifecycleManager;
  private runtime: ToolRuntime;
  private transport?: StdioServerTransport;

  constructor(config: Config, logger: Logger, context: CommandContext) {
    this.config = config;
    this.logger = logger;
    this.runtime = { command: new RustdocCommand(), context };

    this.server = new Server(
      {
        name: config.mcp.serverName,
        version: config.mcp.serverVersion,
      },
      {
        capabilities: {
          tools: {
            listChanged: false,
          },
        },
      }
    );

    this.lifecycle = new LifecycleManager(logger);
    this.setupLifecycleHooks();
    this.setupMCPHandlers();
  }

  private setupLifecycleHooks(): void {
    this.lifecycle.onStartup('initialize-server', async () => {
      this.logger.info('Initializing MCP server', {
        name: this.config.mcp.serverName,
        version: this.config.mcp.serverVersion,
        worktrees: this.runtime.context.worktrees,
      });
    });

    this.lifecycle.onShutdown('close-transport', async () => {
      if (this.transport) {
        this.logger.info('Closing MCP transport');
        await this.transport.close();
      }
    });
  }

  private setupMCPHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      this.logger.debug('Received list_tools request');
      return { tools: listAllTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const toolName = request.params.name;
      const args = request.params.arguments;

      this.logger.debug('Received call_tool request', { tool: toolName, args });

      try {
        return await callTool(this.runtime, toolName, args, extra.signal);
      } catch (error) {
        this.logger.error('Failed to call tool', toError(error), { tool: toolName });
        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({
              error: `Failed to execute tool ${toolName}`,
              message: toError(error).message,
            }, null, 2),
          }],
          isError: true,
        };
      }
    });
  }

  async start(): Promise<void> {
    try {
      await this.lifecycle.startup();
      this.lifecycle.installSignalHandlers();

      this.logger.info('Starting MCP server with stdio transport');
      this.transport = new StdioServerTransport();
      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', toError(error));
      throw error;
    }
  }
}
