import type { Logger } from '../logger/index.js';
import { toError } from '../errors/index.js';

type Hook = () => Promise<void>;

/**
 * Ordered startup and shutdown hooks for the MCP server
 */
export class LifecycleManager {
  private readonly startupHooks: Array<[string, Hook]> = [];
  private readonly shutdownHooks: Array<[string, Hook]> = [];
  private stopping: Promise<number> | null = null;

  constructor(private readonly logger: Logger) {}

  onStartup(name: string, hook: Hook): void {
    this.startupHooks.push([name, hook]);
  }

  onShutdown(name: string, hook: Hook): void {
    this.shutdownHooks.push([name, hook]);
  }

  /**
   * Run startup hooks in registration order; the first failure aborts startup
   */
  async startup(): Promise<void> {
    for (const [name, hook] of this.startupHooks) {
      this.logger.debug(`Running startup hook: ${name}`);
      await hook();
    }
    this.logger.info('Server startup complete');
  }

  /**
   * Run shutdown hooks newest first and resolve to the process exit code.
   * Repeated calls share the first run.
   */
  shutdown(reason: string): Promise<number> {
    if (!this.stopping) {
      this.stopping = this.runShutdownHooks(reason);
    }
    return this.stopping;
  }

  private async runShutdownHooks(reason: string): Promise<number> {
    this.logger.info(`Shutting down (${reason})`);

    let exitCode = 0;
    for (const [name, hook] of [...this.shutdownHooks].reverse()) {
      try {
        await hook();
      } catch (error) {
        exitCode = 1;
        this.logger.error(`Shutdown hook failed: ${name}`, toError(error));
      }
    }
    return exitCode;
  }

  /**
   * Exit through `shutdown` on SIGTERM/SIGINT and on errors nothing else caught
   */
  installSignalHandlers(): void {
    const exitAfterShutdown = (reason: string): void => {
      void this.shutdown(reason).then((code) => process.exit(code));
    };

    process.on('SIGTERM', () => exitAfterShutdown('SIGTERM'));
    process.on('SIGINT', () => exitAfterShutdown('SIGINT'));

    process.on('uncaughtException', (error: Error) => {
      this.logger.error('Uncaught exception', error);
      exitAfterShutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason: unknown) => {
      this.logger.error('Unhandled rejection', toError(reason));
      exitAfterShutdown('unhandledRejection');
    });
  }
}
