import type { Logger } from '../logger/index.js';

/**
 * Server lifecycle manager
 * Runs startup hooks in order and shutdown hooks in reverse order
 */

export interface LifecycleHook {
  name: string;
  handler: () => Promise<void>;
}

export interface LifecycleOptions {
  shutdownTimeout?: number;
  /** Install SIGTERM/SIGINT and uncaught-error handlers (default: true) */
  handleSignals?: boolean;
  /** Called with the exit code once shutdown finishes (default: process.exit) */
  exit?: (code: number) => void;
}

export class LifecycleManager {
  private logger: Logger;
  private startupHooks: LifecycleHook[] = [];
  private shutdownHooks: LifecycleHook[] = [];
  private isShuttingDown = false;
  private readonly shutdownTimeout: number;
  private readonly exit: (code: number) => void;

  constructor(logger: Logger, options: LifecycleOptions = {}) {
    this.logger = logger;
    this.shutdownTimeout = options.shutdownTimeout ?? 30000;
    this.exit = options.exit ?? ((code: number) => process.exit(code));
    if (options.handleSignals ?? true) {
      this.setupSignalHandlers();
    }
  }

  onStartup(name: string, handler: () => Promise<void>): void {
    this.startupHooks.push({ name, handler });
  }

  onShutdown(name: string, handler: () => Promise<void>): void {
    this.shutdownHooks.push({ name, handler });
  }

  /**
   * Execute all startup hooks; the first failure aborts startup
   */
  async startup(): Promise<void> {
    this.logger.info('Starting server lifecycle...');

    for (const hook of this.startupHooks) {
      try {
        this.logger.debug(`Executing startup hook: ${hook.name}`);
        await hook.handler();
      } catch (error) {
        this.logger.error(`Startup hook failed: ${hook.name}`, error);
        throw error;
      }
    }

    this.logger.info('Server startup complete');
  }

  /**
   * Execute all shutdown hooks within the shutdown timeout, then exit
   */
  async shutdown(signal?: string): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info(`Initiating graceful shutdown${signal ? ` (signal: ${signal})` : ''}`);

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<void>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Shutdown timeout after ${this.shutdownTimeout}ms`));
      }, this.shutdownTimeout);
    });

    try {
      await Promise.race([this.executeShutdownHooks(), timeoutPromise]);
      this.logger.info('Graceful shutdown complete');
      this.exit(0);
    } catch (error) {
      this.logger.error('Error during shutdown', error);
      this.exit(1);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Hooks run LIFO; a failing hook does not stop the others
   */
  private async executeShutdownHooks(): Promise<void> {
    const hooks = [...this.shutdownHooks].reverse();

    for (const hook of hooks) {
      try {
        this.logger.debug(`Executing shutdown hook: ${hook.name}`);
        await hook.handler();
      } catch (error) {
        this.logger.error(`Shutdown hook failed: ${hook.name}`, error);
      }
    }
  }

  private setupSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

    signals.forEach((signal) => {
      process.on(signal, () => {
        void this.shutdown(signal);
      });
    });

    process.on('uncaughtException', (error: Error) => {
      this.logger.error('Uncaught exception', error);
      void this.shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason: unknown) => {
      this.logger.error('Unhandled rejection', reason);
      void this.shutdown('unhandledRejection');
    });
  }

  isShuttingDownStatus(): boolean {
    return this.isShuttingDown;
  }
}
