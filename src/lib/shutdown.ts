import { logger } from '../logger';

export interface ShutdownHandler {
  name: string;
  priority: number;
  handler: () => Promise<void>;
}

export interface GracefulShutdownOptions {
  forceExitTimeoutMs?: number;
  exit?: (code: number) => void;
}

/**
 * Runs registered handlers in ascending priority on SIGTERM/SIGINT.
 * A failing handler is logged and the remaining handlers still run.
 */
export class GracefulShutdown {
  private handlers: ShutdownHandler[] = [];
  private isShuttingDown = false;
  private readonly forceExitTimeoutMs: number;
  private readonly exit: (code: number) => void;

  constructor(options: GracefulShutdownOptions = {}) {
    this.forceExitTimeoutMs = options.forceExitTimeoutMs ?? 45000;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  register(name: string, priority: number, handler: () => Promise<void>): void {
    this.handlers.push({ name, priority, handler });
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    logger.info('Graceful shutdown initiated');

    const timeout = setTimeout(() => {
      logger.error('Force exit timeout reached, exiting with error');
      this.exit(1);
    }, this.forceExitTimeoutMs);

    const sortedHandlers = [...this.handlers].sort((a, b) => a.priority - b.priority);
    let failed = false;

    for (const { name, handler } of sortedHandlers) {
      try {
        logger.info(`Running shutdown handler: ${name}`);
        await handler();
        logger.info(`Shutdown handler completed: ${name}`);
      } catch (error) {
        failed = true;
        logger.error({ err: error }, `Shutdown handler failed: ${name}`);
      }
    }

    clearTimeout(timeout);
    logger.info('Graceful shutdown completed');
    this.exit(failed ? 1 : 0);
  }

  listen(signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT']): void {
    for (const signal of signals) {
      process.once(signal, () => {
        logger.info({ signal }, 'Shutdown signal received');
        void this.shutdown();
      });
    }
  }
}
