/**
 * Graceful Shutdown Handler
 *
 * Handles process termination signals for clean shutdown:
 * - SIGTERM: container/pod termination
 * - SIGINT: Ctrl+C during development
 *
 * Ensures an in-flight call is torn down (room deleted, session closed)
 * before the worker process exits.
 */

import { logger as rootLogger } from './logging.js';

const logger = rootLogger.child('shutdown');

export type ShutdownCallback = () => Promise<void>;

export interface ShutdownManagerOptions {
  /** Hard limit for all callbacks together */
  timeoutMs?: number;
  installSignalHandlers?: boolean;
  exit?: (code: number) => void;
}

export class ShutdownManager {
  private callbacks: ShutdownCallback[] = [];
  private isShuttingDown = false;
  private shutdownTimeout: number;
  private exit: (code: number) => void;

  constructor(options: ShutdownManagerOptions = {}) {
    this.shutdownTimeout = options.timeoutMs ?? 30000;
    this.exit = options.exit ?? ((code: number) => process.exit(code));
    if (options.installSignalHandlers ?? true) {
      this.setupSignalHandlers();
    }
  }

  /**
   * Register a callback to be called during shutdown.
   * Returns a function that unregisters it.
   */
  register(callback: ShutdownCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      this.callbacks = this.callbacks.filter(cb => cb !== callback);
    };
  }

  private setupSignalHandlers(): void {
    process.on('SIGTERM', () => {
      void this.shutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
      void this.shutdown('SIGINT');
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled rejection', {
        reason: reason instanceof Error ? reason.message : String(reason),
      });
    });
  }

  /**
   * Execute graceful shutdown. Runs at most once.
   */
  async shutdown(signal: string, exitCode: number = 0): Promise<void> {
    if (this.isShuttingDown) {
      logger.warning('Shutdown already in progress, ignoring signal', { signal });
      return;
    }

    this.isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown...`);

    const timeoutId = setTimeout(() => {
      logger.error('Shutdown timeout exceeded, forcing exit');
      this.exit(1);
    }, this.shutdownTimeout);

    for (const callback of this.callbacks) {
      try {
        await callback();
      } catch (error) {
        logger.error('Error during shutdown callback', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    clearTimeout(timeoutId);
    logger.info('Graceful shutdown completed');
    this.exit(exitCode);
  }
}

let instance: ShutdownManager | null = null;

/**
 * Process-wide manager, created on first use
 */
export function getShutdownManager(): ShutdownManager {
  if (!instance) {
    instance = new ShutdownManager();
  }
  return instance;
}

/**
 * Register a shutdown callback
 */
export function onShutdown(callback: ShutdownCallback): () => void {
  return getShutdownManager().register(callback);
}
