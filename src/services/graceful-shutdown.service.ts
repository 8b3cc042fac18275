/**
 * Graceful Shutdown Service
 *
 * Captures SIGTERM / SIGINT, stops the HTTP server, lets in-flight
 * requests finish within a timeout and exits. A second, longer timer
 * forces the exit if shutdown hangs.
 */

import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';

export interface ShutdownConfig {
  /** Timeout in milliseconds to wait for the server to close */
  timeout: number;
  /** Force shutdown timeout in milliseconds (safety net) */
  forceTimeout: number;
  /** Stops accepting new requests and closes the server */
  onShutdownStart?: () => Promise<void>;
  /** Callback before final exit */
  onBeforeExit?: () => void | Promise<void>;
  logger?: StructuredLogger;
  exit?: (code: number) => void;
}

export class GracefulShutdownService {
  private isShuttingDown = false;
  private readonly shutdownConfig: ShutdownConfig;
  private readonly logger: StructuredLogger;
  private readonly exit: (code: number) => void;
  private shutdownTimeout?: NodeJS.Timeout;
  private forceShutdownTimeout?: NodeJS.Timeout;

  constructor(config: ShutdownConfig) {
    this.shutdownConfig = config;
    this.logger = config.logger ?? defaultLogger;
    this.exit = config.exit ?? ((code) => process.exit(code));
  }

  /**
   * Registers signal handlers for graceful shutdown
   */
  registerHandlers(): void {
    process.on('SIGTERM', () => {
      void this.shutdown('SIGTERM');
    });

    process.on('SIGINT', () => {
      void this.shutdown('SIGINT');
    });

    process.on('unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection', { error: reason });
      void this.shutdown('UNHANDLED_REJECTION', 1);
    });
  }

  /**
   * Runs the shutdown sequence once; later calls are ignored
   */
  async shutdown(signal: string, exitCode = 0): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress', { signal });
      return;
    }

    this.isShuttingDown = true;
    this.setupForceShutdownTimeout(this.shutdownConfig.forceTimeout);
    this.logger.shutdownStarted({ signal });

    const startTime = Date.now();

    try {
      const closed = await this.waitWithTimeout(this.shutdownConfig.onShutdownStart, this.shutdownConfig.timeout);
      if (!closed) {
        this.logger.warn(`Server did not close within ${this.formatDuration(this.shutdownConfig.timeout)}, in-flight requests may be cut`);
      }

      if (this.shutdownConfig.onBeforeExit) {
        await this.shutdownConfig.onBeforeExit();
      }

      this.logger.shutdownCompleted({ duration: Date.now() - startTime });
      this.clearTimers();
      this.exit(exitCode);
    } catch (error) {
      this.logger.error('Error during graceful shutdown, forcing exit', { error });
      this.clearTimers();
      this.exit(1);
    }
  }

  /**
   * Resolves true when the callback settles in time, false on timeout or error
   */
  private async waitWithTimeout(
    callback?: () => Promise<void>,
    timeoutMs: number = 10000
  ): Promise<boolean> {
    if (!callback) {
      return true;
    }

    return new Promise((resolve) => {
      let completed = false;

      this.shutdownTimeout = setTimeout(() => {
        if (!completed) {
          completed = true;
          resolve(false);
        }
      }, timeoutMs);

      callback()
        .then(() => {
          if (!completed) {
            completed = true;
            clearTimeout(this.shutdownTimeout);
            resolve(true);
          }
        })
        .catch((error: unknown) => {
          this.logger.error('Error while closing server', { error });
          if (!completed) {
            completed = true;
            clearTimeout(this.shutdownTimeout);
            resolve(false);
          }
        });
    });
  }

  /**
   * If graceful shutdown takes too long, force exit
   */
  private setupForceShutdownTimeout(timeoutMs: number): void {
    this.forceShutdownTimeout = setTimeout(() => {
      this.logger.error(`Force shutdown timeout (${this.formatDuration(timeoutMs)}) expired`);
      this.exit(1);
    }, timeoutMs);
    this.forceShutdownTimeout.unref();
  }

  private clearTimers(): void {
    clearTimeout(this.shutdownTimeout);
    clearTimeout(this.forceShutdownTimeout);
  }

  isShutdownInProgress(): boolean {
    return this.isShuttingDown;
  }

  private formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);

    if (minutes > 0) {
      return `${minutes}m ${seconds % 60}s`;
    } else {
      return `${seconds}s`;
    }
  }
}

/**
 * Creates a graceful shutdown service with default configuration
 */
export function createGracefulShutdown(customConfig?: Partial<ShutdownConfig>): GracefulShutdownService {
  const defaultConfig: ShutdownConfig = {
    timeout: 10000, // 10 seconds default
    forceTimeout: 20000, // 20 seconds default
    ...customConfig,
  };

  return new GracefulShutdownService(defaultConfig);
}
