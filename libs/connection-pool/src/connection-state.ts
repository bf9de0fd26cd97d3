/**
 * Connection State
 * Tracks activity of one pooled transport and closes it once it has been
 * idle for the whole idle window.
 */

import { Logger } from 'pino';
import { Transport } from './types';

export const MIN_IDLE_TIMEOUT = 100;

export class ConnectionState<T extends Transport> {
  isActive: boolean = true;
  latestIdleTimestamp: number = Date.now();

  private timer?: NodeJS.Timeout;
  private disposed: boolean = false;
  private readonly unsubscribe: () => void;

  constructor(
    readonly transport: T,
    private readonly logger: Logger
  ) {
    this.unsubscribe = transport.onActiveStateChanged((isActive) => {
      if (this.disposed) {
        return;
      }
      this.isActive = isActive;
      if (!isActive) {
        this.latestIdleTimestamp = Date.now();
      }
    });
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Hand the transport out to a caller. Counts as activity.
   */
  markActive(): T {
    this.isActive = true;
    this.latestIdleTimestamp = Date.now();
    return this.transport;
  }

  /**
   * Arm the idle-eviction timer. `onIdle` runs once the transport has been
   * inactive for at least `idleTimeout` milliseconds.
   */
  delayClose(idleTimeout: number, onIdle: () => void): void {
    const timeout = Math.max(idleTimeout, MIN_IDLE_TIMEOUT);
    this.schedule(timeout, timeout, onIdle);
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.unsubscribe();

    try {
      this.transport.finish();
    } catch (error) {
      // finishing an already-broken transport
      this.logger.debug({ error }, 'Error finishing transport during dispose');
    }
  }

  private schedule(delay: number, idleTimeout: number, onIdle: () => void): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      if (this.disposed) {
        return;
      }

      if (this.isActive) {
        this.schedule(idleTimeout, idleTimeout, onIdle);
        return;
      }

      const elapsed = Date.now() - this.latestIdleTimestamp;
      if (elapsed >= idleTimeout) {
        onIdle();
        return;
      }
      this.schedule(idleTimeout - elapsed, idleTimeout, onIdle);
    }, delay);
  }
}
