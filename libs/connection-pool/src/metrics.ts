/**
 * Connection Manager Metrics Integration
 * Prometheus metrics for connection manager monitoring
 */

import { Counter, Gauge, Histogram, register } from 'prom-client';
import { Logger } from 'pino';
import { ManagerEvent, ManagerEventType, ManagerStats } from './types';

// Metrics definitions
export const connectionManagerMetrics = {
  // Connection counts
  cachedConnections: new Gauge({
    name: 'muxpool_connections_cached',
    help: 'Number of transports held in the cache',
    labelNames: ['manager']
  }),

  activeConnections: new Gauge({
    name: 'muxpool_connections_active',
    help: 'Number of cached transports with open streams',
    labelNames: ['manager']
  }),

  pendingAttempts: new Gauge({
    name: 'muxpool_pending_attempts',
    help: 'Number of connection attempts in flight',
    labelNames: ['manager']
  }),

  // Connection lifecycle
  connectionsCreated: new Counter({
    name: 'muxpool_connections_created_total',
    help: 'Total number of transports established',
    labelNames: ['manager', 'authority']
  }),

  connectionsReused: new Counter({
    name: 'muxpool_connections_reused_total',
    help: 'Total number of requests served by a cached transport',
    labelNames: ['manager', 'authority']
  }),

  connectionsDeduplicated: new Counter({
    name: 'muxpool_connections_deduplicated_total',
    help: 'Total number of requests that joined an in-flight attempt',
    labelNames: ['manager', 'authority']
  }),

  connectionsEvicted: new Counter({
    name: 'muxpool_connections_evicted_total',
    help: 'Total number of transports closed after going idle',
    labelNames: ['manager', 'authority']
  }),

  connectionsRemoved: new Counter({
    name: 'muxpool_connections_removed_total',
    help: 'Total number of transports removed by callers',
    labelNames: ['manager', 'authority']
  }),

  establishmentDuration: new Histogram({
    name: 'muxpool_establishment_duration_seconds',
    help: 'Time spent establishing new transports',
    labelNames: ['manager', 'authority'],
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30]
  }),

  // Error metrics
  establishmentFailures: new Counter({
    name: 'muxpool_establishment_failures_total',
    help: 'Total number of failed connection attempts',
    labelNames: ['manager', 'authority', 'error_type']
  })
};

const TRACKED_EVENTS: ManagerEventType[] = [
  'connection_created',
  'connection_reused',
  'connection_deduplicated',
  'connection_evicted',
  'connection_removed',
  'connection_failed'
];

/**
 * Anything that emits manager events and reports stats.
 */
export interface MetricsSource {
  on(event: ManagerEventType, listener: (event: ManagerEvent) => void): unknown;
  off(event: ManagerEventType, listener: (event: ManagerEvent) => void): unknown;
  getStats(): ManagerStats;
}

export class ConnectionManagerMetricsCollector {
  private logger: Logger;
  private metricsInterval: number;
  private intervalId?: NodeJS.Timeout;
  private detach?: () => void;

  constructor(
    private readonly managerName: string,
    logger: Logger,
    metricsInterval: number = 30000
  ) {
    this.logger = logger.child({ component: 'ManagerMetricsCollector', manager: managerName });
    this.metricsInterval = metricsInterval;
  }

  /**
   * Subscribe to manager events and poll its stats
   */
  startCollection(source: MetricsSource): void {
    if (this.intervalId) {
      this.logger.warn('Metrics collection already started');
      return;
    }

    const listener = (event: ManagerEvent) => this.handleManagerEvent(event);
    for (const type of TRACKED_EVENTS) {
      source.on(type, listener);
    }
    this.detach = () => {
      for (const type of TRACKED_EVENTS) {
        source.off(type, listener);
      }
    };

    this.intervalId = setInterval(() => {
      try {
        this.updateMetrics(source.getStats());
      } catch (error) {
        this.logger.error({ error }, 'Error collecting manager metrics');
      }
    }, this.metricsInterval);

    this.logger.info({ interval: this.metricsInterval }, 'Started metrics collection');
  }

  /**
   * Stop collecting metrics
   */
  stopCollection(): void {
    this.detach?.();
    this.detach = undefined;

    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.info('Stopped metrics collection');
    }
  }

  /**
   * Handle manager events for real-time metrics
   */
  handleManagerEvent(event: ManagerEvent): void {
    const labels = { manager: this.managerName, authority: event.authority ?? 'unknown' };

    switch (event.type) {
      case 'connection_created':
        connectionManagerMetrics.connectionsCreated.inc(labels);
        if (event.data?.establishmentTime !== undefined) {
          connectionManagerMetrics.establishmentDuration.observe(labels, event.data.establishmentTime / 1000);
        }
        break;

      case 'connection_reused':
        connectionManagerMetrics.connectionsReused.inc(labels);
        break;

      case 'connection_deduplicated':
        connectionManagerMetrics.connectionsDeduplicated.inc(labels);
        break;

      case 'connection_evicted':
        connectionManagerMetrics.connectionsEvicted.inc(labels);
        break;

      case 'connection_removed':
        connectionManagerMetrics.connectionsRemoved.inc(labels);
        break;

      case 'connection_failed':
        connectionManagerMetrics.establishmentFailures.inc({
          ...labels,
          error_type: event.data?.errorType ?? 'unknown'
        });
        break;
    }
  }

  /**
   * Update gauges from manager stats
   */
  updateMetrics(stats: ManagerStats): void {
    const labels = { manager: this.managerName };

    connectionManagerMetrics.cachedConnections.set(labels, stats.cachedConnections);
    connectionManagerMetrics.activeConnections.set(labels, stats.activeConnections);
    connectionManagerMetrics.pendingAttempts.set(labels, stats.pendingAttempts);
  }

  /**
   * Get all metrics for export
   */
  async getMetrics(): Promise<string> {
    return register.metrics();
  }

  /**
   * Reset all metric values (useful for testing)
   */
  resetMetrics(): void {
    register.resetMetrics();
  }
}
