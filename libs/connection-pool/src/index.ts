/**
 * Connection Pool Export Module
 * Per-authority pooling of multiplexed (http/2) transports
 */

// Core types and interfaces
export * from './types';

// Authority helpers
export { authorityFromUri, authorityKey, toUrl } from './authority';

// Per-transport state and idle eviction
export { ConnectionState, MIN_IDLE_TIMEOUT } from './connection-state';

// Manager
export {
  ConnectionManager,
  ConnectionManagerOptions,
  DRAIN_IDLE_TIMEOUT,
  createHttp2ConnectionManager
} from './connection-manager';

// Channel and transport adapters
export { NodeChannelFactory, ALPN_PROTOCOLS } from './node-channel-factory';
export { Http2Transport } from './http2-transport';
export { openProxyTunnel, buildConnectRequest } from './proxy-tunnel';

// Metrics and monitoring
export {
  ConnectionManagerMetricsCollector,
  MetricsSource,
  connectionManagerMetrics
} from './metrics';

// Configuration
export {
  RECOMMENDED_MIN_IDLE_TIMEOUT,
  ManagerEnvironment,
  developmentManagerConfig,
  testManagerConfig,
  productionManagerConfig,
  createManagerConfig,
  createManagerConfigFromEnv,
  createProxyHook,
  parseProxyUrl,
  bypassesProxy,
  validateManagerConfig
} from './config';

// Version information
export const VERSION = '1.0.0';
