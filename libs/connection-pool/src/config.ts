/**
 * Connection Manager Configuration
 * Presets for different deployment scenarios plus environment overrides
 */

import { Logger } from 'pino';
import { ConfigTypeMismatchError, ConfigurationError } from '@muxpool/errors';
import { MIN_IDLE_TIMEOUT } from './connection-state';
import { ClientCreateHook, ManagerConfig, ProxyTarget } from './types';

/** Below this, http/2 connections rarely survive long enough to be reused */
export const RECOMMENDED_MIN_IDLE_TIMEOUT = 1000;

export type ManagerEnvironment = 'development' | 'test' | 'production';

// Development configuration - short-lived connections, generous connect timeout
export const developmentManagerConfig: ManagerConfig = {
  idleTimeout: 1000,
  connectTimeout: 30000
};

export const testManagerConfig: ManagerConfig = {
  idleTimeout: 1000,
  connectTimeout: 5000
};

// Production configuration - keep connections warm between bursts
export const productionManagerConfig: ManagerConfig = {
  idleTimeout: 15000,
  connectTimeout: 10000
};

// Configuration factory function
export function createManagerConfig(environment: ManagerEnvironment): ManagerConfig {
  switch (environment) {
    case 'development':
      return { ...developmentManagerConfig };
    case 'test':
      return { ...testManagerConfig };
    case 'production':
      return { ...productionManagerConfig };
    default:
      throw new ConfigurationError(`Unknown environment: ${String(environment)}`);
  }
}

function isManagerEnvironment(value: string): value is ManagerEnvironment {
  return value === 'development' || value === 'test' || value === 'production';
}

function parseMilliseconds(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigTypeMismatchError(key, 'integer', raw);
  }
  return Number(raw.trim());
}

export function parseProxyUrl(value: string): ProxyTarget {
  let url: URL;
  try {
    url = new URL(value.includes('://') ? value : `http://${value}`);
  } catch {
    throw new ConfigurationError(`Invalid proxy URL: ${value}`, { proxy: value });
  }

  const port = url.port ? Number(url.port) : url.protocol === 'https:' ? 443 : 80;
  const proxy: ProxyTarget = { host: url.hostname, port };

  if (url.username) {
    const username = decodeURIComponent(url.username);
    const password = decodeURIComponent(url.password);
    proxy.userInfo = password ? `${username}:${password}` : username;
  }

  return proxy;
}

/**
 * `NO_PROXY` matching: exact host, domain suffix (`.example.com` or
 * `example.com` both cover `api.example.com`), optional `:port`, or `*`.
 */
export function bypassesProxy(noProxy: string | undefined, host: string, port: number): boolean {
  if (!noProxy) {
    return false;
  }

  return noProxy
    .split(',')
    .map(entry => entry.trim().toLowerCase())
    .filter(entry => entry.length > 0)
    .some(entry => {
      if (entry === '*') {
        return true;
      }

      const [entryHost, entryPort] = entry.split(':');
      if (entryPort !== undefined && Number(entryPort) !== port) {
        return false;
      }

      const domain = entryHost.replace(/^\*?\./, '');
      const target = host.toLowerCase();
      return target === domain || target.endsWith(`.${domain}`);
    });
}

export function createProxyHook(proxy: ProxyTarget, noProxy?: string): ClientCreateHook {
  return (uri, setting) => {
    const port = uri.port ? Number(uri.port) : uri.protocol === 'http:' ? 80 : 443;
    if (bypassesProxy(noProxy, uri.hostname, port)) {
      return;
    }
    setting.proxy = { ...proxy };
  };
}

// Environment-specific configuration with environment variables
export function createManagerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ManagerConfig {
  const nodeEnv = env.NODE_ENV ?? 'development';
  const config = createManagerConfig(isManagerEnvironment(nodeEnv) ? nodeEnv : 'development');

  const idleTimeout = parseMilliseconds(env, 'MUXPOOL_IDLE_TIMEOUT_MS');
  if (idleTimeout !== undefined) {
    config.idleTimeout = idleTimeout;
  }

  const connectTimeout = parseMilliseconds(env, 'MUXPOOL_CONNECT_TIMEOUT_MS');
  if (connectTimeout !== undefined) {
    config.connectTimeout = connectTimeout;
  }

  const proxyUrl = env.HTTPS_PROXY || env.https_proxy;
  if (proxyUrl) {
    config.onClientCreate = createProxyHook(parseProxyUrl(proxyUrl), env.NO_PROXY || env.no_proxy);
  }

  return config;
}

export function validateManagerConfig(config: ManagerConfig, logger: Logger): ManagerConfig {
  if (!Number.isFinite(config.idleTimeout) || config.idleTimeout <= 0) {
    throw new ConfigurationError('idleTimeout must be a positive number of milliseconds', {
      idleTimeout: config.idleTimeout
    });
  }

  if (!Number.isFinite(config.connectTimeout)) {
    throw new ConfigurationError('connectTimeout must be a finite number', {
      connectTimeout: config.connectTimeout
    });
  }

  if (config.idleTimeout < MIN_IDLE_TIMEOUT) {
    logger.warn(
      { idleTimeout: config.idleTimeout, applied: MIN_IDLE_TIMEOUT },
      'idleTimeout is below the hard floor and will be raised'
    );
  } else if (config.idleTimeout < RECOMMENDED_MIN_IDLE_TIMEOUT) {
    logger.warn(
      { idleTimeout: config.idleTimeout, recommended: RECOMMENDED_MIN_IDLE_TIMEOUT },
      'idleTimeout is below the recommended minimum; connections may close before they are reused'
    );
  }

  return config;
}
