/**
 * Connection Manager
 * Caches one multiplexed transport per authority, shares in-flight
 * connection attempts and evicts idle transports
 */

import { EventEmitter } from 'events';
import { Duplex } from 'stream';
import { Logger } from 'pino';
import { ConnectTimeoutError, ManagerClosedError } from '@muxpool/errors';
import { authorityFromUri, authorityKey, toUrl } from './authority';
import { validateManagerConfig } from './config';
import { ConnectionState } from './connection-state';
import { Http2Transport } from './http2-transport';
import { NodeChannelFactory } from './node-channel-factory';
import { openProxyTunnel } from './proxy-tunnel';
import {
  Authority,
  ChannelFactory,
  ClientSetting,
  ConnectionRequest,
  ManagerConfig,
  ManagerEvent,
  ManagerEventType,
  ManagerStats,
  ProxyTarget,
  Transport,
  TransportFactory
} from './types';

/** Idle timeout given to connections established while the manager drains */
export const DRAIN_IDLE_TIMEOUT = 50;

export interface ConnectionManagerOptions<T extends Transport> {
  config: ManagerConfig;
  transportFactory: TransportFactory<T>;
  channelFactory?: ChannelFactory;
}

function isTimeoutError(error: unknown): error is Error {
  if (!(error instanceof Error)) {
    return false;
  }
  return ('code' in error && error.code === 'ETIMEDOUT') || /timed out/i.test(error.message);
}

function hasProxy(setting: ClientSetting): setting is ClientSetting & { proxy: ProxyTarget } {
  return setting.proxy !== undefined;
}

export class ConnectionManager<T extends Transport> extends EventEmitter {
  private logger: Logger;
  private config: ManagerConfig;
  private transportFactory: TransportFactory<T>;
  private channelFactory: ChannelFactory;

  private cache: Map<string, ConnectionState<T>> = new Map();
  private pending: Map<string, Promise<ConnectionState<T>>> = new Map();
  private closed: boolean = false;
  private forceClosed: boolean = false;

  constructor(options: ConnectionManagerOptions<T>, logger: Logger) {
    super();
    this.logger = logger.child({ component: 'ConnectionManager' });
    this.config = validateManagerConfig(options.config, this.logger);
    this.transportFactory = options.transportFactory;
    this.channelFactory = options.channelFactory ?? new NodeChannelFactory(this.logger);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async getConnection(request: ConnectionRequest): Promise<T> {
    if (this.closed) {
      throw new ManagerClosedError();
    }

    const uri = toUrl(request.uri);
    const authority = authorityFromUri(uri);
    const key = authorityKey(authority);

    const cached = this.cache.get(key);
    if (cached) {
      if (cached.transport.isOpen) {
        this.emitEvent('connection_reused', key);
        return cached.markActive();
      }

      // The transport went away behind our back; replace it
      this.logger.debug({ authority: key }, 'Cached transport is closed, reconnecting');
      this.cache.delete(key);
      cached.dispose();
    }

    let attempt = this.pending.get(key);
    if (attempt) {
      this.emitEvent('connection_deduplicated', key);
    } else {
      const created: Promise<ConnectionState<T>> = this.establish(uri, authority, request)
        .finally(() => {
          if (this.pending.get(key) === created) {
            this.pending.delete(key);
          }
        });
      attempt = created;
      this.pending.set(key, attempt);
    }

    const state = await attempt;
    return state.markActive();
  }

  /**
   * Drop the cache entry holding `transport` and finish it.
   */
  removeConnection(transport: T): void {
    for (const [key, state] of this.cache) {
      if (state.transport === transport) {
        this.cache.delete(key);
        state.dispose();
        this.emitEvent('connection_removed', key);
        return;
      }
    }
  }

  /**
   * Stop handing out connections. Without `force`, cached connections keep
   * running and any connection established from now on gets a short idle
   * timeout; with `force`, every cached connection is finished immediately.
   */
  close(force: boolean = false): void {
    this.closed = true;
    this.forceClosed = force;
    this.logger.info({ force, cached: this.cache.size, pending: this.pending.size }, 'Closing connection manager');

    if (force) {
      for (const state of this.cache.values()) {
        state.dispose();
      }
      this.cache.clear();
    }

    this.emitEvent('manager_closed', undefined, { force });
  }

  getStats(): ManagerStats {
    const states = Array.from(this.cache.values());
    const activeConnections = states.filter(state => state.isActive).length;

    return {
      cachedConnections: states.length,
      activeConnections,
      idleConnections: states.length - activeConnections,
      pendingAttempts: this.pending.size,
      closed: this.closed,
      forceClosed: this.forceClosed,
      authorities: Array.from(this.cache.keys())
    };
  }

  private async establish(uri: URL, authority: Authority, request: ConnectionRequest): Promise<ConnectionState<T>> {
    const key = authorityKey(authority);
    const startTime = Date.now();

    let state: ConnectionState<T>;
    try {
      state = await this.connect(uri, authority, request);
    } catch (error) {
      this.logger.warn({ authority: key, error }, 'Failed to establish connection');
      this.emitEvent('connection_failed', key, {
        errorType: error instanceof Error ? error.name : 'unknown'
      });
      throw error;
    }

    if (this.forceClosed) {
      // never publish a connection that outlived a forced shutdown
      state.dispose();
      throw new ManagerClosedError({ authority: key });
    }

    this.cache.set(key, state);
    this.logger.debug({ authority: key }, 'Connection established');
    this.emitEvent('connection_created', key, { establishmentTime: Date.now() - startTime });

    return state;
  }

  private async connect(uri: URL, authority: Authority, request: ConnectionRequest): Promise<ConnectionState<T>> {
    const key = authorityKey(authority);
    const setting: ClientSetting = {};
    this.config.onClientCreate?.(uri, setting);

    const timeout = request.connectTimeout ?? this.config.connectTimeout;
    let channel: Duplex;
    try {
      channel = hasProxy(setting)
        ? await openProxyTunnel(authority, setting, timeout, this.channelFactory)
        : await this.channelFactory.connectSecure(authority, setting, timeout);
    } catch (error) {
      if (isTimeoutError(error) && !(error instanceof ConnectTimeoutError)) {
        throw new ConnectTimeoutError(key, timeout, error);
      }
      throw error;
    }

    let transport: T;
    try {
      transport = this.transportFactory(channel, authority);
    } catch (error) {
      channel.destroy();
      throw error;
    }

    const state = new ConnectionState(transport, this.logger);
    state.delayClose(this.closed ? DRAIN_IDLE_TIMEOUT : this.config.idleTimeout, () => {
      if (this.cache.get(key) === state) {
        this.cache.delete(key);
      }
      state.dispose();
      this.logger.debug({ authority: key }, 'Evicted idle connection');
      this.emitEvent('connection_evicted', key);
    });

    return state;
  }

  private emitEvent(type: ManagerEventType, authority?: string, data?: ManagerEvent['data']): void {
    const event: ManagerEvent = { type, authority, data, timestamp: Date.now() };
    this.emit(type, event);
  }
}

export function createHttp2ConnectionManager(config: ManagerConfig, logger: Logger): ConnectionManager<Http2Transport> {
  return new ConnectionManager<Http2Transport>(
    {
      config,
      transportFactory: (channel, authority) => Http2Transport.viaSocket(channel, authority, logger)
    },
    logger
  );
}
