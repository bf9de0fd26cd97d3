/**
 * Connection Pool Types and Interfaces
 * Provides typed interfaces for multiplexed transport pooling
 */

import { Duplex } from 'stream';
import { PeerCertificate, SecureContext } from 'tls';

export interface Authority {
  host: string;
  port: number;
}

/**
 * A multiplexed connection that can carry many concurrent streams.
 */
export interface Transport {
  readonly isOpen: boolean;
  /** Graceful close; must be safe to call more than once. */
  finish(): void;
  /**
   * Fires whenever the number of open streams moves between zero and non-zero.
   * Returns a function that removes the listener.
   */
  onActiveStateChanged(listener: (isActive: boolean) => void): () => void;
}

export interface ProxyTarget {
  host: string;
  port: number;
  /** `user:password`, sent as Basic credentials when non-empty */
  userInfo?: string;
}

/**
 * Per-attempt settings, filled in by the `onClientCreate` hook.
 */
export interface ClientSetting {
  context?: SecureContext;
  onBadCertificate?: (certificate: PeerCertificate) => boolean;
  proxy?: ProxyTarget;
}

export type ClientCreateHook = (uri: URL, setting: ClientSetting) => void;

export interface ConnectionRequest {
  uri: string | URL;
  /** Milliseconds; <= 0 means no timeout. Falls back to the manager's connectTimeout */
  connectTimeout?: number;
}

export interface ChannelFactory {
  connectSecure(target: Authority, setting: ClientSetting, timeout: number): Promise<Duplex>;
  connectPlain(host: string, port: number, timeout: number): Promise<Duplex>;
  upgrade(socket: Duplex, targetHost: string, setting: ClientSetting): Promise<Duplex>;
}

export type TransportFactory<T extends Transport> = (channel: Duplex, authority: Authority) => T;

export interface ManagerConfig {
  /** Idle timeout in milliseconds; should not be less than 1000 for reuse to pay off */
  idleTimeout: number;
  /** Default connect timeout used when a request does not carry its own */
  connectTimeout: number;
  onClientCreate?: ClientCreateHook;
}

// Manager events
export type ManagerEventType =
  | 'connection_created'
  | 'connection_reused'
  | 'connection_deduplicated'
  | 'connection_evicted'
  | 'connection_removed'
  | 'connection_failed'
  | 'manager_closed';

export interface ManagerEvent {
  type: ManagerEventType;
  authority?: string;
  data?: {
    establishmentTime?: number;
    errorType?: string;
    reason?: string;
    force?: boolean;
  };
  timestamp: number;
}

export interface ManagerStats {
  cachedConnections: number;
  activeConnections: number;
  idleConnections: number;
  pendingAttempts: number;
  closed: boolean;
  forceClosed: boolean;
  authorities: string[];
}
