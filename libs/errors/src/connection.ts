import { MuxPoolError, ErrorCode } from './base';

export class InvalidTargetError extends MuxPoolError {
  constructor(target: string, cause?: Error) {
    super(ErrorCode.INVALID_TARGET, `Invalid connection target: ${target}`, { target }, cause);
  }
}

export class ManagerClosedError extends MuxPoolError {
  constructor(details?: Record<string, unknown>) {
    super(
      ErrorCode.MANAGER_CLOSED,
      "Can't establish connection after the connection manager was closed",
      details
    );
  }
}

/**
 * Base class for failures while creating a new transport for an authority.
 */
export class EstablishmentError extends MuxPoolError {
  constructor(
    code: ErrorCode,
    message: string,
    public readonly authority: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(code, message, { authority, ...details }, cause);
  }
}

export class ConnectTimeoutError extends EstablishmentError {
  constructor(
    authority: string,
    public readonly timeoutMs: number,
    cause?: Error
  ) {
    super(
      ErrorCode.CONNECT_TIMEOUT,
      `Connecting to ${authority} timed out [${timeoutMs}ms]`,
      authority,
      { timeoutMs },
      cause
    );
  }
}

export class ProxyTunnelFailedError extends EstablishmentError {
  constructor(
    authority: string,
    proxy: string,
    public readonly statusLine?: string,
    cause?: Error
  ) {
    super(
      ErrorCode.PROXY_TUNNEL_FAILED,
      statusLine !== undefined
        ? `Proxy ${proxy} refused tunnel to ${authority}: ${statusLine}`
        : `Proxy ${proxy} cannot be initialized for ${authority}`,
      authority,
      { proxy, statusLine },
      cause
    );
  }
}

export class BadCertificateError extends EstablishmentError {
  constructor(authority: string, reason: string) {
    super(
      ErrorCode.BAD_CERTIFICATE,
      `Certificate for ${authority} rejected: ${reason}`,
      authority,
      { reason }
    );
  }
}
