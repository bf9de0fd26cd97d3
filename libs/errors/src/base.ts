export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = 1001,
  CONFIG_TYPE_MISMATCH = 1003,

  // Target errors (2xxx)
  INVALID_TARGET = 2001,

  // Manager errors (3xxx)
  MANAGER_CLOSED = 3001,

  // Establishment errors (4xxx)
  CONNECT_TIMEOUT = 4001,
  PROXY_TUNNEL_FAILED = 4002,
  BAD_CERTIFICATE = 4003
}

export abstract class MuxPoolError extends Error {
  public readonly timestamp: Date;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack
    };
  }
}
