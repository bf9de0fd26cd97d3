import { MuxPoolError, ErrorCode } from './base';

export class ConfigurationError extends MuxPoolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFIG_INVALID, message, details);
  }
}

export class ConfigTypeMismatchError extends MuxPoolError {
  constructor(
    configKey: string,
    expectedType: string,
    actualValue: string,
    details?: Record<string, unknown>
  ) {
    super(
      ErrorCode.CONFIG_TYPE_MISMATCH,
      `Configuration type mismatch for ${configKey}: expected ${expectedType}, got "${actualValue}"`,
      { configKey, expectedType, actualValue, ...details }
    );
  }
}
