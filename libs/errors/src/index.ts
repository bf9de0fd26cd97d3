// Base error classes
import { ErrorCode, MuxPoolError } from './base';
export { ErrorCode, MuxPoolError } from './base';

// Configuration errors
export {
  ConfigurationError,
  ConfigTypeMismatchError
} from './configuration';

// Connection errors
export {
  InvalidTargetError,
  ManagerClosedError,
  EstablishmentError,
  ConnectTimeoutError,
  ProxyTunnelFailedError,
  BadCertificateError
} from './connection';

// Utility function to check if an error is a MuxPoolError
export function isMuxPoolError(error: unknown): error is MuxPoolError {
  return error instanceof MuxPoolError;
}

// Utility function to get error code from any error
export function getErrorCode(error: unknown): ErrorCode | null {
  if (isMuxPoolError(error)) {
    return error.code;
  }
  return null;
}
