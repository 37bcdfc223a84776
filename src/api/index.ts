/**
 * LXD API client module
 *
 * Provides:
 * - LxdClient implementing the reconciler's control-plane interface
 * - Retry logic with exponential backoff for reads
 * - Error taxonomy shared with the reconciler
 * - Logging with secret redaction
 */

// Main client
export { createClient, parseEnvelope, isInstanceMetadata, isInstanceState } from './client.js';
export type { LxdClient, LxdClientConfig, FetchLike } from './client.js';

// Errors
export {
  ControlPlaneError,
  TransportError,
  ApiError,
  AddressTimeoutError,
  toError,
} from './errors.js';
export type { ControlPlaneErrorCode } from './errors.js';

// Retry utilities
export {
  withRetry,
  calculateDelay,
  isRetryableError,
  sleep,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';
export type { RetryOptions } from './retry.js';

// Logger utilities
export {
  logger,
  createLogger,
  parseLogLevel,
  ApiLogger,
  redactPatterns,
  redactObject,
} from './logger.js';
export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  HttpMethod,
  LxdEnvelope,
  LxdOperation,
  LxdInstanceStatus,
  LxdDevice,
  InstanceMetadata,
  InstanceNetworkAddress,
  InstanceNetwork,
  InstanceStateMetadata,
  StateAction,
  StateChangeRequest,
  RetryConfig,
  RetryResult,
  RequestLogEntry,
} from './types.js';
