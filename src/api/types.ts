/**
 * Wire types for the LXD REST API
 *
 * Only the parts of the instance and operation payloads the reconciler reads
 * are modelled. See https://documentation.ubuntu.com/lxd/en/latest/rest-api/
 */

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods used against the API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Response envelope shared by every endpoint
 */
export interface LxdEnvelope<T = unknown> {
  type: 'sync' | 'async' | 'error';
  status?: string;
  status_code?: number;
  /** Operation URL for async responses */
  operation?: string;
  error_code?: number;
  error?: string;
  metadata: T;
}

/**
 * Background operation returned by async requests
 */
export interface LxdOperation {
  id: string;
  class?: string;
  status: string;
  status_code: number;
  err?: string;
  metadata?: Record<string, unknown> | null;
}

// =============================================================================
// Instance Types
// =============================================================================

/**
 * Instance runtime status as reported by the server
 */
export type LxdInstanceStatus = 'Running' | 'Stopped' | 'Frozen';

/**
 * Device definition: free-form string properties keyed by property name
 */
export type LxdDevice = Record<string, string>;

/**
 * GET /1.0/instances/<name> metadata
 */
export interface InstanceMetadata {
  name: string;
  status: string;
  status_code?: number;
  type?: string;
  architecture?: string;
  config?: Record<string, string>;
  devices?: Record<string, LxdDevice>;
  ephemeral?: boolean;
  profiles?: string[];
  location?: string;
  [key: string]: unknown;
}

/**
 * A single address on an instance network interface
 */
export interface InstanceNetworkAddress {
  family: 'inet' | 'inet6' | string;
  address: string;
  netmask?: string;
  scope?: string;
}

/**
 * A network interface as reported in the instance state
 */
export interface InstanceNetwork {
  addresses: InstanceNetworkAddress[];
  hwaddr?: string;
  state?: string;
  type?: string;
}

/**
 * GET /1.0/instances/<name>/state metadata
 */
export interface InstanceStateMetadata {
  status: string;
  status_code?: number;
  network: Record<string, InstanceNetwork> | null;
  pid?: number;
}

/**
 * State change actions accepted by PUT /1.0/instances/<name>/state
 */
export type StateAction = 'start' | 'stop' | 'restart' | 'freeze' | 'unfreeze';

/**
 * Body of a state change request
 */
export interface StateChangeRequest {
  action: StateAction;
  /** Seconds the server waits for the action before failing it */
  timeout: number;
  force?: boolean;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs?: number;
  /** Jitter factor 0-1 (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes that trigger retry */
  retryableStatuses?: number[];
}

/**
 * Retry result with metadata
 */
export interface RetryResult<T> {
  success: boolean;
  data?: T;
  error?: Error;
  attempts: number;
  totalTimeMs: number;
}

/**
 * Record of one request/response pair, kept when the client runs in debug mode
 */
export interface RequestLogEntry {
  type: 'sent request';
  request: {
    method: HttpMethod;
    url: string;
    json?: unknown;
  };
  response: {
    status?: number;
    json?: unknown;
  };
}
