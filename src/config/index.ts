/**
 * Configuration module exports
 */

export {
  resolveConnection,
  formatConnection,
  DEFAULT_URL,
  DEFAULT_SNAP_URL,
  DEFAULT_INSTANCES_ENDPOINT,
  ENV_URL,
  ENV_SNAP_URL,
  ENV_CLIENT_CERT,
  ENV_CLIENT_KEY,
  ENV_TRUST_PASSWORD,
  ENV_INSTANCES_ENDPOINT,
  type ConnectionConfig,
  type ConnectionOptions,
  type ConnectionEnvironment,
} from './connection.js';
