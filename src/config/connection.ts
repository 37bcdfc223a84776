/**
 * Connection settings for the LXD server
 *
 * Each setting is resolved in priority order:
 * 1. Explicit option (CLI flag or library caller)
 * 2. Environment variable
 * 3. Default, with the snap socket preferred over the classic one when the
 *    default endpoint is requested and the snap socket exists
 */

import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

/** Classic LXD unix socket */
export const DEFAULT_URL = 'unix:/var/lib/lxd/unix.socket';

/** Socket used when LXD is installed from the snap */
export const DEFAULT_SNAP_URL = 'unix:/var/snap/lxd/common/lxd/unix.socket';

/** Newer servers expose /instances; older ones only /containers */
export const DEFAULT_INSTANCES_ENDPOINT = '/instances';

/** Environment variable names */
export const ENV_URL = 'LXD_URL';
export const ENV_SNAP_URL = 'LXD_SNAP_URL';
export const ENV_CLIENT_CERT = 'LXD_CLIENT_CERT';
export const ENV_CLIENT_KEY = 'LXD_CLIENT_KEY';
export const ENV_TRUST_PASSWORD = 'LXD_TRUST_PASSWORD';
export const ENV_INSTANCES_ENDPOINT = 'LXD_INSTANCES_ENDPOINT';

/**
 * Fully resolved connection settings
 */
export interface ConnectionConfig {
  /** `unix:<socket path>` or `https://host:port` */
  url: string;
  clientCert: string;
  clientKey: string;
  trustPassword?: string;
  /** Appended to /1.0 */
  instancesEndpoint: string;
}

/**
 * Options accepted by resolveConnection; anything unset falls through the chain
 */
export interface ConnectionOptions {
  url?: string;
  snapUrl?: string;
  clientCert?: string;
  clientKey?: string;
  trustPassword?: string;
  instancesEndpoint?: string;
}

/**
 * Injectable environment for tests
 */
export interface ConnectionEnvironment {
  env?: Record<string, string | undefined>;
  home?: string;
  exists?: (path: string) => boolean;
}

function firstDefined(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value !== '');
}

/**
 * Pick the server URL, falling back to the snap socket when it exists
 */
function resolveUrl(
  options: ConnectionOptions,
  env: Record<string, string | undefined>,
  exists: (path: string) => boolean
): string {
  const requested = firstDefined(options.url, env[ENV_URL]);
  if (requested !== undefined && requested !== DEFAULT_URL) {
    return requested;
  }

  const snapUrl = firstDefined(options.snapUrl, env[ENV_SNAP_URL]) ?? DEFAULT_SNAP_URL;
  if (exists(snapUrl.replace(/^unix:/, ''))) {
    return snapUrl;
  }

  return DEFAULT_URL;
}

/**
 * Resolve connection settings from options, environment and defaults
 */
export function resolveConnection(
  options: ConnectionOptions = {},
  environment: ConnectionEnvironment = {}
): ConnectionConfig {
  const env = environment.env ?? process.env;
  const home = environment.home ?? homedir();
  const exists = environment.exists ?? existsSync;

  const config: ConnectionConfig = {
    url: resolveUrl(options, env, exists),
    clientCert:
      firstDefined(options.clientCert, env[ENV_CLIENT_CERT]) ??
      join(home, '.config', 'lxc', 'client.crt'),
    clientKey:
      firstDefined(options.clientKey, env[ENV_CLIENT_KEY]) ??
      join(home, '.config', 'lxc', 'client.key'),
    instancesEndpoint:
      firstDefined(options.instancesEndpoint, env[ENV_INSTANCES_ENDPOINT]) ??
      DEFAULT_INSTANCES_ENDPOINT,
  };

  const trustPassword = firstDefined(options.trustPassword, env[ENV_TRUST_PASSWORD]);
  if (trustPassword !== undefined) {
    config.trustPassword = trustPassword;
  }

  return config;
}

/**
 * Describe the endpoint without secrets, for status output
 */
export function formatConnection(config: ConnectionConfig): string {
  return `${config.url} (/1.0${config.instancesEndpoint})`;
}
