/**
 * Shared types and interfaces for the lxd-reconcile CLI
 */

import type { ConnectionConfig } from './config/connection.js';
import type { LxdClient, LxdClientConfig } from './api/client.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 *
 * Kept a type alias: it must stay assignable to commander's OptionValues.
 */
export type GlobalOptions = {
  /** `unix:<socket>` or `https://host:port` */
  url?: string;
  clientCert?: string;
  clientKey?: string;
  trustPassword?: string;
  instancesEndpoint?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
  /** Attach the request log to results */
  debug: boolean;
};

export type OutputFormat = 'human' | 'json';

/**
 * Builds the LXD client; replaced in tests
 */
export type ClientFactory = (config: LxdClientConfig) => LxdClient;

/**
 * Context passed to every command
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Resolved server connection */
  connection: ConnectionConfig;
  createClient: ClientFactory;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
