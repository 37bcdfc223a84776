#!/usr/bin/env node
/**
 * lxd-reconcile CLI - Converge LXD instances toward a declared state
 *
 * Commands:
 * - apply: reconcile an instance from its manifest
 * - plan: show what apply would do, without changing anything
 * - status: show the observed state of an instance
 */

import { Command, Option } from 'commander';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import { applyCommand, planCommand, statusCommand } from './commands/index.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';
import { withInterrupt } from './utils/interrupt.js';
import {
  resolveConnection,
  formatConnection,
  ENV_URL,
  ENV_CLIENT_CERT,
  ENV_CLIENT_KEY,
  ENV_TRUST_PASSWORD,
  ENV_INSTANCES_ENDPOINT,
} from './config/index.js';
import { createClient } from './api/client.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  const connection = resolveConnection({
    url: options.url,
    clientCert: options.clientCert,
    clientKey: options.clientKey,
    trustPassword: options.trustPassword,
    instancesEndpoint: options.instancesEndpoint,
  });

  verboseLog(`Server: ${formatConnection(connection)}`, options.verbose);

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    connection,
    createClient,
  };
}

/**
 * Print the result and exit with its status
 */
function finish<T>(ctx: CommandContext, result: CommandResult<T>): never {
  printResult(result, ctx.outputFormat);
  process.exit(result.success ? 0 : 1);
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('lxd-reconcile')
  .description('Converge LXD instances toward a declared state')
  .version(VERSION)
  .addOption(
    new Option('--url <url>', 'LXD server: unix:<socket path> or https://host:port').env(ENV_URL)
  )
  .addOption(
    new Option('--client-cert <path>', 'Client certificate for HTTPS').env(ENV_CLIENT_CERT)
  )
  .addOption(new Option('--client-key <path>', 'Client key for HTTPS').env(ENV_CLIENT_KEY))
  .addOption(
    new Option('--trust-password <password>', 'Trust password sent before any request').env(
      ENV_TRUST_PASSWORD
    )
  )
  .addOption(
    new Option('--instances-endpoint <path>', 'Instances endpoint (/instances or /containers)').env(
      ENV_INSTANCES_ENDPOINT
    )
  )
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('--debug', 'Include the request log in results').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false));

/**
 * apply command - Reconcile an instance
 */
program
  .command('apply')
  .description('Reconcile an instance toward its manifest')
  .argument('<manifest>', 'Instance manifest (YAML or JSON)')
  .option('--dry-run', 'Show what would happen without making changes', false)
  .action(async (manifest: string, cmdOpts: { dryRun: boolean }) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      const result = await withInterrupt((signal) =>
        applyCommand(ctx, { manifest, dryRun: cmdOpts.dryRun, signal })
      );
      finish(ctx, result);
    } catch (err) {
      error(`Apply failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

/**
 * plan command - Dry-run apply
 */
program
  .command('plan')
  .description('Show the actions apply would take')
  .argument('<manifest>', 'Instance manifest (YAML or JSON)')
  .action(async (manifest: string) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      finish(ctx, await withInterrupt((signal) => planCommand(ctx, { manifest, signal })));
    } catch (err) {
      error(`Plan failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

/**
 * status command - Show observed state
 */
program
  .command('status')
  .description('Show the observed state and attributes of an instance')
  .argument('<name>', 'Instance name')
  .action(async (name: string) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      finish(ctx, await statusCommand(ctx, { name }));
    } catch (err) {
      error(`Status failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

// Parse and execute
await program.parseAsync();
