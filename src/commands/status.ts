/**
 * status command - Show the observed state of an LXD instance
 */

import type { CommandContext, CommandResult } from '../types.js';
import { info, verbose, header, printStatus } from '../utils/output.js';
import { createLogger } from '../api/logger.js';
import { toError } from '../api/errors.js';
import { formatConnection } from '../config/connection.js';
import { toObservedState } from '../reconcilers/instance/apply.js';
import { observedAttributes, snapshotBefore } from '../reconcilers/instance/diff.js';
import type { InstanceAttributes, ObservedState } from '../reconcilers/instance/types.js';
import type { LxdClient } from '../api/client.js';

export interface StatusOptions {
  /** Instance name */
  name: string;
}

export interface InstanceStatus {
  name: string;
  state: ObservedState;
  type?: string;
  location?: string;
  /** Mutable attributes, volatile config keys removed */
  attributes?: InstanceAttributes;
}

/**
 * Execute the status command
 */
export async function statusCommand(
  ctx: CommandContext,
  options: StatusOptions
): Promise<CommandResult<InstanceStatus>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose(`Executing status command`, globalOpts.verbose);
  verbose(`Server: ${formatConnection(ctx.connection)}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Instance Status');
    info(`Fetching ${options.name}...`);
  }

  let client: LxdClient;
  try {
    client = ctx.createClient({
      url: ctx.connection.url,
      clientCert: ctx.connection.clientCert,
      clientKey: ctx.connection.clientKey,
      instancesEndpoint: ctx.connection.instancesEndpoint,
      logger: createLogger({ level: globalOpts.verbose ? 'debug' : 'warn' }),
    });
  } catch (err) {
    return { success: false, message: toError(err).message };
  }

  try {
    if (ctx.connection.trustPassword !== undefined) {
      await client.authenticate(ctx.connection.trustPassword);
    }

    const metadata = await client.fetch(options.name);
    const status: InstanceStatus = {
      name: options.name,
      state: toObservedState(metadata),
    };

    if (metadata !== null) {
      if (metadata.type !== undefined) status.type = metadata.type;
      if (metadata.location !== undefined) status.location = metadata.location;
      status.attributes = snapshotBefore(observedAttributes(metadata));
    }

    if (outputFormat === 'human') {
      printStatus({
        name: status.name,
        state: status.state,
        type: status.type,
        location: status.location,
        ...status.attributes,
      });
    }

    return {
      success: true,
      message: `${options.name} is ${status.state}`,
      data: status,
    };
  } catch (err) {
    return {
      success: false,
      message: `Failed to fetch ${options.name}: ${toError(err).message}`,
    };
  } finally {
    await client.close();
  }
}
