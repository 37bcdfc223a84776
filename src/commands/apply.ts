/**
 * apply command - Converge an LXD instance toward its manifest
 *
 * With --dry-run (or through the plan command) the run reports the actions
 * it would take without sending any mutating request.
 */

import type { CommandContext, CommandResult } from '../types.js';
import {
  info,
  warn,
  verbose,
  header,
  dryRunNotice,
  printActions,
  printDrifts,
  printAddresses,
} from '../utils/output.js';
import { createLogger } from '../api/logger.js';
import { toError } from '../api/errors.js';
import { loadManifest, type LoadedManifest } from '../manifest/loader.js';
import { ManifestValidationError } from '../manifest/errors.js';
import { reconcileInstance } from '../reconcilers/instance/apply.js';
import { computeDrifts } from '../reconcilers/instance/diff.js';
import { toReport, type ReconcileReport } from '../reconcilers/instance/report.js';
import type { LxdClient } from '../api/client.js';

export interface ApplyOptions {
  /** Path to the instance manifest (YAML or JSON) */
  manifest: string;
  /** Report without changing anything */
  dryRun?: boolean;
  /** Cancels in-flight requests and the address wait */
  signal?: AbortSignal;
}

/**
 * Execute the apply command
 */
export async function applyCommand(
  ctx: CommandContext,
  options: ApplyOptions
): Promise<CommandResult<ReconcileReport>> {
  const { options: globalOpts, outputFormat } = ctx;
  const dryRun = options.dryRun ?? false;
  const human = outputFormat === 'human';

  verbose(`Executing apply command (dryRun=${dryRun})`, globalOpts.verbose);
  verbose(`Manifest: ${options.manifest}`, globalOpts.verbose);

  let loaded: LoadedManifest;
  try {
    loaded = await loadManifest(options.manifest);
  } catch (err) {
    if (err instanceof ManifestValidationError) {
      return {
        success: false,
        message: err.message,
        errors: err.errors.map((issue) => `${issue.path || '(root)'}: ${issue.message}`),
      };
    }
    return { success: false, message: `Failed to load manifest: ${toError(err).message}` };
  }

  const { spec } = loaded;

  if (human) {
    header(`Instance ${spec.name}`);
    if (dryRun) dryRunNotice();
    for (const warning of loaded.warnings) {
      warn(`${loaded.source}: ${warning.message}`);
    }
    info(`Target state: ${spec.state}`);
  }

  const log = createLogger({
    level: globalOpts.verbose ? 'debug' : 'warn',
    json: !human,
  });

  let client: LxdClient;
  try {
    client = ctx.createClient({
      url: ctx.connection.url,
      clientCert: ctx.connection.clientCert,
      clientKey: ctx.connection.clientKey,
      instancesEndpoint: ctx.connection.instancesEndpoint,
      debug: globalOpts.debug,
      logger: log,
      signal: options.signal,
    });
  } catch (err) {
    return { success: false, message: toError(err).message };
  }

  try {
    const result = await reconcileInstance(client, spec, {
      dryRun,
      trustPassword: ctx.connection.trustPassword,
      logger: log,
      signal: options.signal,
    });

    if (human) {
      if (result.diff.before.state !== undefined) {
        info(`Observed state: ${result.diff.before.state}`);
      }
      if (result.diff.before.instance !== undefined) {
        printDrifts(computeDrifts(spec, result.diff.before.instance));
      }
      printActions(result, dryRun);
      if (result.ok && result.addresses !== undefined) {
        printAddresses(result.addresses);
      }
    }

    const report = toReport(result);

    if (!result.ok) {
      return {
        success: false,
        message: `Reconciliation of ${spec.name} failed: ${result.message}`,
        data: report,
        errors: [result.message],
      };
    }

    const verb = dryRun ? 'would change' : 'changed';
    return {
      success: true,
      message: result.changed
        ? `${spec.name} ${verb} (${result.actions.join(', ')})`
        : `${spec.name} is already ${spec.state}`,
      data: report,
    };
  } finally {
    await client.close();
  }
}

/**
 * plan command - apply in dry-run mode
 */
export async function planCommand(
  ctx: CommandContext,
  options: Omit<ApplyOptions, 'dryRun'>
): Promise<CommandResult<ReconcileReport>> {
  return applyCommand(ctx, { ...options, dryRun: true });
}
