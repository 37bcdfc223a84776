/**
 * Instance reconciliation entry point
 *
 * 1. Authenticate when a trust password is supplied
 * 2. Fetch the instance once and map its status
 * 3. Plan the transition and run each step in order
 * 4. Report what changed, or what had completed when a step failed
 *
 * Nothing is rolled back: a failure leaves the instance wherever the
 * completed steps put it, and the result says which steps those were.
 */

import { ApiError, toError } from '../../api/errors.js';
import { logger as defaultLogger } from '../../api/logger.js';
import type { InstanceMetadata } from '../../api/types.js';
import { ActionExecutor } from './actions.js';
import { waitForAddresses } from './addresses.js';
import { needsApply, observedAttributes, snapshotBefore } from './diff.js';
import { planTransition } from './plan.js';
import {
  STATUS_TO_STATE,
  type ControlPlaneClient,
  type DesiredSpec,
  type ObservedState,
  type PlanStep,
  type ReconcileOptions,
  type ReconcileResult,
  type ReconciliationRun,
} from './types.js';

/**
 * Map fetched metadata to an observed state
 */
export function toObservedState(metadata: InstanceMetadata | null): ObservedState {
  if (metadata === null) {
    return 'absent';
  }
  const state = STATUS_TO_STATE[metadata.status];
  if (state === undefined) {
    throw new ApiError(`Unsupported instance status: ${metadata.status}`, 500, {
      details: { status: metadata.status },
    });
  }
  return state;
}

/**
 * Create the per-run context
 */
export function createRun(spec: DesiredSpec, dryRun: boolean): ReconciliationRun {
  return {
    spec,
    dryRun,
    actions: [],
    diff: { before: {}, after: {} },
  };
}

/**
 * Fetch the instance and record the before side of the diff
 */
async function observe(client: ControlPlaneClient, run: ReconciliationRun): Promise<ObservedState> {
  const metadata = await client.fetch(run.spec.name);
  const state = toObservedState(metadata);

  run.observedState = state;
  run.diff.before.state = state;
  run.diff.after.state = run.spec.state;

  if (metadata !== null) {
    run.observed = metadata;
    run.diff.before.instance = snapshotBefore(observedAttributes(metadata));
  }

  return state;
}

async function runStep(
  step: PlanStep,
  executor: ActionExecutor,
  client: ControlPlaneClient,
  run: ReconciliationRun,
  options: ReconcileOptions
): Promise<void> {
  switch (step) {
    case 'create':
      return executor.create();
    case 'start':
      return executor.start();
    case 'stop':
      return executor.stop();
    case 'restart':
      return executor.restart();
    case 'delete':
      return executor.delete();
    case 'freeze':
      return executor.freeze();
    case 'unfreeze':
      return executor.unfreeze();
    case 'apply_container_configs':
      return executor.applyConfigs();
    case 'wait_for_addresses':
      // Nothing changed in a dry run, so there is nothing to wait for
      if (run.dryRun) return;
      run.addresses = await waitForAddresses(client, run.spec.name, {
        timeoutSeconds: run.spec.timeout,
        signal: options.signal,
        sleep: options.sleep,
        now: options.now,
      });
      return;
  }
}

/**
 * Converge one instance toward its declared state
 */
export async function reconcileInstance(
  client: ControlPlaneClient,
  spec: DesiredSpec,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const run = createRun(spec, options.dryRun ?? false);
  const log = (options.logger ?? defaultLogger).child({ instance: spec.name });
  const executor = new ActionExecutor(client, run, log);

  try {
    if (options.trustPassword !== undefined) {
      await client.authenticate(options.trustPassword);
    }

    const observed = await observe(client, run);
    const plan = planTransition({
      observed,
      desired: spec.state,
      needsApply:
        run.observed !== undefined && needsApply(spec, observedAttributes(run.observed)),
      waitForAddresses: spec.waitForIpv4Addresses,
    });

    log.debug('Planned transition', { from: observed, to: spec.state, plan, dryRun: run.dryRun });

    for (const step of plan) {
      await runStep(step, executor, client, run, options);
    }

    log.info(
      run.actions.length > 0 ? `Reconciled: ${run.actions.join(', ')}` : 'Already converged',
      { from: observed, to: spec.state, dryRun: run.dryRun }
    );

    return {
      ok: true,
      changed: run.actions.length > 0,
      oldState: observed,
      actions: run.actions,
      diff: run.diff,
      ...(run.addresses !== undefined ? { addresses: run.addresses } : {}),
      ...logsOf(client),
    };
  } catch (caught) {
    const error = toError(caught);
    log.error('Reconciliation failed', error, { completed: run.actions });

    return {
      ok: false,
      message: error.message,
      error,
      changed: run.actions.length > 0,
      actions: run.actions,
      diff: run.diff,
      ...logsOf(client),
    };
  }
}

function logsOf(client: ControlPlaneClient): { logs?: ReconcileResult['logs'] } {
  return client.logs !== undefined ? { logs: [...client.logs] } : {};
}
