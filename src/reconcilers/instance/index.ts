/**
 * Instance reconciler exports
 *
 * Converges one LXD instance (container or virtual machine) toward a
 * declared runtime state and attribute set.
 */

export type {
  ObservedState,
  DesiredState,
  InstanceType,
  MutableAttribute,
  InstanceAttributes,
  InstanceSource,
  DesiredSpec,
  CreateInstanceRequest,
  ControlPlaneClient,
  ActionName,
  PlanStep,
  DiffSide,
  ResultDiff,
  AddressMap,
  ReconciliationRun,
  ReconcileSuccess,
  ReconcileFailure,
  ReconcileResult,
  ReconcileOptions,
} from './types.js';

export {
  DESIRED_STATES,
  INSTANCE_TYPES,
  STATUS_TO_STATE,
  MUTABLE_ATTRIBUTES,
  CREATION_ONLY_ATTRIBUTES,
  VOLATILE_PREFIX,
} from './types.js';

// Diff functions
export type { AttributeDrift } from './diff.js';
export {
  stripVolatile,
  valuesEqual,
  observedAttributes,
  changedConfigKeys,
  needsChange,
  needsApply,
  computeDrifts,
  buildApplyBody,
  snapshotBefore,
} from './diff.js';

// Address wait
export type { PollOptions, PollOutcome, AddressWaitOptions } from './addresses.js';
export {
  ADDRESS_POLL_INTERVAL_MS,
  pollUntil,
  extractIpv4Addresses,
  hasAllIpv4Addresses,
  waitForAddresses,
} from './addresses.js';

// Planning and execution
export type { PlanInput } from './plan.js';
export { planTransition } from './plan.js';
export { ActionExecutor } from './actions.js';
export { reconcileInstance, toObservedState, createRun } from './apply.js';

// Reporting
export type { ReconcileReport } from './report.js';
export { toReport } from './report.js';
