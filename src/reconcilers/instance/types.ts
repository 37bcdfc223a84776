/**
 * Types for instance reconciliation
 *
 * A run compares one immutable DesiredSpec against a single observation of
 * the instance and records what it did (or would do) in a ReconciliationRun.
 */

import type {
  InstanceMetadata,
  InstanceStateMetadata,
  LxdDevice,
  RequestLogEntry,
  StateChangeRequest,
} from '../../api/types.js';
import type { ApiLogger } from '../../api/logger.js';

// =============================================================================
// States
// =============================================================================

/**
 * Observed runtime state of an instance
 */
export type ObservedState = 'absent' | 'started' | 'stopped' | 'frozen';

/**
 * Target state requested by the caller
 */
export type DesiredState = 'started' | 'stopped' | 'restarted' | 'absent' | 'frozen';

export const DESIRED_STATES: readonly DesiredState[] = [
  'started',
  'stopped',
  'restarted',
  'absent',
  'frozen',
];

export type InstanceType = 'container' | 'virtual-machine';

export const INSTANCE_TYPES: readonly InstanceType[] = ['container', 'virtual-machine'];

/**
 * Server status strings and the state they map to
 */
export const STATUS_TO_STATE: Readonly<Record<string, Exclude<ObservedState, 'absent'>>> = {
  Running: 'started',
  Stopped: 'stopped',
  Frozen: 'frozen',
};

// =============================================================================
// Attributes
// =============================================================================

/**
 * Attributes re-applied to an existing instance when they differ
 */
export const MUTABLE_ATTRIBUTES = [
  'architecture',
  'config',
  'devices',
  'ephemeral',
  'profiles',
] as const;

export type MutableAttribute = (typeof MUTABLE_ATTRIBUTES)[number];

/**
 * Attributes only sent when the instance is created
 */
export const CREATION_ONLY_ATTRIBUTES = ['source', 'type'] as const;

/**
 * Config keys under this prefix belong to the server and are never diffed
 * or overwritten
 */
export const VOLATILE_PREFIX = 'volatile.';

/**
 * The mutable attribute set as sent to or read from the server
 */
export interface InstanceAttributes {
  architecture?: string;
  config?: Record<string, string>;
  devices?: Record<string, LxdDevice>;
  ephemeral?: boolean;
  profiles?: string[];
}

/**
 * Image/copy/migration source; passed through to the server untouched
 */
export type InstanceSource = Record<string, unknown>;

/**
 * Caller-declared target for one instance
 */
export interface DesiredSpec extends InstanceAttributes {
  /** Instance name; the only addressing key */
  readonly name: string;
  readonly state: DesiredState;
  readonly type: InstanceType;
  readonly source?: InstanceSource;
  /** Cluster member to create the instance on */
  readonly target?: string;
  /** Seconds allowed for each state change and for the address wait */
  readonly timeout: number;
  readonly waitForIpv4Addresses: boolean;
  readonly forceStop: boolean;
}

/**
 * Body of an instance creation request
 */
export interface CreateInstanceRequest extends InstanceAttributes {
  name: string;
  type: InstanceType;
  source?: InstanceSource;
}

// =============================================================================
// Control Plane
// =============================================================================

/**
 * Operations the reconciler needs from the control plane
 *
 * Lookups resolve to null when the instance does not exist; every other
 * failure rejects.
 */
export interface ControlPlaneClient {
  fetch(name: string): Promise<InstanceMetadata | null>;
  fetchState(name: string): Promise<InstanceStateMetadata | null>;
  create(request: CreateInstanceRequest, target?: string): Promise<void>;
  setState(name: string, request: StateChangeRequest): Promise<void>;
  delete(name: string): Promise<void>;
  update(name: string, attributes: InstanceAttributes): Promise<void>;
  authenticate(trustPassword: string): Promise<void>;
  /** Request log, populated only when the client runs in debug mode */
  readonly logs?: readonly RequestLogEntry[];
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Names recorded in the action log
 */
export type ActionName =
  | 'create'
  | 'start'
  | 'stop'
  | 'restart'
  | 'delete'
  | 'freeze'
  | 'unfreeze'
  | 'apply_container_configs';

/**
 * One step of a transition plan
 */
export type PlanStep = ActionName | 'wait_for_addresses';

// =============================================================================
// Results
// =============================================================================

export interface DiffSide<S extends string> {
  state?: S;
  instance?: InstanceAttributes;
}

/**
 * Before/after record of a run
 */
export interface ResultDiff {
  before: DiffSide<ObservedState>;
  after: DiffSide<DesiredState>;
}

/**
 * IPv4 addresses per network device
 */
export type AddressMap = Record<string, string[]>;

/**
 * Mutable context threaded through planning and execution for one run
 */
export interface ReconciliationRun {
  readonly spec: DesiredSpec;
  readonly dryRun: boolean;
  observed?: InstanceMetadata;
  observedState?: ObservedState;
  readonly actions: ActionName[];
  readonly diff: ResultDiff;
  addresses?: AddressMap;
}

interface ResultBase {
  changed: boolean;
  actions: ActionName[];
  diff: ResultDiff;
  /** Request log, present when the client ran in debug mode */
  logs?: RequestLogEntry[];
}

export interface ReconcileSuccess extends ResultBase {
  ok: true;
  oldState: ObservedState;
  addresses?: AddressMap;
}

export interface ReconcileFailure extends ResultBase {
  ok: false;
  message: string;
  error: Error;
}

export type ReconcileResult = ReconcileSuccess | ReconcileFailure;

/**
 * Options for a reconciliation run
 */
export interface ReconcileOptions {
  /** Compute and report the plan without issuing mutating requests */
  dryRun?: boolean;
  /** Sent to the server before anything else when set */
  trustPassword?: string;
  logger?: ApiLogger;
  /** Cancels the address wait */
  signal?: AbortSignal;
  /** Clock used by the address wait (tests) */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}
