/**
 * Instance attribute diffing
 *
 * Decides whether an existing instance needs its mutable attributes pushed
 * again, and builds the body that gets pushed. Pure functions over the
 * single observation taken at the start of a run.
 *
 * `config` is merged, never replaced: desired keys are added or overwritten
 * on top of what the server reports, keys the caller did not declare stay,
 * and `volatile.*` keys are ignored on both sides: they never count as drift
 * and a declared value never replaces the server's.
 */

import type { InstanceMetadata } from '../../api/types.js';
import {
  MUTABLE_ATTRIBUTES,
  VOLATILE_PREFIX,
  type InstanceAttributes,
  type MutableAttribute,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A single attribute whose declared value differs from the server's
 */
export interface AttributeDrift {
  attribute: MutableAttribute;
  /** Config keys that differ (only for `config`) */
  keys?: string[];
  observed: unknown;
  desired: unknown;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Drop server-owned `volatile.*` keys from a config map
 */
export function stripVolatile(config: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(config)) {
    if (!key.startsWith(VOLATILE_PREFIX)) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Structural equality; object key order is irrelevant, array order is not
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, index) => valuesEqual(item, b[index]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
  }

  return false;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract the mutable attribute subset from instance metadata
 */
export function observedAttributes(metadata: InstanceMetadata): InstanceAttributes {
  const attributes: InstanceAttributes = {};
  if (metadata.architecture !== undefined) attributes.architecture = metadata.architecture;
  if (metadata.config !== undefined) attributes.config = { ...metadata.config };
  if (metadata.devices !== undefined) attributes.devices = { ...metadata.devices };
  if (metadata.ephemeral !== undefined) attributes.ephemeral = metadata.ephemeral;
  if (metadata.profiles !== undefined) attributes.profiles = [...metadata.profiles];
  return attributes;
}

/**
 * Config keys whose desired value is missing or different on the server
 */
export function changedConfigKeys(
  desired: Record<string, string>,
  observed: Record<string, string> | undefined
): string[] {
  const current = stripVolatile(observed ?? {});
  return Object.entries(stripVolatile(desired))
    .filter(([key, value]) => !Object.hasOwn(current, key) || current[key] !== value)
    .map(([key]) => key);
}

// =============================================================================
// Differ
// =============================================================================

/**
 * Whether a declared attribute differs from the observed instance
 *
 * Undeclared attributes never differ. An empty collection is a declaration.
 */
export function needsChange(
  attribute: MutableAttribute,
  desired: InstanceAttributes,
  observed: InstanceAttributes
): boolean {
  if (attribute === 'config') {
    return desired.config !== undefined && changedConfigKeys(desired.config, observed.config).length > 0;
  }

  const wanted = desired[attribute];
  if (wanted === undefined) return false;
  return !valuesEqual(wanted, observed[attribute]);
}

/**
 * Whether any mutable attribute has to be pushed to the instance
 */
export function needsApply(desired: InstanceAttributes, observed: InstanceAttributes): boolean {
  return MUTABLE_ATTRIBUTES.some((attribute) => needsChange(attribute, desired, observed));
}

/**
 * List every differing attribute for reporting
 */
export function computeDrifts(
  desired: InstanceAttributes,
  observed: InstanceAttributes
): AttributeDrift[] {
  const drifts: AttributeDrift[] = [];

  for (const attribute of MUTABLE_ATTRIBUTES) {
    if (!needsChange(attribute, desired, observed)) continue;

    if (attribute === 'config' && desired.config) {
      const keys = changedConfigKeys(desired.config, observed.config);
      const current = stripVolatile(observed.config ?? {});
      drifts.push({
        attribute,
        keys,
        observed: Object.fromEntries(keys.map((key) => [key, current[key]])),
        desired: Object.fromEntries(keys.map((key) => [key, desired.config?.[key]])),
      });
    } else {
      drifts.push({
        attribute,
        observed: observed[attribute],
        desired: desired[attribute],
      });
    }
  }

  return drifts;
}

function copyAttribute<K extends MutableAttribute>(
  target: InstanceAttributes,
  source: InstanceAttributes,
  key: K
): void {
  target[key] = source[key];
}

/**
 * Build the full attribute body for an update request
 *
 * Starts from what the server reports (volatile keys included, so they are
 * written back unchanged) and lays the differing declared values on top.
 */
export function buildApplyBody(
  desired: InstanceAttributes,
  observed: InstanceAttributes
): InstanceAttributes {
  const body: InstanceAttributes = {};

  for (const attribute of MUTABLE_ATTRIBUTES) {
    if (observed[attribute] !== undefined) {
      copyAttribute(body, observed, attribute);
    }

    if (!needsChange(attribute, desired, observed)) continue;

    if (attribute === 'config') {
      body.config = { ...(observed.config ?? {}), ...stripVolatile(desired.config ?? {}) };
    } else {
      copyAttribute(body, desired, attribute);
    }
  }

  return body;
}

/**
 * Mutable attributes as reported, with volatile config keys removed
 */
export function snapshotBefore(observed: InstanceAttributes): InstanceAttributes {
  const snapshot: InstanceAttributes = { ...observed };
  if (observed.config !== undefined) {
    snapshot.config = stripVolatile(observed.config);
  }
  return snapshot;
}
