/**
 * Instance manifest loading
 *
 * Reads a YAML or JSON file describing one instance and validates it into a
 * DesiredSpec. Multi-word keys are accepted in snake_case or camelCase.
 * Every problem is collected before failing so one run reports them all.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  DESIRED_STATES,
  INSTANCE_TYPES,
  VOLATILE_PREFIX,
  type DesiredSpec,
  type DesiredState,
  type InstanceSource,
  type InstanceType,
} from '../reconcilers/instance/types.js';
import type { LxdDevice } from '../api/types.js';
import {
  ManifestValidationError,
  invalidField,
  missingField,
  serverOwnedKey,
  unknownField,
  type ManifestIssue,
} from './errors.js';

/** Seconds allowed per state change when the manifest sets none */
export const DEFAULT_TIMEOUT_SECONDS = 30;

/**
 * Accepted keys and their canonical name
 */
const FIELD_ALIASES: Record<string, string> = {
  name: 'name',
  state: 'state',
  type: 'type',
  architecture: 'architecture',
  config: 'config',
  devices: 'devices',
  ephemeral: 'ephemeral',
  profiles: 'profiles',
  source: 'source',
  target: 'target',
  timeout: 'timeout',
  wait_for_ipv4_addresses: 'waitForIpv4Addresses',
  waitForIpv4Addresses: 'waitForIpv4Addresses',
  force_stop: 'forceStop',
  forceStop: 'forceStop',
};

/** LXD instance names: 1-63 chars, letters, digits and hyphens, not starting with a digit or hyphen */
const INSTANCE_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9-]{0,62}$/;

/**
 * Result of parsing a manifest
 */
export interface LoadedManifest {
  spec: DesiredSpec;
  /** Absolute path, or "<inline>" */
  source: string;
  warnings: ManifestIssue[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Config and device values are strings on the server; scalars are stringified
 */
function toConfigString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function parseStringMap(
  value: unknown,
  path: string,
  issues: ManifestIssue[]
): Record<string, string> | undefined {
  if (!isRecord(value)) {
    issues.push(invalidField(path, 'a mapping of keys to string values'));
    return undefined;
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    const converted = toConfigString(entry);
    if (converted === undefined) {
      issues.push(invalidField(`${path}.${key}`, 'a string, number or boolean'));
    } else {
      result[key] = converted;
    }
  }
  return result;
}

function warnServerOwnedKeys(config: Record<string, string>, issues: ManifestIssue[]): void {
  for (const key of Object.keys(config)) {
    if (key.startsWith(VOLATILE_PREFIX)) {
      issues.push(serverOwnedKey(`config.${key}`));
    }
  }
}

function parseDevices(
  value: unknown,
  issues: ManifestIssue[]
): Record<string, LxdDevice> | undefined {
  if (!isRecord(value)) {
    issues.push(invalidField('devices', 'a mapping of device names to device definitions'));
    return undefined;
  }
  const result: Record<string, LxdDevice> = {};
  for (const [device, definition] of Object.entries(value)) {
    const parsed = parseStringMap(definition, `devices.${device}`, issues);
    if (parsed !== undefined) {
      result[device] = parsed;
    }
  }
  return result;
}

function parseProfiles(value: unknown, issues: ManifestIssue[]): string[] | undefined {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    issues.push(invalidField('profiles', 'a list of profile names'));
    return undefined;
  }
  return [...value];
}

function parseBoolean(
  value: unknown,
  path: string,
  issues: ManifestIssue[]
): boolean | undefined {
  if (typeof value !== 'boolean') {
    issues.push(invalidField(path, 'true or false'));
    return undefined;
  }
  return value;
}

function isDesiredState(value: unknown): value is DesiredState {
  return DESIRED_STATES.some((state) => state === value);
}

function isInstanceType(value: unknown): value is InstanceType {
  return INSTANCE_TYPES.some((type) => type === value);
}

/**
 * Validate a parsed document into a desired spec
 *
 * @throws ManifestValidationError when any error-level issue is found
 */
export function parseManifest(document: unknown, source = '<inline>'): LoadedManifest {
  const issues: ManifestIssue[] = [];

  if (!isRecord(document)) {
    throw new ManifestValidationError(`Manifest ${source} is not a mapping`, source, [
      invalidField('', 'a mapping at the top level'),
    ]);
  }

  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(document)) {
    const canonical = FIELD_ALIASES[key];
    if (canonical === undefined) {
      issues.push(unknownField(key));
    } else {
      fields[canonical] = value;
    }
  }

  let name = '';
  if (fields.name === undefined) {
    issues.push(missingField('name'));
  } else if (typeof fields.name !== 'string' || !INSTANCE_NAME_PATTERN.test(fields.name)) {
    issues.push(
      invalidField('name', 'an instance name', [
        'Use 1-63 letters, digits or hyphens, starting with a letter',
      ])
    );
  } else {
    name = fields.name;
  }

  let state: DesiredState = 'started';
  if (fields.state !== undefined) {
    if (isDesiredState(fields.state)) {
      state = fields.state;
    } else {
      issues.push(invalidField('state', `one of ${DESIRED_STATES.join(', ')}`));
    }
  }

  let type: InstanceType = 'container';
  if (fields.type !== undefined) {
    if (isInstanceType(fields.type)) {
      type = fields.type;
    } else {
      issues.push(invalidField('type', `one of ${INSTANCE_TYPES.join(', ')}`));
    }
  }

  let timeout = DEFAULT_TIMEOUT_SECONDS;
  if (fields.timeout !== undefined) {
    if (typeof fields.timeout === 'number' && Number.isInteger(fields.timeout) && fields.timeout > 0) {
      timeout = fields.timeout;
    } else {
      issues.push(invalidField('timeout', 'a positive whole number of seconds'));
    }
  }

  let architecture: string | undefined;
  if (fields.architecture !== undefined) {
    if (typeof fields.architecture === 'string') {
      architecture = fields.architecture;
    } else {
      issues.push(invalidField('architecture', 'a string such as "x86_64"'));
    }
  }

  let target: string | undefined;
  if (fields.target !== undefined) {
    if (typeof fields.target === 'string' && fields.target.length > 0) {
      target = fields.target;
    } else {
      issues.push(invalidField('target', 'a cluster member name'));
    }
  }

  let instanceSource: InstanceSource | undefined;
  if (fields.source !== undefined) {
    if (isRecord(fields.source)) {
      instanceSource = fields.source;
    } else {
      issues.push(invalidField('source', 'a mapping describing the image source'));
    }
  }

  const config = fields.config !== undefined ? parseStringMap(fields.config, 'config', issues) : undefined;
  if (config !== undefined) warnServerOwnedKeys(config, issues);
  const devices = fields.devices !== undefined ? parseDevices(fields.devices, issues) : undefined;
  const profiles = fields.profiles !== undefined ? parseProfiles(fields.profiles, issues) : undefined;
  const ephemeral =
    fields.ephemeral !== undefined ? parseBoolean(fields.ephemeral, 'ephemeral', issues) : undefined;
  const waitForIpv4Addresses =
    fields.waitForIpv4Addresses !== undefined
      ? parseBoolean(fields.waitForIpv4Addresses, 'wait_for_ipv4_addresses', issues)
      : undefined;
  const forceStop =
    fields.forceStop !== undefined ? parseBoolean(fields.forceStop, 'force_stop', issues) : undefined;

  const errors = issues.filter((issue) => issue.severity === 'error');
  if (errors.length > 0) {
    throw new ManifestValidationError(
      `Manifest ${source} has ${errors.length} error(s)`,
      source,
      issues
    );
  }

  const spec: DesiredSpec = {
    name,
    state,
    type,
    timeout,
    waitForIpv4Addresses: waitForIpv4Addresses ?? false,
    forceStop: forceStop ?? false,
    ...(architecture !== undefined ? { architecture } : {}),
    ...(config !== undefined ? { config } : {}),
    ...(devices !== undefined ? { devices } : {}),
    ...(ephemeral !== undefined ? { ephemeral } : {}),
    ...(profiles !== undefined ? { profiles } : {}),
    ...(instanceSource !== undefined ? { source: instanceSource } : {}),
    ...(target !== undefined ? { target } : {}),
  };

  return {
    spec,
    source,
    warnings: issues.filter((issue) => issue.severity === 'warning'),
  };
}

/**
 * Parse manifest text (YAML or JSON)
 */
export function parseManifestText(text: string, source = '<inline>'): LoadedManifest {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestValidationError(`Cannot parse manifest ${source}`, source, [
      {
        code: 'MANIFEST_UNPARSEABLE',
        severity: 'error',
        message,
        path: '',
      },
    ]);
  }
  return parseManifest(document, source);
}

/**
 * Load and validate a manifest file
 */
export async function loadManifest(path: string, basePath?: string): Promise<LoadedManifest> {
  const absolutePath = isAbsolute(path) ? path : resolve(basePath ?? process.cwd(), path);

  if (!existsSync(absolutePath)) {
    throw new ManifestValidationError(`Manifest not found: ${absolutePath}`, absolutePath, [
      {
        code: 'MANIFEST_NOT_FOUND',
        severity: 'error',
        message: 'File does not exist',
        path: '',
      },
    ]);
  }

  const text = await readFile(absolutePath, 'utf-8');
  return parseManifestText(text, absolutePath);
}
