/**
 * Unit Tests: Instance Attribute Diffing
 *
 * Tests the comparison between declared and observed attributes:
 * - Volatile config keys never count as drift
 * - Config is compared as a superset, other attributes exactly
 * - The update body merges config and keeps volatile keys
 *
 * @see src/reconcilers/instance/diff.ts
 */

import { describe, it, expect } from 'vitest';
import {
  buildApplyBody,
  changedConfigKeys,
  computeDrifts,
  needsApply,
  needsChange,
  observedAttributes,
  snapshotBefore,
  stripVolatile,
  valuesEqual,
} from '../../src/reconcilers/instance/diff.js';
import type { InstanceAttributes } from '../../src/reconcilers/instance/types.js';
import { instanceMetadata } from './fake-control-plane.js';

const observed: InstanceAttributes = {
  architecture: 'x86_64',
  config: {
    'limits.cpu': '1',
    'volatile.eth0.hwaddr': '00:16:3e:00:00:01',
  },
  devices: { root: { path: '/', pool: 'default', type: 'disk' } },
  ephemeral: false,
  profiles: ['default'],
};

// =============================================================================
// Helpers
// =============================================================================

describe('stripVolatile', () => {
  it('removes only keys under the volatile prefix', () => {
    expect(
      stripVolatile({
        'volatile.idmap.base': '0',
        'limits.memory': '1GiB',
        'user.volatile.note': 'kept',
      })
    ).toEqual({ 'limits.memory': '1GiB', 'user.volatile.note': 'kept' });
  });
});

describe('valuesEqual', () => {
  it('ignores object key order', () => {
    expect(valuesEqual({ a: '1', b: '2' }, { b: '2', a: '1' })).toBe(true);
  });

  it('respects array order', () => {
    expect(valuesEqual(['default', 'web'], ['web', 'default'])).toBe(false);
  });

  it('compares nested device maps', () => {
    expect(
      valuesEqual({ eth0: { type: 'nic', network: 'lxdbr0' } }, { eth0: { network: 'lxdbr0', type: 'nic' } })
    ).toBe(true);
    expect(valuesEqual({ eth0: { type: 'nic' } }, { eth0: { type: 'nic', name: 'eth0' } })).toBe(false);
  });

  it('treats a missing value as different from an empty one', () => {
    expect(valuesEqual({}, undefined)).toBe(false);
  });
});

describe('observedAttributes', () => {
  it('copies the mutable subset of instance metadata', () => {
    const metadata = instanceMetadata({ location: 'node2' });

    expect(observedAttributes(metadata)).toEqual({
      architecture: 'x86_64',
      config: {
        'limits.cpu': '1',
        'volatile.eth0.hwaddr': '00:16:3e:00:00:01',
        'volatile.idmap.base': '0',
      },
      devices: {},
      ephemeral: false,
      profiles: ['default'],
    });
  });
});

describe('changedConfigKeys', () => {
  it('lists missing and different keys', () => {
    expect(changedConfigKeys({ 'limits.cpu': '2', 'limits.memory': '1GiB' }, observed.config)).toEqual([
      'limits.cpu',
      'limits.memory',
    ]);
  });

  it('ignores declared volatile keys, matching or not', () => {
    expect(changedConfigKeys({ 'volatile.eth0.hwaddr': '00:16:3e:00:00:01' }, observed.config)).toEqual([]);
    expect(
      changedConfigKeys({ 'limits.cpu': '1', 'volatile.eth0.hwaddr': '00:16:3e:ff:ff:ff' }, observed.config)
    ).toEqual([]);
  });
});

// =============================================================================
// Differ
// =============================================================================

describe('needsChange', () => {
  it('is false for undeclared attributes', () => {
    expect(needsChange('profiles', {}, observed)).toBe(false);
    expect(needsChange('config', {}, observed)).toBe(false);
  });

  it('treats config as a superset comparison', () => {
    expect(needsChange('config', { config: { 'limits.cpu': '1' } }, observed)).toBe(false);
    expect(needsChange('config', { config: {} }, observed)).toBe(false);
    expect(needsChange('config', { config: { 'limits.cpu': '2' } }, observed)).toBe(true);
  });

  it('compares other attributes exactly', () => {
    expect(needsChange('profiles', { profiles: ['default'] }, observed)).toBe(false);
    expect(needsChange('profiles', { profiles: ['default', 'web'] }, observed)).toBe(true);
    expect(needsChange('devices', { devices: {} }, observed)).toBe(true);
    expect(needsChange('ephemeral', { ephemeral: true }, observed)).toBe(true);
    expect(needsChange('architecture', { architecture: 'x86_64' }, observed)).toBe(false);
  });
});

describe('needsApply', () => {
  it('is false when every declared attribute matches', () => {
    expect(
      needsApply(
        {
          config: { 'limits.cpu': '1' },
          profiles: ['default'],
          devices: { root: { type: 'disk', pool: 'default', path: '/' } },
        },
        observed
      )
    ).toBe(false);
  });

  it('is true when any declared attribute differs', () => {
    expect(needsApply({ config: { 'limits.cpu': '1' }, ephemeral: true }, observed)).toBe(true);
  });
});

describe('computeDrifts', () => {
  it('reports config drift by key with volatile keys dropped', () => {
    const drifts = computeDrifts({ config: { 'limits.cpu': '2', 'limits.memory': '1GiB' }, profiles: ['default'] }, observed);

    expect(drifts).toEqual([
      {
        attribute: 'config',
        keys: ['limits.cpu', 'limits.memory'],
        observed: { 'limits.cpu': '1', 'limits.memory': undefined },
        desired: { 'limits.cpu': '2', 'limits.memory': '1GiB' },
      },
    ]);
  });

  it('reports whole values for other attributes', () => {
    expect(computeDrifts({ profiles: ['web'] }, observed)).toEqual([
      { attribute: 'profiles', observed: ['default'], desired: ['web'] },
    ]);
  });

  it('is empty without drift', () => {
    expect(computeDrifts({ config: { 'limits.cpu': '1' } }, observed)).toEqual([]);
  });
});

// =============================================================================
// Update Body
// =============================================================================

describe('buildApplyBody', () => {
  it('merges config on top of the observed keys, volatile included', () => {
    const body = buildApplyBody({ config: { 'limits.memory': '1GiB' } }, observed);

    expect(body.config).toEqual({
      'limits.cpu': '1',
      'limits.memory': '1GiB',
      'volatile.eth0.hwaddr': '00:16:3e:00:00:01',
    });
  });

  it('never overwrites a server-owned volatile key', () => {
    const body = buildApplyBody(
      { config: { 'limits.memory': '1GiB', 'volatile.eth0.hwaddr': '00:16:3e:ff:ff:ff' } },
      observed
    );

    expect(body.config).toEqual({
      'limits.cpu': '1',
      'limits.memory': '1GiB',
      'volatile.eth0.hwaddr': '00:16:3e:00:00:01',
    });
  });

  it('replaces differing attributes and keeps the rest as observed', () => {
    const body = buildApplyBody({ profiles: ['default', 'web'] }, observed);

    expect(body).toEqual({
      architecture: 'x86_64',
      config: observed.config,
      devices: observed.devices,
      ephemeral: false,
      profiles: ['default', 'web'],
    });
  });

  it('keeps observed config untouched when only other attributes differ', () => {
    const body = buildApplyBody({ config: { 'limits.cpu': '1' }, ephemeral: true }, observed);

    expect(body.config).toEqual(observed.config);
    expect(body.ephemeral).toBe(true);
  });
});

describe('snapshotBefore', () => {
  it('drops volatile config keys and keeps the rest', () => {
    expect(snapshotBefore(observed)).toEqual({
      architecture: 'x86_64',
      config: { 'limits.cpu': '1' },
      devices: observed.devices,
      ephemeral: false,
      profiles: ['default'],
    });
  });

  it('does not modify its input', () => {
    snapshotBefore(observed);
    expect(observed.config).toHaveProperty('volatile.eth0.hwaddr');
  });
});
