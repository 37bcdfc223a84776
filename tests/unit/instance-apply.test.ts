/**
 * Unit Tests: Instance Reconciliation
 *
 * Runs reconcileInstance against the in-memory control plane:
 * - Transitions from each observed state
 * - Idempotence of a second run
 * - Dry-run mode
 * - Partial failures and the action log
 *
 * @see src/reconcilers/instance/apply.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { reconcileInstance, toObservedState } from '../../src/reconcilers/instance/apply.js';
import type { DesiredSpec, ReconcileOptions } from '../../src/reconcilers/instance/types.js';
import { toReport } from '../../src/reconcilers/instance/report.js';
import { ApiError, AddressTimeoutError } from '../../src/api/errors.js';
import { createLogger } from '../../src/api/logger.js';
import type { RequestLogEntry } from '../../src/api/types.js';
import { FakeControlPlane, instanceMetadata } from './fake-control-plane.js';

// =============================================================================
// Fixtures
// =============================================================================

function desiredSpec(overrides: Partial<DesiredSpec> = {}): DesiredSpec {
  return {
    name: 'web01',
    state: 'started',
    type: 'container',
    timeout: 30,
    waitForIpv4Addresses: false,
    forceStop: false,
    ...overrides,
  };
}

function createOptions(overrides: ReconcileOptions = {}): ReconcileOptions {
  let current = 0;
  return {
    logger: createLogger({ level: 'error' }),
    now: () => current,
    sleep: async (ms: number) => {
      current += ms;
    },
    ...overrides,
  };
}

function methods(client: FakeControlPlane): string[] {
  return client.calls.map((call) => call.method);
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// =============================================================================
// Status Mapping
// =============================================================================

describe('toObservedState', () => {
  it('maps missing instances to absent', () => {
    expect(toObservedState(null)).toBe('absent');
  });

  it.each([
    ['Running', 'started'],
    ['Stopped', 'stopped'],
    ['Frozen', 'frozen'],
  ])('maps %s to %s', (status, state) => {
    expect(toObservedState(instanceMetadata({ status }))).toBe(state);
  });

  it('rejects statuses it cannot map', () => {
    expect(() => toObservedState(instanceMetadata({ status: 'Error' }))).toThrow(
      'Unsupported instance status: Error'
    );
  });
});

// =============================================================================
// Transitions
// =============================================================================

describe('reconcileInstance', () => {
  it('creates and starts a missing instance', async () => {
    const client = new FakeControlPlane();
    const spec = desiredSpec({
      config: { 'limits.cpu': '2' },
      profiles: ['default'],
      source: { type: 'image', alias: 'ubuntu/22.04' },
      target: 'node2',
    });

    const result = await reconcileInstance(client, spec, createOptions());

    expect(result).toMatchObject({ ok: true, changed: true, oldState: 'absent', actions: ['create', 'start'] });
    expect(result.diff).toEqual({ before: { state: 'absent' }, after: { state: 'started' } });
    expect(client.calls[1]).toEqual({
      method: 'create',
      args: [
        {
          name: 'web01',
          type: 'container',
          config: { 'limits.cpu': '2' },
          profiles: ['default'],
          source: { type: 'image', alias: 'ubuntu/22.04' },
        },
        'node2',
      ],
    });
    expect(client.calls[2]).toEqual({
      method: 'setState',
      args: ['web01', { action: 'start', timeout: 30 }],
    });
    expect(client.instance?.status).toBe('Running');
  });

  it('does nothing on a second run', async () => {
    const client = new FakeControlPlane();
    const spec = desiredSpec({ config: { 'limits.cpu': '2' }, profiles: ['default'] });

    await reconcileInstance(client, spec, createOptions());
    client.calls.length = 0;
    const second = await reconcileInstance(client, spec, createOptions());

    expect(second).toMatchObject({ ok: true, changed: false, oldState: 'started', actions: [] });
    expect(methods(client)).toEqual(['fetch']);
  });

  it('stays idempotent when the manifest declares a volatile key', async () => {
    const client = new FakeControlPlane(instanceMetadata());
    const spec = desiredSpec({
      config: { 'limits.cpu': '1', 'volatile.eth0.hwaddr': '00:16:3e:00:00:01' },
    });

    const first = await reconcileInstance(client, spec, createOptions());
    const second = await reconcileInstance(client, spec, createOptions());

    expect(first.actions).toEqual([]);
    expect(second.actions).toEqual([]);
    expect(client.mutatingCalls).toEqual([]);
  });

  it('reports no change for a matching running instance', async () => {
    const client = new FakeControlPlane(instanceMetadata());
    const spec = desiredSpec({ config: { 'limits.cpu': '1' }, profiles: ['default'] });

    const result = await reconcileInstance(client, spec, createOptions());

    expect(result).toMatchObject({ ok: true, changed: false, actions: [] });
    expect(result.diff.before.instance?.config).toEqual({ 'limits.cpu': '1' });
    expect(result.diff.after.instance).toBeUndefined();
  });

  it('starts a stopped instance to push config, then stops it again', async () => {
    const client = new FakeControlPlane(instanceMetadata({ status: 'Stopped' }));
    const spec = desiredSpec({ state: 'stopped', config: { 'limits.cpu': '2' } });

    const result = await reconcileInstance(client, spec, createOptions());

    const body = {
      architecture: 'x86_64',
      config: {
        'limits.cpu': '2',
        'volatile.eth0.hwaddr': '00:16:3e:00:00:01',
        'volatile.idmap.base': '0',
      },
      devices: {},
      ephemeral: false,
      profiles: ['default'],
    };
    expect(result.actions).toEqual(['start', 'apply_container_configs', 'stop']);
    expect(client.calls.slice(1)).toEqual([
      { method: 'setState', args: ['web01', { action: 'start', timeout: 30 }] },
      { method: 'update', args: ['web01', body] },
      { method: 'setState', args: ['web01', { action: 'stop', timeout: 30 }] },
    ]);
    expect(result.diff).toEqual({
      before: {
        state: 'stopped',
        instance: {
          architecture: 'x86_64',
          config: { 'limits.cpu': '1' },
          devices: {},
          ephemeral: false,
          profiles: ['default'],
        },
      },
      after: { state: 'stopped', instance: body },
    });
  });

  it('leaves a matching stopped instance alone', async () => {
    const client = new FakeControlPlane(instanceMetadata({ status: 'Stopped' }));

    const result = await reconcileInstance(client, desiredSpec({ state: 'stopped' }), createOptions());

    expect(result.actions).toEqual([]);
    expect(client.mutatingCalls).toEqual([]);
  });

  it('unfreezes, stops and deletes a frozen instance', async () => {
    const client = new FakeControlPlane(instanceMetadata({ status: 'Frozen' }));

    const result = await reconcileInstance(client, desiredSpec({ state: 'absent' }), createOptions());

    expect(result.actions).toEqual(['unfreeze', 'stop', 'delete']);
    expect(client.instance).toBeNull();
  });

  it('does nothing when an absent instance should be absent', async () => {
    const client = new FakeControlPlane();

    const result = await reconcileInstance(client, desiredSpec({ state: 'absent' }), createOptions());

    expect(result).toMatchObject({ ok: true, changed: false, oldState: 'absent', actions: [] });
    expect(methods(client)).toEqual(['fetch']);
  });

  it('re-issues freeze for an instance that is already frozen', async () => {
    const client = new FakeControlPlane(instanceMetadata({ status: 'Frozen' }));

    const result = await reconcileInstance(client, desiredSpec({ state: 'frozen' }), createOptions());

    expect(result).toMatchObject({ ok: true, changed: true, actions: ['freeze'] });
  });

  it('restarts a running instance with force when forceStop is set', async () => {
    const client = new FakeControlPlane(instanceMetadata());
    const spec = desiredSpec({ state: 'restarted', forceStop: true, timeout: 10 });

    const result = await reconcileInstance(client, spec, createOptions());

    expect(result.actions).toEqual(['restart']);
    expect(client.calls[1]).toEqual({
      method: 'setState',
      args: ['web01', { action: 'restart', timeout: 10, force: true }],
    });
  });

  it('authenticates before anything else when a trust password is given', async () => {
    const client = new FakeControlPlane(instanceMetadata());

    await reconcileInstance(client, desiredSpec(), createOptions({ trustPassword: 'test-secret' }));

    expect(client.calls[0]).toEqual({ method: 'authenticate', args: ['test-secret'] });
    expect(client.calls[1]?.method).toBe('fetch');
  });

  // ===========================================================================
  // Address Wait
  // ===========================================================================

  describe('with wait for IPv4 addresses', () => {
    it('attaches the addresses after starting', async () => {
      const client = new FakeControlPlane(instanceMetadata({ status: 'Stopped' }));
      client.networkSequence = [
        {
          lo: { addresses: [{ family: 'inet', address: '127.0.0.1' }] },
          eth0: { addresses: [{ family: 'inet', address: '10.0.3.15' }] },
        },
      ];

      const result = await reconcileInstance(
        client,
        desiredSpec({ waitForIpv4Addresses: true }),
        createOptions()
      );

      expect(result).toMatchObject({ ok: true, actions: ['start'], addresses: { eth0: ['10.0.3.15'] } });
    });

    it('fails with the timeout message and keeps the completed actions', async () => {
      const client = new FakeControlPlane(instanceMetadata({ status: 'Stopped' }));

      const result = await reconcileInstance(
        client,
        desiredSpec({ waitForIpv4Addresses: true, timeout: 2 }),
        createOptions()
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.message).toBe('timeout waiting for addresses');
      expect(result.error).toBeInstanceOf(AddressTimeoutError);
      expect(result.actions).toEqual(['start']);
      expect(result.changed).toBe(true);
    });
  });

  // ===========================================================================
  // Dry Run
  // ===========================================================================

  describe('dry run', () => {
    it('reports the plan without mutating requests', async () => {
      const client = new FakeControlPlane(instanceMetadata({ status: 'Stopped' }));
      const spec = desiredSpec({ config: { 'limits.cpu': '4' }, waitForIpv4Addresses: true });

      const result = await reconcileInstance(client, spec, createOptions({ dryRun: true }));

      expect(result).toMatchObject({
        ok: true,
        changed: true,
        actions: ['start', 'apply_container_configs'],
      });
      expect(result.diff.after.instance?.config?.['limits.cpu']).toBe('4');
      expect(methods(client)).toEqual(['fetch']);
      expect(client.instance?.status).toBe('Stopped');
    });

    it('plans create and start for a missing instance', async () => {
      const client = new FakeControlPlane();

      const result = await reconcileInstance(client, desiredSpec(), createOptions({ dryRun: true }));

      expect(result.actions).toEqual(['create', 'start']);
      expect(client.mutatingCalls).toEqual([]);
    });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe('failures', () => {
    it('stops at the first failing step and lists the completed ones', async () => {
      const client = new FakeControlPlane();
      client.failures.set('setState:start', new ApiError('Instance is busy', 400));

      const result = await reconcileInstance(client, desiredSpec(), createOptions());

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.message).toBe('Instance is busy');
      expect(result.error).toBeInstanceOf(ApiError);
      expect(result.actions).toEqual(['create']);
      expect(result.changed).toBe(true);
    });

    it('fails on an unknown server status before any action', async () => {
      const client = new FakeControlPlane(instanceMetadata({ status: 'Error' }));

      const result = await reconcileInstance(client, desiredSpec(), createOptions());

      expect(result).toMatchObject({
        ok: false,
        message: 'Unsupported instance status: Error',
        changed: false,
        actions: [],
      });
    });

    it('fails when authentication is rejected', async () => {
      const client = new FakeControlPlane(instanceMetadata());
      client.failures.set('authenticate', new ApiError('not authorized', 403));

      const result = await reconcileInstance(
        client,
        desiredSpec(),
        createOptions({ trustPassword: 'test-secret' })
      );

      expect(result).toMatchObject({ ok: false, message: 'not authorized', actions: [] });
      expect(methods(client)).toEqual(['authenticate']);
    });
  });

  // ===========================================================================
  // Request Log
  // ===========================================================================

  it('copies the client request log into the result', async () => {
    const entry: RequestLogEntry = {
      type: 'sent request',
      request: { method: 'GET', url: '/1.0/instances/web01' },
      response: { status: 200 },
    };
    class LoggingControlPlane extends FakeControlPlane {
      readonly logs: RequestLogEntry[] = [entry];
    }
    const client = new LoggingControlPlane(instanceMetadata());

    const result = await reconcileInstance(client, desiredSpec(), createOptions());

    expect(result.logs).toEqual([entry]);
    expect(result.logs).not.toBe(client.logs);
  });

  it('omits logs when the client keeps none', async () => {
    const result = await reconcileInstance(
      new FakeControlPlane(instanceMetadata()),
      desiredSpec(),
      createOptions()
    );

    expect(result).not.toHaveProperty('logs');
  });
});

// =============================================================================
// Report
// =============================================================================

describe('toReport', () => {
  it('shapes a success', async () => {
    const client = new FakeControlPlane(instanceMetadata({ status: 'Stopped' }));
    const result = await reconcileInstance(client, desiredSpec(), createOptions());

    expect(toReport(result)).toMatchObject({
      failed: false,
      changed: true,
      old_state: 'stopped',
      actions: ['start'],
    });
  });

  it('shapes a failure with its message', async () => {
    const client = new FakeControlPlane();
    client.failures.set('create', new ApiError('Image not found', 404));
    const result = await reconcileInstance(client, desiredSpec(), createOptions());

    expect(toReport(result)).toMatchObject({
      failed: true,
      changed: false,
      actions: [],
      msg: 'Image not found',
    });
  });
});
