/**
 * Unit Tests: Connection Settings
 *
 * @see src/config/connection.ts
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_SNAP_URL,
  DEFAULT_URL,
  formatConnection,
  resolveConnection,
  type ConnectionEnvironment,
} from '../../src/config/connection.js';

function environment(
  env: Record<string, string | undefined> = {},
  existing: string[] = []
): ConnectionEnvironment {
  return {
    env,
    home: '/home/ops',
    exists: vi.fn((path: string) => existing.includes(path)),
  };
}

describe('resolveConnection', () => {
  it('uses the classic socket and home directory defaults', () => {
    expect(resolveConnection({}, environment())).toEqual({
      url: DEFAULT_URL,
      clientCert: '/home/ops/.config/lxc/client.crt',
      clientKey: '/home/ops/.config/lxc/client.key',
      instancesEndpoint: '/instances',
    });
  });

  it('prefers the snap socket when it exists', () => {
    const resolved = resolveConnection({}, environment({}, ['/var/snap/lxd/common/lxd/unix.socket']));

    expect(resolved.url).toBe(DEFAULT_SNAP_URL);
  });

  it('also prefers the snap socket when the classic default is asked for explicitly', () => {
    const resolved = resolveConnection(
      { url: DEFAULT_URL },
      environment({}, ['/var/snap/lxd/common/lxd/unix.socket'])
    );

    expect(resolved.url).toBe(DEFAULT_SNAP_URL);
  });

  it('honours a custom snap socket', () => {
    const resolved = resolveConnection(
      { snapUrl: 'unix:/run/lxd.socket' },
      environment({}, ['/run/lxd.socket'])
    );

    expect(resolved.url).toBe('unix:/run/lxd.socket');
  });

  it('keeps any other URL as given', () => {
    const env = environment({}, ['/var/snap/lxd/common/lxd/unix.socket']);

    expect(resolveConnection({ url: 'https://lxd.example.test:8443' }, env).url).toBe(
      'https://lxd.example.test:8443'
    );
    expect(env.exists).not.toHaveBeenCalled();
  });

  it('reads the environment when no option is given', () => {
    const resolved = resolveConnection(
      {},
      environment({
        LXD_URL: 'https://lxd.example.test:8443',
        LXD_CLIENT_CERT: '/etc/lxd/ci.crt',
        LXD_CLIENT_KEY: '/etc/lxd/ci.key',
        LXD_TRUST_PASSWORD: 'test-secret',
        LXD_INSTANCES_ENDPOINT: '/containers',
      })
    );

    expect(resolved).toEqual({
      url: 'https://lxd.example.test:8443',
      clientCert: '/etc/lxd/ci.crt',
      clientKey: '/etc/lxd/ci.key',
      trustPassword: 'test-secret',
      instancesEndpoint: '/containers',
    });
  });

  it('lets options win over the environment and skips empty values', () => {
    const resolved = resolveConnection(
      { clientCert: '/opt/a.crt', trustPassword: '' },
      environment({ LXD_CLIENT_CERT: '/etc/lxd/ci.crt', LXD_TRUST_PASSWORD: '' })
    );

    expect(resolved.clientCert).toBe('/opt/a.crt');
    expect(resolved).not.toHaveProperty('trustPassword');
  });
});

describe('formatConnection', () => {
  it('shows the URL and the API path', () => {
    expect(formatConnection(resolveConnection({ instancesEndpoint: '/containers' }, environment()))).toBe(
      'unix:/var/lib/lxd/unix.socket (/1.0/containers)'
    );
  });
});
