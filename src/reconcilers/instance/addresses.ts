/**
 * Waiting for instance network readiness
 *
 * After a start or restart the caller can ask to block until every network
 * device (loopback excluded) reports at least one IPv4 address.
 */

import type { InstanceStateMetadata } from '../../api/types.js';
import { AddressTimeoutError } from '../../api/errors.js';
import { sleep as defaultSleep } from '../../api/retry.js';
import type { AddressMap, ControlPlaneClient } from './types.js';

/** Delay between two state probes */
export const ADDRESS_POLL_INTERVAL_MS = 1000;

const IGNORED_DEVICES = ['lo'];

// =============================================================================
// Timed Poll
// =============================================================================

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Outcome of a timed poll
 */
export type PollOutcome<T> = { done: true; value: T } | { done: false };

/**
 * Sleep one interval, probe, and repeat until the probe yields a value or
 * the deadline passes
 *
 * A probe returns undefined to ask for another round. Aborting the signal
 * rejects with the signal's reason.
 */
export async function pollUntil<T>(
  probe: () => Promise<T | undefined>,
  options: PollOptions
): Promise<PollOutcome<T>> {
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? defaultSleep;
  const deadline = now() + options.timeoutMs;

  while (now() < deadline) {
    options.signal?.throwIfAborted();
    await wait(options.intervalMs);
    options.signal?.throwIfAborted();

    const value = await probe();
    if (value !== undefined) {
      return { done: true, value };
    }
  }

  return { done: false };
}

// =============================================================================
// Address Extraction
// =============================================================================

/**
 * IPv4 addresses per device, loopback removed
 */
export function extractIpv4Addresses(
  state: InstanceStateMetadata | null,
  ignoreDevices: readonly string[] = IGNORED_DEVICES
): AddressMap {
  const addresses: AddressMap = {};
  const network = state?.network ?? {};

  for (const [device, info] of Object.entries(network)) {
    if (ignoreDevices.includes(device)) continue;
    addresses[device] = (info.addresses ?? [])
      .filter((address) => address.family === 'inet')
      .map((address) => address.address);
  }

  return addresses;
}

/**
 * At least one device, and every device has an address
 */
export function hasAllIpv4Addresses(addresses: AddressMap): boolean {
  const lists = Object.values(addresses);
  return lists.length > 0 && lists.every((list) => list.length > 0);
}

// =============================================================================
// Waiter
// =============================================================================

export interface AddressWaitOptions {
  timeoutSeconds: number;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Block until the instance has IPv4 addresses on all devices
 *
 * @throws AddressTimeoutError when the deadline passes first
 */
export async function waitForAddresses(
  client: ControlPlaneClient,
  name: string,
  options: AddressWaitOptions
): Promise<AddressMap> {
  const outcome = await pollUntil(
    async () => {
      const addresses = extractIpv4Addresses(await client.fetchState(name));
      return hasAllIpv4Addresses(addresses) ? addresses : undefined;
    },
    {
      timeoutMs: options.timeoutSeconds * 1000,
      intervalMs: ADDRESS_POLL_INTERVAL_MS,
      signal: options.signal,
      sleep: options.sleep,
      now: options.now,
    }
  );

  if (!outcome.done) {
    throw new AddressTimeoutError(options.timeoutSeconds);
  }
  return outcome.value;
}
