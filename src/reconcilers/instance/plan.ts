/**
 * Transition planning
 *
 * Maps (observed state, desired state) to the ordered steps that converge
 * the instance. Attribute changes go in before the final action of a
 * transition, after a start when the instance must be running to accept
 * them.
 */

import type { DesiredSpec, ObservedState, PlanStep } from './types.js';

export interface PlanInput {
  observed: ObservedState;
  desired: DesiredSpec['state'];
  /** Result of the attribute diff against the observation */
  needsApply: boolean;
  waitForAddresses: boolean;
}

function applyIfNeeded(needsApply: boolean): PlanStep[] {
  return needsApply ? ['apply_container_configs'] : [];
}

function planStarted({ observed, needsApply }: PlanInput): PlanStep[] {
  switch (observed) {
    case 'absent':
      return ['create', 'start'];
    case 'frozen':
      return ['unfreeze', ...applyIfNeeded(needsApply)];
    case 'stopped':
      return ['start', ...applyIfNeeded(needsApply)];
    case 'started':
      return applyIfNeeded(needsApply);
  }
}

function planStopped({ observed, needsApply }: PlanInput): PlanStep[] {
  switch (observed) {
    case 'absent':
      return ['create'];
    case 'stopped':
      // Most attributes cannot be changed on a stopped instance
      return needsApply ? ['start', 'apply_container_configs', 'stop'] : [];
    case 'frozen':
      return ['unfreeze', ...applyIfNeeded(needsApply), 'stop'];
    case 'started':
      return [...applyIfNeeded(needsApply), 'stop'];
  }
}

function planRestarted({ observed, needsApply }: PlanInput): PlanStep[] {
  if (observed === 'absent') {
    return ['create', 'start'];
  }
  return [
    ...(observed === 'frozen' ? (['unfreeze'] as const) : []),
    ...applyIfNeeded(needsApply),
    'restart',
  ];
}

function planAbsent({ observed }: PlanInput): PlanStep[] {
  if (observed === 'absent') {
    return [];
  }
  return [
    ...(observed === 'frozen' ? (['unfreeze'] as const) : []),
    ...(observed !== 'stopped' ? (['stop'] as const) : []),
    'delete',
  ];
}

function planFrozen({ observed, needsApply }: PlanInput): PlanStep[] {
  switch (observed) {
    case 'absent':
      return ['create', 'start', 'freeze'];
    case 'stopped':
      return ['start', ...applyIfNeeded(needsApply), 'freeze'];
    case 'started':
    case 'frozen':
      // Re-freezing a frozen instance is left to the server
      return [...applyIfNeeded(needsApply), 'freeze'];
  }
}

/**
 * Ordered steps for one transition
 */
export function planTransition(input: PlanInput): PlanStep[] {
  switch (input.desired) {
    case 'started':
      return withAddressWait(planStarted(input), input.waitForAddresses);
    case 'stopped':
      return planStopped(input);
    case 'restarted':
      return withAddressWait(planRestarted(input), input.waitForAddresses);
    case 'absent':
      return planAbsent(input);
    case 'frozen':
      return planFrozen(input);
    default: {
      const unreachable: never = input.desired;
      throw new Error(`Unsupported desired state: ${String(unreachable)}`);
    }
  }
}

function withAddressWait(steps: PlanStep[], wait: boolean): PlanStep[] {
  return wait ? [...steps, 'wait_for_addresses'] : steps;
}
