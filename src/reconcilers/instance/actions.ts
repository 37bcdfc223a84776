/**
 * Lifecycle primitives for a single instance
 *
 * Each method issues one request (skipped in dry-run) and then appends its
 * name to the run's action log, so the log only lists what completed.
 */

import type { StateAction } from '../../api/types.js';
import type { ApiLogger } from '../../api/logger.js';
import { buildApplyBody, observedAttributes } from './diff.js';
import type {
  ActionName,
  ControlPlaneClient,
  CreateInstanceRequest,
  ReconciliationRun,
} from './types.js';

export class ActionExecutor {
  constructor(
    private readonly client: ControlPlaneClient,
    private readonly run: ReconciliationRun,
    private readonly log: ApiLogger
  ) {}

  async create(): Promise<void> {
    const { spec } = this.run;
    const request: CreateInstanceRequest = {
      name: spec.name,
      type: spec.type,
    };
    if (spec.architecture !== undefined) request.architecture = spec.architecture;
    if (spec.config !== undefined) request.config = spec.config;
    if (spec.devices !== undefined) request.devices = spec.devices;
    if (spec.ephemeral !== undefined) request.ephemeral = spec.ephemeral;
    if (spec.profiles !== undefined) request.profiles = spec.profiles;
    if (spec.source !== undefined) request.source = spec.source;

    await this.perform('create', () => this.client.create(request, spec.target));
  }

  async start(): Promise<void> {
    await this.changeState('start');
  }

  async stop(): Promise<void> {
    await this.changeState('stop', this.run.spec.forceStop);
  }

  async restart(): Promise<void> {
    await this.changeState('restart', this.run.spec.forceStop);
  }

  async freeze(): Promise<void> {
    await this.changeState('freeze');
  }

  async unfreeze(): Promise<void> {
    await this.changeState('unfreeze');
  }

  async delete(): Promise<void> {
    await this.perform('delete', () => this.client.delete(this.run.spec.name));
  }

  /**
   * Push the merged attribute set; recorded in diff.after.instance
   */
  async applyConfigs(): Promise<void> {
    const observed = this.run.observed ? observedAttributes(this.run.observed) : {};
    const body = buildApplyBody(this.run.spec, observed);
    this.run.diff.after.instance = body;

    await this.perform('apply_container_configs', () =>
      this.client.update(this.run.spec.name, body)
    );
  }

  private async changeState(action: StateAction, force = false): Promise<void> {
    await this.perform(action, () =>
      this.client.setState(this.run.spec.name, {
        action,
        timeout: this.run.spec.timeout,
        ...(force ? { force: true } : {}),
      })
    );
  }

  private async perform(action: ActionName, request: () => Promise<void>): Promise<void> {
    if (this.run.dryRun) {
      this.log.debug(`[dry-run] ${action}`, { instance: this.run.spec.name });
    } else {
      this.log.debug(`Running ${action}`, { instance: this.run.spec.name });
      await request();
    }
    this.run.actions.push(action);
  }
}
