/**
 * Command exports
 */

export { applyCommand, planCommand, type ApplyOptions } from './apply.js';
export { statusCommand, type StatusOptions, type InstanceStatus } from './status.js';
