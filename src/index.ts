/**
 * lxd-reconcile library entry point
 *
 * The CLI lives in cli.ts; this module exposes the reconciler, the LXD
 * client and the manifest loader for programmatic use.
 */

export * from './reconcilers/instance/index.js';
export * from './api/index.js';
export * from './manifest/index.js';
export * from './config/index.js';
