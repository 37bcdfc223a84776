/**
 * Serializable report of a reconciliation run
 *
 * Field names follow the result document callers already consume
 * (`old_state`, `msg`), so the report can be printed as JSON unchanged.
 */

import type { RequestLogEntry } from '../../api/types.js';
import type { ActionName, AddressMap, ObservedState, ReconcileResult, ResultDiff } from './types.js';

export interface ReconcileReport {
  failed: boolean;
  changed: boolean;
  /** Present on success */
  old_state?: ObservedState;
  actions: ActionName[];
  diff: ResultDiff;
  addresses?: AddressMap;
  /** Present on failure */
  msg?: string;
  logs?: RequestLogEntry[];
}

export function toReport(result: ReconcileResult): ReconcileReport {
  const report: ReconcileReport = {
    failed: !result.ok,
    changed: result.changed,
    actions: [...result.actions],
    diff: result.diff,
  };

  if (result.ok) {
    report.old_state = result.oldState;
    if (result.addresses !== undefined) {
      report.addresses = result.addresses;
    }
  } else {
    report.msg = result.message;
  }

  if (result.logs !== undefined) {
    report.logs = result.logs;
  }

  return report;
}
