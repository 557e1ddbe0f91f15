/**
 * Baseline Loader
 *
 * Reads the legacy-operations document and collects the key of every
 * operation it defines. Only `paths` is consulted.
 */

import { DocNode } from './types';
import { OperationKeySet, listOperations } from './operation-key';

export const MISSING_BASELINE_WARNING =
  'Baseline not found: every changed operation will be strict-checked';

export interface BaselineLoadResult {
  keys: OperationKeySet;
  warnings: string[];
}

/**
 * Build the baseline set. A missing baseline (`null`) yields an empty set
 * and a warning, so legacy operations get strict checks rather than none.
 */
export function loadBaseline(document: DocNode | null): BaselineLoadResult {
  if (document === null) {
    return { keys: new OperationKeySet(), warnings: [MISSING_BASELINE_WARNING] };
  }

  const keys = new OperationKeySet(listOperations(document).map((op) => op.key));
  return { keys, warnings: [] };
}
