/**
 * Change Detector
 *
 * Two independent passes whose results are unioned:
 *  1. Diff-driven: map every entry of the structural diff report onto the
 *     operation that owns its location.
 *  2. Structural: compare every operation of the after document with its
 *     before counterpart, catching edits the diff tool does not report
 *     (descriptions, summaries, examples).
 */

import {
  AffectedOperation,
  ChangeSource,
  DiffBucket,
  DiffEntry,
  DocNode,
  EntityLocator,
  HttpMethod,
  OperationKey,
  SpecEntityDetails,
} from './types';
import { getMapping, nodesEqual } from './document';
import { ParseError } from './errors';
import {
  HTTP_METHODS,
  OperationKeySet,
  formatOperationKey,
  getOperation,
  listOperations,
} from './operation-key';

// ─── Affected Set ───────────────────────────────────────────────────────────

/**
 * Insertion-ordered set of affected operations, remembering every source
 * that flagged each one.
 */
export class AffectedSet {
  private readonly entries = new Map<string, AffectedOperation>();

  add(key: OperationKey, source: ChangeSource): void {
    const id = formatOperationKey(key);
    const existing = this.entries.get(id);
    if (existing) {
      if (!existing.sources.includes(source)) existing.sources.push(source);
      return;
    }
    this.entries.set(id, { key: { method: key.method, path: key.path }, sources: [source] });
  }

  has(key: OperationKey): boolean {
    return this.entries.has(formatOperationKey(key));
  }

  sourcesOf(key: OperationKey): ChangeSource[] {
    return [...(this.entries.get(formatOperationKey(key))?.sources ?? [])];
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): OperationKeySet {
    return new OperationKeySet([...this.entries.values()].map((e) => e.key));
  }

  toArray(): AffectedOperation[] {
    return [...this.entries.values()].map((e) => ({ key: { ...e.key }, sources: [...e.sources] }));
  }
}

// ─── Diff Report Normalisation ──────────────────────────────────────────────

const BUCKET_FIELDS: Array<{ field: string; bucket: DiffBucket }> = [
  { field: 'breakingDifferences', bucket: 'breaking' },
  { field: 'nonBreakingDifferences', bucket: 'non-breaking' },
  { field: 'unclassifiedDifferences', bucket: 'unclassified' },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toLocator(value: unknown): EntityLocator | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && value.length > 0) {
    const tokens: string[] = [];
    for (const token of value) {
      if (typeof token === 'string') tokens.push(token);
      else if (typeof token === 'number') tokens.push(String(token));
      else return undefined;
    }
    return tokens;
  }
  return undefined;
}

function toDetails(value: unknown): SpecEntityDetails[] {
  if (!Array.isArray(value)) return [];
  const details: SpecEntityDetails[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    details.push({ location: toLocator(item.location), value: item.value });
  }
  return details;
}

function toEntry(raw: unknown, bucket: DiffBucket): DiffEntry | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    bucket,
    type: optionalString(raw.type),
    action: optionalString(raw.action),
    code: optionalString(raw.code),
    entity: optionalString(raw.entity),
    sourceSpecEntityDetails: toDetails(raw.sourceSpecEntityDetails),
    destinationSpecEntityDetails: toDetails(raw.destinationSpecEntityDetails),
  };
}

function collect(list: unknown, bucket: DiffBucket): DiffEntry[] {
  if (!Array.isArray(list)) return [];
  const entries: DiffEntry[] = [];
  for (const raw of list) {
    const entry = toEntry(raw, bucket);
    if (entry) entries.push(entry);
  }
  return entries;
}

/**
 * Flatten a diff report into classified entries.
 *
 * Accepts the bucketed report, a report holding a single `differences`
 * list, or a bare list. `null`/`undefined` is an empty diff.
 */
export function normalizeDiff(diff: unknown): DiffEntry[] {
  if (diff === null || diff === undefined) return [];

  if (Array.isArray(diff)) return collect(diff, 'unclassified');

  if (!isRecord(diff)) {
    throw new ParseError('diff', `expected an object or an array, got ${typeof diff}`);
  }

  const entries = BUCKET_FIELDS.flatMap(({ field, bucket }) => collect(diff[field], bucket));
  if (entries.length === 0) {
    return collect(diff.differences, 'unclassified');
  }
  return entries;
}

// ─── Locator Resolution ─────────────────────────────────────────────────────

export interface LocatorTarget {
  path: string;

  /** Absent when the locator stops at the path item or a path-level field */
  method?: HttpMethod;
}

function methodOf(token: string | undefined): HttpMethod | undefined {
  if (token === undefined) return undefined;
  const upper = token.toUpperCase();
  return HTTP_METHODS.find((m) => m === upper);
}

/**
 * Find the operation (or path) a locator points into.
 *
 * Dotted locators split paths that contain dots, so the longest run of
 * tokens that joins back into a known path key wins. Locators outside
 * `paths` return undefined.
 *
 * @param knownPaths - `paths` keys of the before and after documents
 */
export function resolveLocator(
  locator: EntityLocator,
  knownPaths: ReadonlySet<string> = new Set()
): LocatorTarget | undefined {
  const tokens = typeof locator === 'string' ? locator.split('.') : locator;
  if (tokens[0] !== 'paths' || tokens.length < 2) return undefined;

  if (typeof locator !== 'string') {
    const path = tokens[1];
    return path ? { path, method: methodOf(tokens[2]) } : undefined;
  }

  const rest = tokens.slice(1);
  for (let n = rest.length; n >= 1; n--) {
    const candidate = rest.slice(0, n).join('.');
    if (knownPaths.has(candidate)) {
      return { path: candidate, method: methodOf(rest[n]) };
    }
  }

  const path = rest[0];
  return path ? { path, method: methodOf(rest[1]) } : undefined;
}

function pathKeys(document: DocNode): string[] {
  const paths = getMapping(document, 'paths');
  return paths ? [...paths.entries.keys()] : [];
}

function operationsAtPath(document: DocNode, path: string): OperationKey[] {
  return listOperations(document)
    .filter((op) => op.key.path === path)
    .map((op) => op.key);
}

// ─── Phase 1: Diff-driven ───────────────────────────────────────────────────

/**
 * Derive affected operations from a diff report.
 *
 * A locator that stops at a path (or continues into a path-level field)
 * affects every operation under that path in the after document, or in the
 * before document when the path no longer exists.
 */
export function keysFromDiff(diff: unknown, before: DocNode, after: DocNode): AffectedOperation[] {
  const known = new Set([...pathKeys(after), ...pathKeys(before)]);
  const affected = new AffectedSet();

  for (const entry of normalizeDiff(diff)) {
    const details = [...entry.destinationSpecEntityDetails, ...entry.sourceSpecEntityDetails];

    for (const { location } of details) {
      if (location === undefined) continue;
      const target = resolveLocator(location, known);
      if (!target) continue;

      if (target.method) {
        affected.add({ method: target.method, path: target.path }, entry.bucket);
        continue;
      }

      const fromAfter = operationsAtPath(after, target.path);
      const keys = fromAfter.length > 0 ? fromAfter : operationsAtPath(before, target.path);
      for (const key of keys) affected.add(key, entry.bucket);
    }
  }

  return affected.toArray();
}

// ─── Phase 2: Structural Comparison ─────────────────────────────────────────

/**
 * Compare every operation of the after document with the before document.
 * New operations are `added`; any structural difference, however small,
 * is `modified`.
 */
export function detectStructuralChanges(before: DocNode, after: DocNode): AffectedOperation[] {
  const changes: AffectedOperation[] = [];

  for (const { key, body } of listOperations(after)) {
    const previous = getOperation(before, key);
    if (previous === undefined) {
      changes.push({ key, sources: ['added'] });
    } else if (!nodesEqual(previous, body)) {
      changes.push({ key, sources: ['modified'] });
    }
  }

  return changes;
}

/**
 * Operations of the before document that no longer exist in the after one.
 */
export function findRemovedOperations(before: DocNode, after: DocNode): OperationKey[] {
  return listOperations(before)
    .map((op) => op.key)
    .filter((key) => getOperation(after, key) === undefined);
}

// ─── Union ──────────────────────────────────────────────────────────────────

/**
 * Run both phases and union the results. Diff-derived keys come first in
 * report order, followed by the after document's order. Operations that
 * disappeared are flagged `removed` last so they reach the decision log.
 */
export function detectChanges(diff: unknown, before: DocNode, after: DocNode): AffectedSet {
  const affected = new AffectedSet();

  for (const op of keysFromDiff(diff, before, after)) {
    for (const source of op.sources) affected.add(op.key, source);
  }
  for (const op of detectStructuralChanges(before, after)) {
    for (const source of op.sources) affected.add(op.key, source);
  }
  for (const key of findRemovedOperations(before, after)) {
    affected.add(key, 'removed');
  }

  return affected;
}

