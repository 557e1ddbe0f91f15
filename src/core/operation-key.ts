/**
 * Operation Key Model
 *
 * An operation is identified by its HTTP verb and its exact `paths` key.
 * Keys, not paths, are the unit every later stage reasons about.
 */

import { DocNode, HttpMethod, OperationEntry, OperationKey } from './types';
import { getMapping, isMapping } from './document';

export const HTTP_METHODS: readonly HttpMethod[] = [
  'GET',
  'PUT',
  'POST',
  'DELETE',
  'PATCH',
  'OPTIONS',
  'HEAD',
  'TRACE',
];

const METHOD_SET = new Set<string>(HTTP_METHODS);

function asHttpMethod(token: string): HttpMethod | undefined {
  const upper = token.toUpperCase();
  return HTTP_METHODS.find((m) => m === upper);
}

/**
 * Whether a token (in any case) names one of the eight operation verbs.
 */
export function isHttpMethod(token: string): boolean {
  return METHOD_SET.has(token.toUpperCase());
}

/**
 * Build a key from a verb in any case and a raw path.
 */
export function operationKey(method: string, path: string): OperationKey {
  const verb = asHttpMethod(method);
  if (!verb) {
    throw new Error(`Unknown HTTP method "${method}"`);
  }
  return { method: verb, path };
}

export function formatOperationKey(key: OperationKey): string {
  return `${key.method} ${key.path}`;
}

/**
 * Parse `"GET /pet/{id}"`. Everything after the first space is the path.
 */
export function parseOperationKey(id: string): OperationKey {
  const space = id.indexOf(' ');
  if (space <= 0) {
    throw new Error(`Invalid operation key "${id}" (expected "<METHOD> <path>")`);
  }
  return operationKey(id.slice(0, space), id.slice(space + 1));
}

/**
 * Enumerate every operation of a document in document order.
 * Path items that are not mappings and path-level fields are skipped.
 */
export function listOperations(document: DocNode): OperationEntry[] {
  const paths = getMapping(document, 'paths');
  if (!paths) return [];

  const operations: OperationEntry[] = [];
  for (const [path, item] of paths.entries) {
    if (!isMapping(item)) continue;
    for (const [field, body] of item.entries) {
      const method = asHttpMethod(field);
      if (method) {
        operations.push({ key: { method, path }, body });
      }
    }
  }
  return operations;
}

/**
 * Look up one operation body. The verb is matched case-insensitively
 * against the path item's keys.
 */
export function getOperation(document: DocNode, key: OperationKey): DocNode | undefined {
  const item = getMapping(document, 'paths', key.path);
  if (!item) return undefined;
  for (const [field, body] of item.entries) {
    if (field.toUpperCase() === key.method) return body;
  }
  return undefined;
}

// ─── Key Set ────────────────────────────────────────────────────────────────

/**
 * Insertion-ordered set of operation keys.
 */
export class OperationKeySet implements Iterable<OperationKey> {
  private readonly keys = new Map<string, OperationKey>();

  constructor(keys: Iterable<OperationKey> = []) {
    for (const key of keys) this.add(key);
  }

  add(key: OperationKey): this {
    const id = formatOperationKey(key);
    if (!this.keys.has(id)) {
      this.keys.set(id, { method: key.method, path: key.path });
    }
    return this;
  }

  has(key: OperationKey): boolean {
    return this.keys.has(formatOperationKey(key));
  }

  get size(): number {
    return this.keys.size;
  }

  toArray(): OperationKey[] {
    return [...this.keys.values()];
  }

  [Symbol.iterator](): Iterator<OperationKey> {
    return this.keys.values();
  }
}
