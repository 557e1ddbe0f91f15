/**
 * Document Model
 *
 * Converts parsed values into the DocNode tagged union and provides the
 * structural helpers every stage relies on: lookup, deep copy and
 * order-insensitive comparison.
 */

import { DocNode, MappingNode, ScalarNode, ScalarValue, SequenceNode } from './types';
import { ParseError } from './errors';

// ─── Constructors ───────────────────────────────────────────────────────────

export function mapping(entries: Iterable<[string, DocNode]> = []): MappingNode {
  return { kind: 'mapping', entries: new Map(entries) };
}

export function sequence(items: DocNode[] = []): SequenceNode {
  return { kind: 'sequence', items };
}

export function scalar(value: ScalarValue): ScalarNode {
  return { kind: 'scalar', value };
}

// ─── Conversion ─────────────────────────────────────────────────────────────

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function mapKey(key: unknown, at: string, artifact: string): string {
  if (typeof key === 'string') return key;
  if (typeof key === 'number' || typeof key === 'boolean') return String(key);
  throw new ParseError(artifact, `non-scalar mapping key at ${at}`);
}

/**
 * Convert a parsed value (plain objects, `Map`s, arrays and scalars) into a
 * DocNode. Map keys that are numbers or booleans are stringified with
 * `String()`, so `1.0` becomes `"1"`; the YAML parser hands over keys as
 * their source text to keep them exact.
 *
 * @param artifact - Name used in error messages
 */
export function toDocument(value: unknown, artifact: string = 'document', at: string = '$'): DocNode {
  if (value === null) return scalar(null);

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return scalar(value);
    case 'object':
      break;
    default:
      throw new ParseError(artifact, `unsupported value of type ${typeof value} at ${at}`);
  }

  if (Array.isArray(value)) {
    return sequence(value.map((item, i) => toDocument(item, artifact, `${at}[${i}]`)));
  }

  const entries = new Map<string, DocNode>();
  let source: Iterable<[unknown, unknown]>;

  if (value instanceof Map) {
    source = value.entries();
  } else if (isPlainObject(value)) {
    source = Object.entries(value);
  } else {
    throw new ParseError(artifact, `unsupported ${value.constructor.name} value at ${at}`);
  }

  for (const [rawKey, child] of source) {
    const key = mapKey(rawKey, at, artifact);
    if (entries.has(key)) {
      throw new ParseError(artifact, `duplicate key "${key}" at ${at}`);
    }
    entries.set(key, toDocument(child, artifact, `${at}.${key}`));
  }

  return { kind: 'mapping', entries };
}

/**
 * Convert a DocNode back into plain JavaScript values.
 * Key order of integer-like keys follows JavaScript object rules.
 */
export function fromDocument(node: DocNode): unknown {
  switch (node.kind) {
    case 'scalar':
      return node.value;
    case 'sequence':
      return node.items.map(fromDocument);
    case 'mapping':
      return Object.fromEntries([...node.entries].map(([key, child]) => [key, fromDocument(child)]));
  }
}

/**
 * Convert a DocNode into nested `Map`s and arrays, keeping key order exactly.
 */
export function toOrderedValue(node: DocNode): unknown {
  switch (node.kind) {
    case 'scalar':
      return node.value;
    case 'sequence':
      return node.items.map(toOrderedValue);
    case 'mapping': {
      const out = new Map<string, unknown>();
      for (const [key, child] of node.entries) {
        out.set(key, toOrderedValue(child));
      }
      return out;
    }
  }
}

// ─── Lookup ─────────────────────────────────────────────────────────────────

export function isMapping(node: DocNode | undefined): node is MappingNode {
  return node !== undefined && node.kind === 'mapping';
}

/**
 * Follow a chain of mapping keys. Returns undefined as soon as a step is
 * missing or lands on something that is not a mapping.
 */
export function getIn(node: DocNode | undefined, ...keys: string[]): DocNode | undefined {
  let current = node;
  for (const key of keys) {
    if (!isMapping(current)) return undefined;
    current = current.entries.get(key);
  }
  return current;
}

export function getMapping(node: DocNode | undefined, ...keys: string[]): MappingNode | undefined {
  const found = getIn(node, ...keys);
  return isMapping(found) ? found : undefined;
}

export function getString(node: DocNode | undefined, ...keys: string[]): string | undefined {
  const found = getIn(node, ...keys);
  if (found && found.kind === 'scalar' && typeof found.value === 'string') {
    return found.value;
  }
  return undefined;
}

// ─── Copy ───────────────────────────────────────────────────────────────────

export function cloneNode<T extends DocNode>(node: T): T;
export function cloneNode(node: DocNode): DocNode {
  switch (node.kind) {
    case 'scalar':
      return scalar(node.value);
    case 'sequence':
      return sequence(node.items.map((item) => cloneNode(item)));
    case 'mapping': {
      const entries = new Map<string, DocNode>();
      for (const [key, child] of node.entries) {
        entries.set(key, cloneNode(child));
      }
      return { kind: 'mapping', entries };
    }
  }
}

// ─── Comparison ────────────────────────────────────────────────────────────

/**
 * Structural equality ignoring mapping key order. Scalars compare by type
 * and value, so `1` and `"1"` differ.
 */
export function nodesEqual(a: DocNode, b: DocNode): boolean {
  switch (a.kind) {
    case 'scalar':
      return b.kind === 'scalar' && Object.is(a.value, b.value);

    case 'sequence':
      if (b.kind !== 'sequence' || a.items.length !== b.items.length) return false;
      return a.items.every((item, i) => nodesEqual(item, b.items[i]));

    case 'mapping': {
      if (b.kind !== 'mapping' || a.entries.size !== b.entries.size) return false;
      for (const [key, child] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !nodesEqual(child, other)) return false;
      }
      return true;
    }
  }
}
