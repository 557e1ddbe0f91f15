/**
 * Component Closure Resolver
 *
 * Starting from the `$ref`s of the assembled paths, walks the reference
 * graph breadth-first and copies exactly the reachable component
 * definitions out of the after document.
 */

import { DocNode, MappingNode, UnresolvedReason, UnresolvedReference } from './types';
import { cloneNode, getMapping, isMapping, mapping } from './document';

export interface ClosureRoots {
  /** Trees whose references seed the walk (assembled paths, carried fields) */
  roots: DocNode[];

  /** `security` requirement lists naming schemes in components.securitySchemes */
  securityRequirements?: DocNode[];
}

export interface ClosureResult {
  components: MappingNode;
  unresolved: UnresolvedReference[];
}

interface ComponentRef {
  section: string;
  name: string;
}

// ─── Reference Scanning ─────────────────────────────────────────────────────

/**
 * Collect every `$ref` string in a tree, in document order.
 */
export function collectRefs(node: DocNode, found: string[] = []): string[] {
  switch (node.kind) {
    case 'scalar':
      break;
    case 'sequence':
      for (const item of node.items) collectRefs(item, found);
      break;
    case 'mapping':
      for (const [key, child] of node.entries) {
        if (key === '$ref' && child.kind === 'scalar' && typeof child.value === 'string') {
          found.push(child.value);
        } else {
          collectRefs(child, found);
        }
      }
      break;
  }
  return found;
}

/**
 * Scheme names used by `security` requirement lists.
 */
export function collectSecuritySchemes(requirements: DocNode[]): string[] {
  const names: string[] = [];
  for (const list of requirements) {
    if (list.kind !== 'sequence') continue;
    for (const requirement of list.items) {
      if (!isMapping(requirement)) continue;
      for (const name of requirement.entries.keys()) {
        if (!names.includes(name)) names.push(name);
      }
    }
  }
  return names;
}

// ─── Pointer Handling ───────────────────────────────────────────────────────

function percentDecode(token: string): string {
  try {
    return decodeURIComponent(token);
  } catch {
    return token;
  }
}

function decodeToken(token: string): string {
  return percentDecode(token).replace(/~1/g, '/').replace(/~0/g, '~');
}

function encodeToken(name: string): string {
  return name.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function componentPointer(section: string, name: string): string {
  return `#/components/${encodeToken(section)}/${encodeToken(name)}`;
}

/**
 * Map a reference onto the component that owns it. Pointers deeper than
 * the component name (`#/components/schemas/Pet/properties/id`) still
 * resolve to `schemas/Pet`.
 */
export function parseComponentRef(ref: string): ComponentRef | UnresolvedReason {
  if (!ref.startsWith('#')) return 'external';

  const tokens = ref.slice(1).split('/');
  if (tokens.length < 4 || tokens[0] !== '' || tokens[1] !== 'components') {
    return 'unsupported-pointer';
  }

  const section = decodeToken(tokens[2]);
  const name = decodeToken(tokens[3]);
  if (!section || !name) return 'unsupported-pointer';
  return { section, name };
}

// ─── Closure ────────────────────────────────────────────────────────────────

/**
 * Compute the minimal `components` mapping for the given roots.
 *
 * Each reference string is processed once and each component copied once,
 * so mutually referencing definitions terminate. `components.schemas` is
 * always present; other sections appear only when something was copied.
 * Sections and names keep the after document's order.
 */
export function resolveComponents(after: DocNode, seeds: ClosureRoots): ClosureResult {
  const source = getMapping(after, 'components');
  const unresolved: UnresolvedReference[] = [];

  const worklist: string[] = [];
  for (const root of seeds.roots) collectRefs(root, worklist);
  for (const name of collectSecuritySchemes(seeds.securityRequirements ?? [])) {
    worklist.push(componentPointer('securitySchemes', name));
  }

  const visitedRefs = new Set<string>();
  const copied = new Map<string, Map<string, DocNode>>();

  for (let i = 0; i < worklist.length; i++) {
    const ref = worklist[i];
    if (visitedRefs.has(ref)) continue;
    visitedRefs.add(ref);

    const target = parseComponentRef(ref);
    if (typeof target === 'string') {
      unresolved.push({ ref, reason: target });
      continue;
    }

    const section = getMapping(source, target.section);
    if (!section) {
      unresolved.push({ ref, reason: 'missing-section' });
      continue;
    }

    const definition = section.entries.get(target.name);
    if (definition === undefined) {
      unresolved.push({ ref, reason: 'missing-component' });
      continue;
    }

    let names = copied.get(target.section);
    if (!names) {
      names = new Map();
      copied.set(target.section, names);
    }
    if (names.has(target.name)) continue;

    names.set(target.name, cloneNode(definition));
    collectRefs(definition, worklist);
  }

  return { components: orderComponents(source, copied), unresolved };
}

function orderComponents(
  source: MappingNode | undefined,
  copied: Map<string, Map<string, DocNode>>
): MappingNode {
  const components = mapping();
  if (!source || !isMapping(source.entries.get('schemas'))) {
    components.entries.set('schemas', mapping());
  }

  for (const [sectionName, section] of source?.entries ?? []) {
    const names = copied.get(sectionName);
    if (sectionName !== 'schemas' && !names) continue;

    const out = mapping();
    if (names && isMapping(section)) {
      for (const name of section.entries.keys()) {
        const definition = names.get(name);
        if (definition !== undefined) out.entries.set(name, definition);
      }
    }
    components.entries.set(sectionName, out);
  }

  return components;
}
