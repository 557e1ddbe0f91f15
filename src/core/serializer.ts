/**
 * Output Serializer
 *
 * Writes a document as JSON and as YAML, both keeping the DocNode key
 * order, and counts what the partial document kept.
 */

import { stringify } from 'yaml';
import { DocNode, MappingNode, OutputSummary } from './types';
import { getMapping, isMapping, toOrderedValue } from './document';
import { listOperations } from './operation-key';

// ─── JSON ───────────────────────────────────────────────────────────────────

function writeJson(node: DocNode, indent: string): string {
  switch (node.kind) {
    case 'scalar':
      return JSON.stringify(node.value);

    case 'sequence': {
      if (node.items.length === 0) return '[]';
      const inner = indent + '  ';
      const items = node.items.map((item) => inner + writeJson(item, inner));
      return `[\n${items.join(',\n')}\n${indent}]`;
    }

    case 'mapping': {
      if (node.entries.size === 0) return '{}';
      const inner = indent + '  ';
      const entries = [...node.entries].map(
        ([key, child]) => `${inner}${JSON.stringify(key)}: ${writeJson(child, inner)}`
      );
      return `{\n${entries.join(',\n')}\n${indent}}`;
    }
  }
}

/**
 * Two-space indented JSON, identical in layout to `JSON.stringify(v, null, 2)`
 * but keeping integer-like keys where the document put them.
 */
export function toJsonText(node: DocNode): string {
  return writeJson(node, '') + '\n';
}

// ─── YAML ───────────────────────────────────────────────────────────────────

export interface TextOutput {
  text: string;

  /** True when the YAML writer failed and `text` is the JSON form */
  fallback: boolean;
}

export function toYamlText(node: DocNode): TextOutput {
  try {
    const text = stringify(toOrderedValue(node), { aliasDuplicateObjects: false, lineWidth: 0 });
    return { text, fallback: false };
  } catch {
    return { text: toJsonText(node), fallback: true };
  }
}

// ─── Summary ────────────────────────────────────────────────────────────────

export function summarize(document: MappingNode): OutputSummary {
  const paths = getMapping(document, 'paths');
  const components = getMapping(document, 'components');

  let componentCount = 0;
  for (const section of components?.entries.values() ?? []) {
    if (isMapping(section)) componentCount += section.entries.size;
  }

  return {
    paths: paths?.entries.size ?? 0,
    operations: listOperations(document).length,
    schemas: getMapping(components, 'schemas')?.entries.size ?? 0,
    components: componentCount,
  };
}
