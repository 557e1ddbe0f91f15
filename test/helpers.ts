/**
 * Shared builders for test documents
 */

import { toDocument } from '../src/core/document';
import { MappingNode } from '../src/core/types';

export function doc(value: Record<string, unknown>): MappingNode {
  const node = toDocument(value);
  if (node.kind !== 'mapping') throw new Error('expected a mapping');
  return node;
}

export function ref(name: string, section: string = 'schemas'): { $ref: string } {
  return { $ref: `#/components/${section}/${name}` };
}

/**
 * A minimal OpenAPI document.
 */
export function api(
  paths: Record<string, unknown>,
  schemas: Record<string, unknown> = {},
  extra: Record<string, unknown> = {}
): MappingNode {
  return doc({
    openapi: '3.0.3',
    info: { title: 'Test API', version: '2.0.0' },
    paths,
    components: { schemas, ...extra },
  });
}

export function ok(schemaRef?: string): Record<string, unknown> {
  if (!schemaRef) return { responses: { '200': { description: 'ok' } } };
  return {
    responses: {
      '200': { description: 'ok', content: { 'application/json': { schema: ref(schemaRef) } } },
    },
  };
}
