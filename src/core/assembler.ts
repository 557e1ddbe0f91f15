/**
 * Spec Assembler
 *
 * Decides, per operation key, whether an affected operation goes into the
 * partial document and copies included bodies verbatim from the after
 * document. References stay references; the closure resolver brings in
 * their targets afterwards.
 */

import { DecisionRecord, DocNode, MappingNode, OperationKey } from './types';
import { cloneNode, getMapping, isMapping, mapping, scalar } from './document';
import { HTTP_METHODS, OperationKeySet, getOperation, isHttpMethod } from './operation-key';
import { AffectedSet } from './detector';

/** Path-item fields copied alongside included operations */
export const PATH_LEVEL_FIELDS = ['summary', 'description', 'servers', 'parameters'] as const;

const PATH_LEVEL_SET = new Set<string>(PATH_LEVEL_FIELDS);

export const PLACEHOLDER_RESPONSE_DESCRIPTION = 'Default response';

export interface AssembleOptions {
  synthesizeDefaultResponse: boolean;
  includePathLevelFields: boolean;
}

export interface AssembleResult {
  paths: MappingNode;
  decisions: DecisionRecord[];
}

// ─── Success Responses ──────────────────────────────────────────────────────

function isSuccessCode(code: string): boolean {
  return /^2\d\d$/.test(code) || code.toUpperCase() === '2XX' || code === 'default';
}

export function hasSuccessResponse(operation: MappingNode): boolean {
  const responses = getMapping(operation, 'responses');
  if (!responses) return false;
  return [...responses.entries.keys()].some(isSuccessCode);
}

/**
 * Copy an operation body, adding a placeholder `default` response when it
 * declares no success response.
 */
function copyOperation(body: DocNode, synthesize: boolean): { body: DocNode; synthesized: boolean } {
  const copy = cloneNode(body);
  if (!synthesize || !isMapping(copy) || hasSuccessResponse(copy)) {
    return { body: copy, synthesized: false };
  }

  const placeholder = mapping([['description', scalar(PLACEHOLDER_RESPONSE_DESCRIPTION)]]);
  const responses = copy.entries.get('responses');
  if (isMapping(responses)) {
    responses.entries.set('default', placeholder);
  } else {
    copy.entries.set('responses', mapping([['default', placeholder]]));
  }
  return { body: copy, synthesized: true };
}

// ─── Decision Rule ──────────────────────────────────────────────────────────

function includeReason(affected: AffectedSet, key: OperationKey): string {
  const sources = affected.sourcesOf(key);
  if (sources.includes('added')) return 'new operation';
  if (sources.includes('modified')) return 'changed operation';
  return 'changed operation (reported by diff)';
}

/**
 * Build the `paths` of the partial document.
 *
 * Paths and operations follow the after document's order. Affected keys
 * with no operation in the after document are reported as `REMOVED`.
 */
export function assemblePaths(
  after: DocNode,
  affected: AffectedSet,
  baseline: OperationKeySet,
  options: AssembleOptions
): AssembleResult {
  const paths = mapping();
  const decisions: DecisionRecord[] = [];
  const afterPaths = getMapping(after, 'paths');

  for (const [path, item] of afterPaths?.entries ?? []) {
    if (!isMapping(item)) continue;

    const out = mapping();
    let included = 0;

    for (const [field, body] of item.entries) {
      if (!isHttpMethod(field)) {
        if (options.includePathLevelFields && PATH_LEVEL_SET.has(field)) {
          out.entries.set(field, cloneNode(body));
        }
        continue;
      }

      const method = HTTP_METHODS.find((m) => m === field.toUpperCase());
      if (!method) continue;
      const key: OperationKey = { method, path };
      if (!affected.has(key)) continue;

      const sources = affected.sourcesOf(key);

      if (baseline.has(key)) {
        decisions.push({
          key,
          decision: 'IGNORE',
          reason: 'legacy operation in baseline',
          sources,
          synthesizedResponse: false,
        });
        continue;
      }

      const copied = copyOperation(body, options.synthesizeDefaultResponse);
      out.entries.set(field, copied.body);
      included++;
      decisions.push({
        key,
        decision: 'INCLUDE',
        reason: includeReason(affected, key),
        sources,
        synthesizedResponse: copied.synthesized,
      });
    }

    if (included > 0) {
      paths.entries.set(path, out);
    }
  }

  for (const { key, sources } of affected.toArray()) {
    if (getOperation(after, key) !== undefined) continue;
    decisions.push({
      key,
      decision: 'REMOVED',
      reason: baseline.has(key) ? 'legacy operation deleted' : 'operation deleted',
      sources,
      synthesizedResponse: false,
    });
  }

  return { paths, decisions };
}
