/**
 * openapi-partial-spec
 *
 * Keep legacy operations out of strict checks: build a minimal OpenAPI
 * document holding only the operations that changed and are not in the
 * baseline, plus every component they reference.
 *
 * @example
 * ```typescript
 * import { PartialSpecBuilder, FileStore, formatDecisionLine } from 'openapi-partial-spec';
 *
 * const builder = new PartialSpecBuilder({ title: 'Changed-Only API Spec' });
 * const result = await builder.run(new FileStore('./artifacts'));
 *
 * for (const record of result.decisions) {
 *   console.log(formatDecisionLine(record));
 * }
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { PartialSpecBuilder, DEFAULT_TITLE, LoadedInputs } from './builder';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  DocNode,
  MappingNode,
  SequenceNode,
  ScalarNode,
  ScalarValue,
  HttpMethod,
  OperationKey,
  OperationEntry,
  EntityLocator,
  DiffEntry,
  DiffBucket,
  ChangeSource,
  AffectedOperation,
  Decision,
  DecisionRecord,
  UnresolvedReference,
  UnresolvedReason,
  OutputSummary,
  PartialSpecInputs,
  PartialSpecResult,
  PartialSpecOptions,
  ArtifactNames,
  ArtifactStore,
  ReportFormat,
} from './core/types';
export { ParseError, MissingArtifactError } from './core/errors';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export { toDocument, fromDocument, nodesEqual, cloneNode } from './core/document';
export {
  HTTP_METHODS,
  OperationKeySet,
  operationKey,
  formatOperationKey,
  parseOperationKey,
  listOperations,
  getOperation,
} from './core/operation-key';
export { loadBaseline, MISSING_BASELINE_WARNING } from './core/baseline';
export {
  AffectedSet,
  normalizeDiff,
  resolveLocator,
  keysFromDiff,
  detectStructuralChanges,
  findRemovedOperations,
  detectChanges,
} from './core/detector';
export { assemblePaths, hasSuccessResponse } from './core/assembler';
export { resolveComponents, collectRefs, parseComponentRef } from './core/closure';
export { toJsonText, toYamlText, summarize } from './core/serializer';
export { formatReport, formatDecisionLine, formatAffected } from './core/reporter';

// ─── Store ──────────────────────────────────────────────────────────────────
export { FileStore, DEFAULT_ARTIFACTS } from './store/file-store';

// ─── Format Parsers ─────────────────────────────────────────────────────────
export { parseJson, isJson, parseYaml, isYamlFile, parseDocumentText } from './formats';
