/**
 * Canonical type definitions for openapi-partial-spec.
 * These types represent the document tree, operation identity and the
 * records produced by each stage of the pipeline.
 */

// ─── Document Tree ──────────────────────────────────────────────────────────

export type ScalarValue = string | number | boolean | null;

export interface MappingNode {
  kind: 'mapping';
  /** Ordered entries; insertion order mirrors the source document */
  entries: Map<string, DocNode>;
}

export interface SequenceNode {
  kind: 'sequence';
  items: DocNode[];
}

export interface ScalarNode {
  kind: 'scalar';
  value: ScalarValue;
}

export type DocNode = MappingNode | SequenceNode | ScalarNode;

// ─── Operation Identity ─────────────────────────────────────────────────────

export type HttpMethod =
  | 'GET'
  | 'PUT'
  | 'POST'
  | 'DELETE'
  | 'PATCH'
  | 'OPTIONS'
  | 'HEAD'
  | 'TRACE';

export interface OperationKey {
  method: HttpMethod;

  /** Exact `paths` key, including `{param}` tokens */
  path: string;
}

export interface OperationEntry {
  key: OperationKey;
  body: DocNode;
}

// ─── Structural Diff Artifact ───────────────────────────────────────────────

/** A position inside the before/after document, as dotted text or tokens */
export type EntityLocator = string | string[];

export interface SpecEntityDetails {
  location?: EntityLocator;
  value?: unknown;
}

export type DiffBucket = 'breaking' | 'non-breaking' | 'unclassified';

export interface DiffEntry {
  bucket: DiffBucket;
  type?: string;
  action?: string;
  code?: string;
  entity?: string;
  sourceSpecEntityDetails: SpecEntityDetails[];
  destinationSpecEntityDetails: SpecEntityDetails[];
}

// ─── Change Detection ───────────────────────────────────────────────────────

/** What flagged an operation: a diff bucket, the structural comparison or a removal */
export type ChangeSource = DiffBucket | 'added' | 'modified' | 'removed';

export interface AffectedOperation {
  key: OperationKey;
  sources: ChangeSource[];
}

// ─── Decisions ──────────────────────────────────────────────────────────────

export type Decision = 'INCLUDE' | 'IGNORE' | 'REMOVED';

export interface DecisionRecord {
  key: OperationKey;
  decision: Decision;

  /** Short human-readable reason for the decision */
  reason: string;

  sources: ChangeSource[];

  /** Whether a placeholder default response was added to the copied body */
  synthesizedResponse: boolean;
}

// ─── Closure ────────────────────────────────────────────────────────────────

export type UnresolvedReason =
  | 'external'
  | 'unsupported-pointer'
  | 'missing-section'
  | 'missing-component';

export interface UnresolvedReference {
  ref: string;
  reason: UnresolvedReason;
}

// ─── Output ─────────────────────────────────────────────────────────────────

export interface OutputSummary {
  paths: number;
  operations: number;
  schemas: number;

  /** All copied components across every section, schemas included */
  components: number;
}

export interface PartialSpecInputs {
  /** `null` when the baseline artifact does not exist */
  baseline: DocNode | null;

  /** `null` when no diff artifact was produced */
  diff: unknown;

  before: DocNode;
  after: DocNode;
}

export interface PartialSpecResult {
  document: MappingNode;
  json: string;
  yaml: string;

  /** True when the YAML writer failed and `yaml` holds the JSON text */
  textFallback: boolean;

  summary: OutputSummary;
  decisions: DecisionRecord[];
  affected: AffectedOperation[];
  baseline: OperationKey[];
  unresolved: UnresolvedReference[];
  warnings: string[];
}

// ─── Builder Options ────────────────────────────────────────────────────────

export interface PartialSpecOptions {
  /** `info.title` of the output document (default: 'Changed-Only API Spec') */
  title?: string;

  /** Add a placeholder default response to operations without a success response (default: true) */
  synthesizeDefaultResponse?: boolean;

  /** Copy path-level summary/description/servers/parameters of included paths (default: true) */
  includePathLevelFields?: boolean;

  /** Treat a missing baseline artifact as fatal (default: false) */
  requireBaseline?: boolean;
}

// ─── Artifact Store ─────────────────────────────────────────────────────────

export interface ArtifactNames {
  baseline: string;

  /** Candidates tried in order; the first existing one is read */
  before: string[];
  after: string[];

  diff: string;
  outJson: string;
  outYaml: string;
}

export interface ArtifactStore {
  /** Whether an artifact exists */
  exists(name: string): Promise<boolean>;

  /** Read and parse a document; `null` when the artifact does not exist */
  readDocument(name: string): Promise<DocNode | null>;

  /** Read and parse a diff report; `null` when absent or empty */
  readDiff(name: string): Promise<unknown>;

  /** Write a text artifact */
  write(name: string, content: string): Promise<void>;
}

// ─── Report Format ──────────────────────────────────────────────────────────

export type ReportFormat = 'console' | 'json' | 'markdown';
