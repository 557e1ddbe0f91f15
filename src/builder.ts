/**
 * PartialSpecBuilder — Main API
 *
 * The primary entry point for openapi-partial-spec. Provides a simple API for:
 * - Building the partial document from in-memory inputs
 * - Loading inputs from an artifact store and writing the outputs back
 * - Inspecting the change-detection result on its own
 */

import {
  AffectedOperation,
  ArtifactNames,
  ArtifactStore,
  DocNode,
  MappingNode,
  PartialSpecInputs,
  PartialSpecOptions,
  PartialSpecResult,
} from './core/types';
import { getIn, getMapping, getString, mapping, scalar, cloneNode } from './core/document';
import { MissingArtifactError } from './core/errors';
import { listOperations, formatOperationKey } from './core/operation-key';
import { loadBaseline } from './core/baseline';
import { detectChanges } from './core/detector';
import { assemblePaths } from './core/assembler';
import { resolveComponents } from './core/closure';
import { summarize, toJsonText, toYamlText } from './core/serializer';
import { DEFAULT_ARTIFACTS } from './store/file-store';

export const DEFAULT_TITLE = 'Changed-Only API Spec';

export interface LoadedInputs {
  inputs: PartialSpecInputs;
  warnings: string[];
}

// ─── PartialSpecBuilder Class ───────────────────────────────────────────────

export class PartialSpecBuilder {
  private title: string;
  private synthesizeDefaultResponse: boolean;
  private includePathLevelFields: boolean;
  private requireBaseline: boolean;

  constructor(options: PartialSpecOptions = {}) {
    this.title = options.title ?? DEFAULT_TITLE;
    this.synthesizeDefaultResponse = options.synthesizeDefaultResponse ?? true;
    this.includePathLevelFields = options.includePathLevelFields ?? true;
    this.requireBaseline = options.requireBaseline ?? false;
  }

  /**
   * Build the partial document. Pure: the inputs are never modified and
   * identical inputs give byte-identical output.
   */
  build(inputs: PartialSpecInputs): PartialSpecResult {
    if (inputs.baseline === null && this.requireBaseline) {
      throw new MissingArtifactError('baseline', 'a baseline is required');
    }

    const baseline = loadBaseline(inputs.baseline);
    const affected = detectChanges(inputs.diff, inputs.before, inputs.after);

    const { paths, decisions } = assemblePaths(inputs.after, affected, baseline.keys, {
      synthesizeDefaultResponse: this.synthesizeDefaultResponse,
      includePathLevelFields: this.includePathLevelFields,
    });

    const document = this.createShell(inputs.after);
    const security = getIn(inputs.after, 'security');
    if (security !== undefined) {
      document.entries.set('security', cloneNode(security));
    }
    document.entries.set('paths', paths);

    const requirements: DocNode[] = security !== undefined ? [security] : [];
    for (const { body } of listOperations(document)) {
      const opSecurity = getIn(body, 'security');
      if (opSecurity !== undefined) requirements.push(opSecurity);
    }

    const closure = resolveComponents(inputs.after, {
      roots: [paths],
      securityRequirements: requirements,
    });
    document.entries.set('components', closure.components);

    const yaml = toYamlText(document);

    const warnings = [...baseline.warnings];
    for (const record of decisions) {
      if (record.decision === 'REMOVED' && baseline.keys.has(record.key)) {
        warnings.push(`Legacy operation deleted: ${formatOperationKey(record.key)}`);
      }
    }
    for (const { ref, reason } of closure.unresolved) {
      warnings.push(`Unresolved reference ${ref} (${reason})`);
    }

    return {
      document,
      json: toJsonText(document),
      yaml: yaml.text,
      textFallback: yaml.fallback,
      summary: summarize(document),
      decisions,
      affected: affected.toArray(),
      baseline: baseline.keys.toArray(),
      unresolved: closure.unresolved,
      warnings,
    };
  }

  /**
   * Run the change detector alone, without baseline filtering.
   */
  detect(inputs: Pick<PartialSpecInputs, 'diff' | 'before' | 'after'>): AffectedOperation[] {
    return detectChanges(inputs.diff, inputs.before, inputs.after).toArray();
  }

  /**
   * Read every input from a store. All reads happen before anything is
   * written, so a ParseError leaves the store untouched.
   */
  async load(store: ArtifactStore, artifacts: ArtifactNames = DEFAULT_ARTIFACTS): Promise<LoadedInputs> {
    const warnings: string[] = [];

    const afterName = await this.firstExisting(store, artifacts.after);
    if (!afterName) {
      throw new MissingArtifactError(artifacts.after.join(' | '), 'after document');
    }
    const after = await store.readDocument(afterName);
    if (!after) {
      throw new MissingArtifactError(afterName, 'after document');
    }

    const beforeName = await this.firstExisting(store, artifacts.before);
    let before: DocNode | null = beforeName ? await store.readDocument(beforeName) : null;
    if (!before) {
      warnings.push(
        `Before document not found (tried ${artifacts.before.join(', ')}): every operation is treated as new`
      );
      before = mapping([['paths', mapping()]]);
    }

    const baseline = await store.readDocument(artifacts.baseline);
    const diff = await store.readDiff(artifacts.diff);

    return { inputs: { baseline, diff, before, after }, warnings };
  }

  /**
   * Load the inputs, build the partial document and write both forms.
   */
  async run(store: ArtifactStore, artifacts: ArtifactNames = DEFAULT_ARTIFACTS): Promise<PartialSpecResult> {
    const loaded = await this.load(store, artifacts);
    const result = this.build(loaded.inputs);

    await store.write(artifacts.outJson, result.json);
    await store.write(artifacts.outYaml, result.yaml);

    return { ...result, warnings: [...loaded.warnings, ...result.warnings] };
  }

  // ─── Private Helpers ────────────────────────────────────────────────────

  private createShell(after: DocNode): MappingNode {
    const document = mapping();

    const openapi = getString(after, 'openapi');
    const swagger = getString(after, 'swagger');
    if (openapi === undefined && swagger !== undefined) {
      document.entries.set('swagger', scalar(swagger));
    } else {
      document.entries.set('openapi', scalar(openapi ?? '3.0.0'));
    }

    const version = getIn(getMapping(after, 'info'), 'version');
    const versionText =
      version?.kind === 'scalar' && (typeof version.value === 'string' || typeof version.value === 'number')
        ? String(version.value)
        : '1.0.0';

    document.entries.set(
      'info',
      mapping([
        ['title', scalar(this.title)],
        ['version', scalar(versionText)],
      ])
    );
    return document;
  }

  private async firstExisting(store: ArtifactStore, names: string[]): Promise<string | undefined> {
    for (const name of names) {
      if (await store.exists(name)) return name;
    }
    return undefined;
  }
}
