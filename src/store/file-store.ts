/**
 * File-based Artifact Store
 *
 * Reads pipeline artifacts (documents and the diff report) from a
 * directory and writes the partial document next to them.
 *
 * Directory layout (defaults):
 *   <baseDir>/
 *     swagger_baseline.json   → legacy operations
 *     swagger_main.yaml|json  → before document
 *     swagger_head.yaml|json  → after document
 *     diff.json               → structural diff report
 *     partial_spec.json       ← output
 *     partial_spec.yaml       ← output
 */

import * as fs from 'fs';
import * as path from 'path';
import { ArtifactNames, ArtifactStore, DocNode } from '../core/types';
import { parseDocumentText, parseJson, stripBom, stripLeadingNoise } from '../formats';

// ─── Default Names ──────────────────────────────────────────────────────────

function candidates(base: string): string[] {
  return [`${base}.yaml`, `${base}.yml`, `${base}.json`];
}

export const DEFAULT_ARTIFACTS: ArtifactNames = {
  baseline: 'swagger_baseline.json',
  before: candidates('swagger_main'),
  after: candidates('swagger_head'),
  diff: 'diff.json',
  outJson: 'partial_spec.json',
  outYaml: 'partial_spec.yaml',
};

// ─── File Store Implementation ──────────────────────────────────────────────

export class FileStore implements ArtifactStore {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  /**
   * Absolute path of an artifact. Absolute names are kept as they are.
   */
  resolve(name: string): string {
    return path.resolve(this.baseDir, name);
  }

  async exists(name: string): Promise<boolean> {
    return fs.existsSync(this.resolve(name));
  }

  /**
   * Read and parse a JSON or YAML document. Returns null when the file
   * does not exist; malformed content raises a ParseError.
   */
  async readDocument(name: string): Promise<DocNode | null> {
    const file = this.resolve(name);
    if (!fs.existsSync(file)) return null;

    const content = fs.readFileSync(file, 'utf-8');
    return parseDocumentText(content, name);
  }

  /**
   * Read the diff report. A missing or empty file is an empty diff.
   */
  async readDiff(name: string): Promise<unknown> {
    const file = this.resolve(name);
    if (!fs.existsSync(file)) return null;

    const content = stripBom(fs.readFileSync(file, 'utf-8'));
    if (content.length === 0) return null;

    return parseJson(stripLeadingNoise(content), name);
  }

  /**
   * Write a text artifact, creating parent directories as needed.
   */
  async write(name: string, content: string): Promise<void> {
    const file = this.resolve(name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, 'utf-8');
  }
}
