#!/usr/bin/env node

/**
 * openapi-partial-spec CLI
 *
 * Commands:
 *   generate  - Build partial_spec.json/.yaml from the artifacts of a run
 *   detect    - Print the operations the change detector flags
 *   keys      - List the operation keys of a document
 */

import { Command } from 'commander';
import * as fs from 'fs';
import chalk from 'chalk';
import { PartialSpecBuilder, DEFAULT_TITLE } from './builder';
import { FileStore, DEFAULT_ARTIFACTS } from './store/file-store';
import { formatAffected, formatReport } from './core/reporter';
import { listOperations, formatOperationKey } from './core/operation-key';
import { MissingArtifactError } from './core/errors';
import { ArtifactNames, ReportFormat } from './core/types';

const program = new Command();

program
  .name('openapi-partial-spec')
  .description('Build a minimal OpenAPI document holding only the non-legacy changes.')
  .version('1.0.0');

// ─── Common Options ─────────────────────────────────────────────────────────

interface ArtifactOptions {
  dir: string;
  baseline?: string;
  before?: string;
  after?: string;
  diff?: string;
  outJson?: string;
  outYaml?: string;
}

function artifactNames(opts: ArtifactOptions): ArtifactNames {
  return {
    baseline: opts.baseline ?? DEFAULT_ARTIFACTS.baseline,
    before: opts.before ? [opts.before] : DEFAULT_ARTIFACTS.before,
    after: opts.after ? [opts.after] : DEFAULT_ARTIFACTS.after,
    diff: opts.diff ?? DEFAULT_ARTIFACTS.diff,
    outJson: opts.outJson ?? DEFAULT_ARTIFACTS.outJson,
    outYaml: opts.outYaml ?? DEFAULT_ARTIFACTS.outYaml,
  };
}

function withArtifactOptions(command: Command): Command {
  return command
    .option('-d, --dir <dir>', 'Artifact directory', '.')
    .option('--baseline <file>', `Legacy baseline document (default: ${DEFAULT_ARTIFACTS.baseline})`)
    .option('--before <file>', 'Before document (default: swagger_main.yaml|yml|json)')
    .option('--after <file>', 'After document (default: swagger_head.yaml|yml|json)')
    .option('--diff <file>', `Structural diff report (default: ${DEFAULT_ARTIFACTS.diff})`);
}

interface GenerateOptions extends ArtifactOptions {
  title: string;
  synthesize: boolean;
  pathFields: boolean;
  requireBaseline: boolean;
  format: string;
  output?: string;
}

const REPORT_FORMATS: ReportFormat[] = ['console', 'json', 'markdown'];

function parseFormat(value: string): ReportFormat {
  const format = REPORT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new Error(`Unknown format "${value}" (expected ${REPORT_FORMATS.join(', ')})`);
  }
  return format;
}

function fail(error: unknown): never {
  console.error(`❌ Error: ${error instanceof Error ? error.message : error}`);
  process.exit(1);
}

// ─── generate Command ───────────────────────────────────────────────────────

withArtifactOptions(program.command('generate'))
  .description('Build the partial document from the artifacts of a run')
  .option('--out-json <file>', `JSON output (default: ${DEFAULT_ARTIFACTS.outJson})`)
  .option('--out-yaml <file>', `YAML output (default: ${DEFAULT_ARTIFACTS.outYaml})`)
  .option('--title <title>', 'info.title of the partial document', DEFAULT_TITLE)
  .option('--no-synthesize', 'Do not add a default response to operations without a success response')
  .option('--no-path-fields', 'Do not copy path-level parameters/summary/description/servers')
  .option('--require-baseline', 'Fail when the baseline document is missing', false)
  .option('-f, --format <format>', 'Decision log format: console, json, markdown', 'console')
  .option('-o, --output <file>', 'Write the decision log to a file instead of stdout')
  .action(async (opts: GenerateOptions) => {
    try {
      const format = parseFormat(opts.format);
      const store = new FileStore(opts.dir);
      const names = artifactNames(opts);
      const builder = new PartialSpecBuilder({
        title: opts.title,
        synthesizeDefaultResponse: opts.synthesize,
        includePathLevelFields: opts.pathFields,
        requireBaseline: opts.requireBaseline,
      });

      const result = await builder.run(store, names);
      const formatted = formatReport(result, format);

      if (opts.output) {
        fs.writeFileSync(opts.output, formatted, 'utf-8');
        console.log(`📄 Decision log written to ${opts.output}`);
      } else {
        console.log(formatted);
      }

      if (result.textFallback) {
        console.warn(chalk.yellow('⚠️  YAML writer failed; the YAML output holds the JSON form'));
      }
      console.log(`✅ Partial spec saved`);
      console.log(`   JSON: ${store.resolve(names.outJson)}`);
      console.log(`   YAML: ${store.resolve(names.outYaml)}`);
    } catch (error) {
      fail(error);
    }
  });

// ─── detect Command ─────────────────────────────────────────────────────────

withArtifactOptions(program.command('detect'))
  .description('Print the operations flagged as changed, without baseline filtering')
  .option('--json', 'Print as JSON', false)
  .action(async (opts: ArtifactOptions & { json: boolean }) => {
    try {
      const store = new FileStore(opts.dir);
      const builder = new PartialSpecBuilder();
      const { inputs, warnings } = await builder.load(store, artifactNames(opts));
      const affected = builder.detect(inputs);

      for (const warning of warnings) console.warn(chalk.yellow(`⚠️  ${warning}`));

      if (opts.json) {
        const rows = affected.map((op) => ({ key: formatOperationKey(op.key), sources: op.sources }));
        console.log(JSON.stringify(rows, null, 2));
      } else {
        console.log(formatAffected(affected));
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── keys Command ───────────────────────────────────────────────────────────

program
  .command('keys')
  .description('List the operation keys of a document')
  .requiredOption('--spec <file>', 'Document to list (JSON or YAML)')
  .action(async (opts: { spec: string }) => {
    try {
      const store = new FileStore('.');
      const document = await store.readDocument(opts.spec);
      if (!document) throw new MissingArtifactError(opts.spec);

      const operations = listOperations(document);
      if (operations.length === 0) {
        console.log('📭 No operations found.');
        return;
      }

      console.log(`📋 Operations (${operations.length}):\n`);
      for (const { key } of operations) {
        console.log(`  • ${formatOperationKey(key)}`);
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── Run ────────────────────────────────────────────────────────────────────

program.parseAsync().catch(fail);
