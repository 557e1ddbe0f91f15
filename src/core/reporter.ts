/**
 * Report Generator
 *
 * Renders the decision log of a run in multiple formats:
 * Console (colored), JSON, Markdown.
 */

import chalk from 'chalk';
import {
  AffectedOperation,
  Decision,
  DecisionRecord,
  PartialSpecResult,
  ReportFormat,
} from './types';
import { formatOperationKey } from './operation-key';

export type DecisionReport = Pick<PartialSpecResult, 'decisions' | 'summary' | 'warnings'>;

// ─── Decision Icons & Colors ────────────────────────────────────────────────

const DECISION_ICON: Record<Decision, string> = {
  INCLUDE: '🟢',
  IGNORE: '⚪',
  REMOVED: '🔴',
};

const DECISION_COLOR: Record<Decision, (text: string) => string> = {
  INCLUDE: chalk.green,
  IGNORE: chalk.gray,
  REMOVED: chalk.red,
};

// ─── Format Report ──────────────────────────────────────────────────────────

/**
 * Format a decision report in the specified format.
 */
export function formatReport(report: DecisionReport, format: ReportFormat): string {
  switch (format) {
    case 'console':
      return formatConsole(report);
    case 'json':
      return formatJson(report);
    case 'markdown':
      return formatMarkdown(report);
    default:
      return formatConsole(report);
  }
}

/**
 * One plain line per decision: `INCLUDE GET /pet — new operation`.
 */
export function formatDecisionLine(record: DecisionRecord): string {
  const note = record.synthesizedResponse ? ' [default response added]' : '';
  return `${record.decision} ${formatOperationKey(record.key)} — ${record.reason}${note}`;
}

// ─── Console Format ─────────────────────────────────────────────────────────

function formatConsole(report: DecisionReport): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  lines.push(chalk.bold('📦 Partial Spec Decisions'));
  lines.push(chalk.gray(bar));

  if (report.decisions.length === 0) {
    lines.push(chalk.green('  ✅ No changed operations detected'));
  } else {
    for (const record of report.decisions) {
      const icon = DECISION_ICON[record.decision];
      const label = DECISION_COLOR[record.decision](record.decision.padEnd(8));
      const note = record.synthesizedResponse ? chalk.yellow(' [default response added]') : '';
      lines.push(`${icon} ${label} ${formatOperationKey(record.key)} — ${record.reason}${note}`);
    }
  }

  if (report.warnings.length > 0) {
    lines.push(chalk.gray(bar));
    for (const warning of report.warnings) {
      lines.push(chalk.yellow(`⚠️  ${warning}`));
    }
  }

  lines.push(chalk.gray(bar));

  const { paths, operations, schemas, components } = report.summary;
  lines.push(
    `Summary: ${chalk.green(`${operations} operations`)} | ${paths} paths | ${schemas} schemas | ${components} components`
  );
  lines.push('');

  return lines.join('\n');
}

// ─── JSON Format ────────────────────────────────────────────────────────────

function formatJson(report: DecisionReport): string {
  return JSON.stringify(
    {
      decisions: report.decisions.map((d) => ({ ...d, key: formatOperationKey(d.key) })),
      warnings: report.warnings,
      summary: report.summary,
    },
    null,
    2
  );
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function formatMarkdown(report: DecisionReport): string {
  const lines: string[] = [];

  lines.push('# 📦 Partial Spec Decisions');
  lines.push('');

  if (report.decisions.length === 0) {
    lines.push('✅ **No changed operations detected**');
  } else {
    lines.push('| Decision | Operation | Reason |');
    lines.push('| --- | --- | --- |');
    for (const record of report.decisions) {
      const note = record.synthesizedResponse ? ' (default response added)' : '';
      lines.push(
        `| ${DECISION_ICON[record.decision]} ${record.decision} | \`${escapeCell(formatOperationKey(record.key))}\` | ${escapeCell(record.reason)}${note} |`
      );
    }
  }
  lines.push('');

  if (report.warnings.length > 0) {
    lines.push('## ⚠️ Warnings');
    lines.push('');
    for (const warning of report.warnings) {
      lines.push(`- ${warning}`);
    }
    lines.push('');
  }

  lines.push('---');
  lines.push('');
  const { paths, operations, schemas, components } = report.summary;
  lines.push(
    `**Summary:** ${operations} operations | ${paths} paths | ${schemas} schemas | ${components} components`
  );

  return lines.join('\n');
}

// ─── Affected Set ───────────────────────────────────────────────────────────

/**
 * Plain listing of detected changes: `GET /pet  [modified, breaking]`.
 */
export function formatAffected(affected: AffectedOperation[]): string {
  if (affected.length === 0) return 'No changed operations detected';
  return affected
    .map((op) => `${formatOperationKey(op.key)}  [${op.sources.join(', ')}]`)
    .join('\n');
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function escapeCell(str: string): string {
  return str.replace(/\|/g, '\\|');
}
