/**
 * Output formatting for check and health
 */

import type { HealthReport, HealthStatus } from '@n8nkit/core';
import chalk from 'chalk';
import type { CheckResult } from './check.js';

type Paint = (text: string) => string;

interface Palette {
  red: Paint;
  yellow: Paint;
  green: Paint;
  gray: Paint;
  bold: Paint;
}

const identity: Paint = (text) => text;

const plain: Palette = {
  red: identity,
  yellow: identity,
  green: identity,
  gray: identity,
  bold: identity,
};

export interface FormatOptions {
  /** Colors are on unless this is false */
  color?: boolean;
  quiet?: boolean;
}

function palette(options: FormatOptions): Palette {
  return options.color === false ? plain : chalk;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

export function formatCheckPretty(results: readonly CheckResult[], options: FormatOptions = {}): string {
  const c = palette(options);
  const lines: string[] = [];
  let totalErrors = 0;
  let totalWarnings = 0;

  for (const result of results) {
    totalErrors += result.errors.length;
    totalWarnings += result.warnings.length;

    const hasIssues = result.errors.length > 0 || result.warnings.length > 0;
    if (options.quiet && !hasIssues) continue;

    lines.push('', `  ${result.path}`);

    if (!hasIssues) {
      lines.push(`    ${c.green('✓')} No issues`);
    }
    for (const error of result.errors) {
      lines.push(`    ${c.red('✗')} error  ${error}`);
    }
    for (const warning of result.warnings) {
      lines.push(`    ${c.yellow('⚠')} warn   ${warning}`);
    }
  }

  lines.push('');

  if (totalErrors === 0 && totalWarnings === 0) {
    lines.push(c.green(`  ✓ All ${plural(results.length, 'file')} passed`));
  } else {
    lines.push(
      c.gray(
        `  Found ${plural(totalErrors, 'error')} and ${plural(totalWarnings, 'warning')} in ${plural(results.length, 'file')}`,
      ),
    );
  }

  lines.push('');
  return lines.join('\n');
}

export function formatCheckJson(results: readonly CheckResult[]): string {
  const output = {
    files: results.map((result) => ({
      path: result.path,
      valid: result.errors.length === 0,
      errors: result.errors,
      warnings: result.warnings,
    })),
    summary: {
      files: results.length,
      errors: results.reduce((sum, result) => sum + result.errors.length, 0),
      warnings: results.reduce((sum, result) => sum + result.warnings.length, 0),
    },
  };

  return JSON.stringify(output, null, 2);
}

export function formatHealthPretty(report: HealthReport, options: FormatOptions = {}): string {
  const c = palette(options);
  const statusPaint: Record<HealthStatus, Paint> = {
    healthy: c.green,
    degraded: c.yellow,
    unhealthy: c.red,
    unknown: c.gray,
  };

  const lines = [
    '',
    `  ${c.bold(report.workflow_name)} ${c.gray(`(${report.workflow_id})`)}`,
    `  Status:        ${statusPaint[report.health_status](report.health_status)}`,
    `  Success rate:  ${report.success_rate === null ? 'n/a' : `${report.success_rate}%`}`,
    `  Executions:    ${report.total_executions} total, ${report.successful_executions} successful, ${report.failed_executions} failed`,
    `  Avg duration:  ${report.avg_duration_seconds === null ? 'n/a' : `${report.avg_duration_seconds}s`}`,
  ];

  if (report.issues.length > 0) {
    lines.push('', '  Issues:', ...report.issues.map((issue) => `    ${c.yellow('⚠')} ${issue}`));
  }
  if (report.recommendations.length > 0) {
    lines.push(
      '',
      '  Recommendations:',
      ...report.recommendations.map((recommendation) => `    → ${recommendation}`),
    );
  }

  lines.push('');
  return lines.join('\n');
}
