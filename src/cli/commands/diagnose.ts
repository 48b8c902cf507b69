/**
 * @fileoverview Diagnose command
 *
 * Usage: fiqh-advisor diagnose [--verbose] [--json]
 */

import { parseArgs } from 'node:util';
import { runDiagnostics, type CheckStatus, type DiagnosticsReport } from '../../diagnostics/system_diagnostics.js';
import { COMMON_OPTIONS, parseTimeout, withAdvisor, type CommandOptions } from '../context.js';
import { createSpinner } from '../progress.js';

const STATUS_ICONS: Record<CheckStatus, string> = {
  OK: '[OK]',
  WARNING: '[WARN]',
  ERROR: '[ERROR]',
};

export function formatDiagnosticsReport(report: DiagnosticsReport, verbose: boolean): string[] {
  const lines = ['Fiqh Advisor Diagnostics', '========================', '', `Timestamp: ${report.timestamp}`, ''];

  for (const check of report.checks) {
    lines.push(`${STATUS_ICONS[check.status]} ${check.name}`);
    lines.push(`       ${check.message}`);
    if (check.suggestion) {
      lines.push(`       Suggestion: ${check.suggestion}`);
    }
    if (verbose && check.details) {
      lines.push('       Details:');
      for (const [key, value] of Object.entries(check.details)) {
        const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
        lines.push(`         ${key}: ${displayValue}`);
      }
    }
    lines.push('');
  }

  lines.push(
    'Summary:',
    `  Total checks: ${report.summary.total}`,
    `  OK: ${report.summary.ok}`,
    `  Warnings: ${report.summary.warnings}`,
    `  Errors: ${report.summary.errors}`,
    '',
    `Overall Status: ${STATUS_ICONS[report.overallStatus]} ${report.overallStatus}`
  );
  return lines;
}

export async function diagnoseCommand(options: CommandOptions): Promise<void> {
  const { values } = parseArgs({
    args: options.rawArgs.slice(1),
    options: COMMON_OPTIONS,
    allowPositionals: false,
    strict: true,
  });

  const report = await withAdvisor(options, parseTimeout(values.timeout), async (session) => {
    const spinner = values.json ? null : createSpinner('Running diagnostics...');
    try {
      return await runDiagnostics({ config: session.config, lifecycle: session.advisor.lifecycle, facade: session.advisor.facade });
    } finally {
      spinner?.stop();
    }
  });

  if (values.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatDiagnosticsReport(report, values.verbose === true)) console.log(line);
  }
  if (report.overallStatus === 'ERROR') {
    process.exitCode = 1;
  }
}
