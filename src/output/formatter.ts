import chalk from 'chalk';
import type { ReleaseOutcome, ReleaseStatus, TargetReport } from '../types.js';

export const EXIT_OK = 0;
export const EXIT_TARGETS_FAILED = 1;
export const EXIT_CONFIG_ERROR = 2;

/** 0 when every selected target published or the ref was not a release tag; 1 when anything failed. */
export function exitCodeFor(outcome: ReleaseOutcome): number {
  if (outcome.status === 'rejected') return EXIT_OK;
  return Object.keys(outcome.failed).length === 0 ? EXIT_OK : EXIT_TARGETS_FAILED;
}

function statusLabel(status: ReleaseStatus): string {
  const label = status.toUpperCase();
  switch (status) {
    case 'success':
      return chalk.green(label);
    case 'partial':
      return chalk.yellow(label);
    case 'rejected':
      return chalk.gray(label);
    default:
      return chalk.red(label);
  }
}

function targetLine(report: TargetReport, outcome: ReleaseOutcome): string {
  const error = outcome.failed[report.target];
  if (!error) {
    const ack = report.ack;
    const where = ack ? ` → ${ack.channel}: ${ack.items.join(', ')}` : '';
    return `  ${chalk.green('✔')} ${report.target}${where}`;
  }
  const phase = report.failedAt ? `[${report.failedAt}] ` : '';
  return `  ${chalk.red('✖')} ${report.target} ${phase}${error.kind}(${error.code}): ${error.message}`;
}

export function formatOutcome(outcome: ReleaseOutcome): string {
  const lines: string[] = [];

  lines.push(`${chalk.bold('Release')} ${outcome.ref} ${statusLabel(outcome.status)}`);

  if (outcome.status === 'rejected') {
    lines.push(chalk.gray('  not a v<major>.<minor>.<patch> tag, nothing ran'));
    return lines.join('\n');
  }

  for (const report of outcome.targets) {
    lines.push(targetLine(report, outcome));
  }

  if (outcome.invariantViolations) {
    lines.push(chalk.red(`  invariant violations: ${outcome.invariantViolations.join(', ')}`));
  }

  const failedCount = Object.keys(outcome.failed).length;
  lines.push(chalk.gray(`${outcome.published.length} published, ${failedCount} failed (run ${outcome.runId})`));

  return lines.join('\n');
}
