import {
  DimensionCounts,
  DimensionStatus,
  OutcomeStatus,
  ReconciliationOutcome,
  RunReport,
  RunSummary,
} from '../types/index.js';

const POLICY_LABELS: Record<DimensionStatus, string> = {
  Applied: '✓ applied',
  NeedsChange: '⚠ needs change',
  NotApplied: '✗ not applied',
  Error: '✗ error',
  Skipped: '- skipped',
};

const LOGGING_LABELS: Record<DimensionStatus, string> = {
  Applied: '✓ applied',
  NeedsChange: '⚠ needs change (other destination)',
  NotApplied: '✗ disabled',
  Error: '✗ error',
  Skipped: '- skipped',
};

const NOT_FOUND_REASONS = {
  excluded: 'bucket is excluded',
  'log-sink': 'bucket is the log sink',
  missing: 'bucket does not exist in this account',
} as const;

function emptyCounts(): DimensionCounts {
  return { Applied: 0, NeedsChange: 0, NotApplied: 0, Error: 0, Skipped: 0 };
}

function pad(count: number): string {
  return String(count).padStart(3);
}

export class ReportService {
  summarize(outcomes: ReconciliationOutcome[]): RunSummary {
    const status: Record<OutcomeStatus, number> = { success: 0, 'partial-failure': 0, failure: 0 };
    const summary: RunSummary = {
      total: outcomes.length,
      policy: emptyCounts(),
      logging: emptyCounts(),
      status,
    };

    for (const outcome of outcomes) {
      summary.policy[outcome.policy.final] += 1;
      summary.logging[outcome.logging.final] += 1;
      summary.status[outcome.status] += 1;
    }

    return summary;
  }

  generateReport(report: RunReport): string {
    const lines: string[] = [];
    const rule = '='.repeat(80);

    lines.push(rule);
    lines.push(`S3 secure baseline report${report.dryRun ? ' (dry run)' : ''}`);
    lines.push(rule);
    lines.push(`Account:  ${report.accountId}`);
    lines.push(`Log sink: ${report.logSink.bucket}${this.describeLogSink(report)}`);
    lines.push('');

    for (const outcome of report.outcomes) {
      lines.push(`${outcome.bucket}: ${outcome.status === 'success' ? '✓ success' : `✗ ${outcome.status}`}`);
      lines.push(`  - Deny insecure transport: ${POLICY_LABELS[outcome.policy.final]}${this.describeChange(outcome.policy)}`);
      lines.push(`  - Access logging:          ${LOGGING_LABELS[outcome.logging.final]}${this.describeChange(outcome.logging)}`);
      for (const detail of [outcome.policy.error, outcome.logging.error]) {
        if (detail) {
          lines.push(`    ${detail}`);
        }
      }
    }

    for (const missing of report.notFound) {
      lines.push(`${missing.bucket}: ✗ not found (${NOT_FOUND_REASONS[missing.reason]})`);
    }

    if (report.aborted) {
      lines.push('');
      lines.push('Run was interrupted; remaining buckets were not processed.');
    }

    lines.push(rule);
    lines.push('Summary');
    lines.push(rule);
    lines.push(`Buckets processed: ${report.summary.total}`);
    lines.push(`  ✓ success:         ${pad(report.summary.status.success)}`);
    lines.push(`  ⚠ partial failure: ${pad(report.summary.status['partial-failure'])}`);
    lines.push(`  ✗ failure:         ${pad(report.summary.status.failure)}`);
    lines.push('');
    lines.push('[Deny insecure transport]');
    lines.push(...this.describeCounts(report.summary.policy, '--logging-only'));
    lines.push('');
    lines.push('[Access logging]');
    lines.push(...this.describeCounts(report.summary.logging, '--policy-only'));
    lines.push(rule);

    return lines.join('\n');
  }

  /**
   * One-line dry-run result. Buckets with a dimension that could not be read
   * are counted apart from buckets that only need changes.
   */
  describeDryRun(report: RunReport): string {
    const unreadable = report.outcomes.filter(
      outcome => outcome.policy.final === 'Error' || outcome.logging.final === 'Error'
    ).length;
    const pending = report.outcomes.filter(outcome => outcome.status !== 'success').length - unreadable;

    const parts = [`${pending} bucket(s) need changes`];
    if (unreadable > 0) {
      parts.push(`${unreadable} bucket(s) could not be checked`);
    }
    return `Dry run completed: ${parts.join(', ')}`;
  }

  private describeLogSink(report: RunReport): string {
    if (report.logSink.created) return ' (created)';
    if (!report.logSink.existed) return ' (would be created)';
    return '';
  }

  private describeChange(result: { initial: DimensionStatus; final: DimensionStatus; changed: boolean }): string {
    return result.changed ? ` (was ${result.initial})` : '';
  }

  private describeCounts(counts: DimensionCounts, skipFlag: string): string[] {
    if (counts.Skipped > 0) {
      return [`  - skipped:        ${pad(counts.Skipped)} (${skipFlag})`];
    }

    const lines = [
      `  ✓ applied:        ${pad(counts.Applied)}`,
      `  ⚠ needs change:   ${pad(counts.NeedsChange)}`,
      `  ✗ not applied:    ${pad(counts.NotApplied)}`,
    ];
    if (counts.Error > 0) {
      lines.push(`  ✗ error:          ${pad(counts.Error)}`);
    }
    return lines;
  }
}
