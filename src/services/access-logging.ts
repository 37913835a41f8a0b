import { LoggingAssessment, LoggingConfig, LoggingTarget } from '../types/index.js';

export function logSinkName(accountId: string): string {
  return `access-logs-${accountId}`;
}

export function logPrefix(accountId: string): string {
  return `AWSLogs/${accountId}/S3/`;
}

export class AccessLoggingService {
  canonicalTarget(accountId: string): LoggingTarget {
    return { bucket: logSinkName(accountId), prefix: logPrefix(accountId) };
  }

  classify(config: LoggingConfig | null, target: LoggingTarget): LoggingAssessment {
    if (!config || !config.targetBucket) {
      return { classification: 'NotApplied', issues: ['Access logging is disabled'] };
    }

    const issues: string[] = [];
    if (config.targetBucket !== target.bucket) {
      issues.push(`Logs go to ${config.targetBucket}, expected ${target.bucket}`);
    }
    if (config.targetPrefix !== target.prefix) {
      issues.push(`Prefix is "${config.targetPrefix}", expected "${target.prefix}"`);
    }

    return { classification: issues.length === 0 ? 'Applied' : 'NeedsChange', issues };
  }

  /**
   * A bucket has exactly one logging configuration, so the desired state
   * is always the whole canonical config. Returns null when nothing is to be
   * written.
   */
  merge(assessment: LoggingAssessment, target: LoggingTarget): LoggingConfig | null {
    if (assessment.classification === 'Applied') {
      return null;
    }
    return { targetBucket: target.bucket, targetPrefix: target.prefix };
  }
}
