import { errorMessage } from '../errors.js';
import {
  BaselineConfig,
  DimensionResult,
  IdentityProvider,
  LoggingConfig,
  LoggingTarget,
  OutcomeStatus,
  PolicyDocument,
  ReconciliationOutcome,
  RunReport,
  StorageClient,
} from '../types/index.js';
import { AccessLoggingService } from './access-logging.js';
import { resolveBuckets } from './bucket-resolver.js';
import { LogSinkService } from './log-sink.js';
import { ReportService } from './report.js';
import { TransportPolicyService } from './transport-policy.js';

export const MAX_CONCURRENCY = 10;

export interface RunOptions {
  signal?: AbortSignal;
}

function skipped<T>(): DimensionResult<T> {
  return { initial: 'Skipped', final: 'Skipped', changed: false, issues: [] };
}

function outcomeStatus(results: Array<DimensionResult<unknown>>): OutcomeStatus {
  const processed = results.filter(result => result.final !== 'Skipped');
  if (processed.every(result => result.final === 'Applied')) {
    return 'success';
  }
  if (processed.every(result => result.final === 'Error')) {
    return 'failure';
  }
  return 'partial-failure';
}

export class BaselineService {
  private identity: IdentityProvider;
  private storage: StorageClient;
  private policyService: TransportPolicyService;
  private loggingService: AccessLoggingService;
  private logSinkService: LogSinkService;
  private reportService: ReportService;

  constructor(identity: IdentityProvider, storage: StorageClient) {
    this.identity = identity;
    this.storage = storage;
    this.policyService = new TransportPolicyService();
    this.loggingService = new AccessLoggingService();
    this.logSinkService = new LogSinkService(storage, this.policyService);
    this.reportService = new ReportService();
  }

  /**
   * One reconciliation pass. Identity, log sink and bucket listing failures
   * are fatal and propagate; everything after that is recorded per bucket.
   */
  async run(config: BaselineConfig, options: RunOptions = {}): Promise<RunReport> {
    const startedAt = new Date();

    const accountId = await this.identity.getAccountId();
    console.log(`AWS account: ${accountId}`);

    const logSink = await this.logSinkService.ensureLogSink(accountId, config.dryRun);
    const target = this.loggingService.canonicalTarget(accountId);

    const { buckets, notFound } = resolveBuckets({
      allBuckets: await this.storage.listBuckets(),
      excludeBuckets: config.excludeBuckets,
      logSink: logSink.bucket,
      bucket: config.bucket,
    });

    for (const missing of notFound) {
      console.warn(`Bucket ${missing.bucket} cannot be processed (${missing.reason})`);
    }
    console.log(`Buckets to process: ${buckets.length}`);

    const { outcomes, aborted } = await this.processAll(buckets, config, target, options.signal);

    return {
      accountId,
      dryRun: config.dryRun,
      logSink,
      outcomes,
      notFound,
      summary: this.reportService.summarize(outcomes),
      aborted,
      startedAt,
      finishedAt: new Date(),
    };
  }

  async reconcileBucket(
    bucket: string,
    config: BaselineConfig,
    target: LoggingTarget
  ): Promise<ReconciliationOutcome> {
    console.log(`Processing bucket ${bucket}`);

    const policy = config.loggingOnly ? skipped<PolicyDocument>() : await this.reconcilePolicy(bucket, config);
    const logging = config.policyOnly
      ? skipped<LoggingConfig>()
      : await this.reconcileLogging(bucket, config, target);

    return { bucket, policy, logging, status: outcomeStatus([policy, logging]) };
  }

  generateReport(report: RunReport): string {
    return this.reportService.generateReport(report);
  }

  describeDryRun(report: RunReport): string {
    return this.reportService.describeDryRun(report);
  }

  // Workers share only the index cursor and their own result slots.
  private async processAll(
    buckets: string[],
    config: BaselineConfig,
    target: LoggingTarget,
    signal?: AbortSignal
  ): Promise<{ outcomes: ReconciliationOutcome[]; aborted: boolean }> {
    const slots: Array<ReconciliationOutcome | undefined> = new Array(buckets.length);
    const workers = Math.max(1, Math.min(config.concurrency, MAX_CONCURRENCY, buckets.length));
    let cursor = 0;
    let aborted = false;

    const worker = async (): Promise<void> => {
      while (cursor < buckets.length) {
        if (signal?.aborted) {
          aborted = true;
          return;
        }
        const index = cursor++;
        const bucket = buckets[index];
        if (bucket === undefined) return;
        slots[index] = await this.reconcileBucket(bucket, config, target);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));

    const outcomes = slots.filter((outcome): outcome is ReconciliationOutcome => outcome !== undefined);
    return { outcomes, aborted };
  }

  private async reconcilePolicy(bucket: string, config: BaselineConfig): Promise<DimensionResult<PolicyDocument>> {
    let current: PolicyDocument | null;
    try {
      current = await this.storage.getBucketPolicy(bucket);
    } catch (error) {
      console.error(`Bucket ${bucket}: ${errorMessage(error)}`);
      return { initial: 'Error', final: 'Error', changed: false, issues: [], error: errorMessage(error) };
    }

    const assessment = this.policyService.classify(current, bucket);
    const initial = assessment.classification;

    if (initial === 'Applied') {
      console.log(`Bucket ${bucket}: deny-insecure-transport policy already applied`);
      return { initial, final: initial, changed: false, current, proposed: current, issues: [] };
    }

    for (const issue of assessment.issues) {
      console.warn(`Bucket ${bucket}: ${issue}`);
    }

    const proposed = this.policyService.merge(current, bucket);

    if (config.dryRun) {
      console.log(`[DRY RUN] Bucket ${bucket}: would apply deny-insecure-transport policy`);
      return { initial, final: initial, changed: false, current, proposed, issues: assessment.issues };
    }

    try {
      await this.storage.putBucketPolicy(bucket, proposed);
      console.log(`Bucket ${bucket}: applied deny-insecure-transport policy`);
      return { initial, final: 'Applied', changed: true, current, proposed, issues: assessment.issues };
    } catch (error) {
      console.error(`Bucket ${bucket}: ${errorMessage(error)}`);
      return {
        initial,
        final: 'Error',
        changed: false,
        current,
        proposed,
        issues: assessment.issues,
        error: errorMessage(error),
      };
    }
  }

  private async reconcileLogging(
    bucket: string,
    config: BaselineConfig,
    target: LoggingTarget
  ): Promise<DimensionResult<LoggingConfig>> {
    let current: LoggingConfig | null;
    try {
      current = await this.storage.getBucketLogging(bucket);
    } catch (error) {
      console.error(`Bucket ${bucket}: ${errorMessage(error)}`);
      return { initial: 'Error', final: 'Error', changed: false, issues: [], error: errorMessage(error) };
    }

    const assessment = this.loggingService.classify(current, target);
    const initial = assessment.classification;
    const proposed = this.loggingService.merge(assessment, target);

    if (!proposed) {
      console.log(`Bucket ${bucket}: access logging already delivers to ${target.bucket}`);
      return { initial, final: initial, changed: false, current, proposed: current, issues: [] };
    }

    const destination = `s3://${target.bucket}/${target.prefix}`;

    if (config.dryRun) {
      console.log(`[DRY RUN] Bucket ${bucket}: would send access logs to ${destination}`);
      return { initial, final: initial, changed: false, current, proposed, issues: assessment.issues };
    }

    try {
      await this.storage.putBucketLogging(bucket, proposed);
      console.log(`Bucket ${bucket}: access logs now go to ${destination}`);
      return { initial, final: 'Applied', changed: true, current, proposed, issues: assessment.issues };
    } catch (error) {
      console.error(`Bucket ${bucket}: ${errorMessage(error)}`);
      return {
        initial,
        final: 'Error',
        changed: false,
        current,
        proposed,
        issues: assessment.issues,
        error: errorMessage(error),
      };
    }
  }
}
