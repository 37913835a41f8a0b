export type Classification = 'Applied' | 'NeedsChange' | 'NotApplied';

export type DimensionStatus = Classification | 'Error' | 'Skipped';

export type OutcomeStatus = 'success' | 'partial-failure' | 'failure';

export type ConditionBlock = Record<string, Record<string, unknown>>;

export interface PolicyStatement {
  Sid?: string;
  Effect: 'Allow' | 'Deny';
  Principal?: string | Record<string, string | string[]>;
  Action?: string | string[];
  Resource?: string | string[];
  Condition?: ConditionBlock;
  [key: string]: unknown;
}

export interface PolicyDocument {
  Version: string;
  Id?: string;
  Statement: PolicyStatement[];
}

export interface LoggingConfig {
  targetBucket: string | null;
  targetPrefix: string;
}

export interface LoggingTarget {
  bucket: string;
  prefix: string;
}

export interface PolicyAssessment {
  classification: Classification;
  managedStatementCount: number;
  issues: string[];
}

export interface LoggingAssessment {
  classification: Classification;
  issues: string[];
}

export interface DimensionResult<T> {
  initial: DimensionStatus;
  final: DimensionStatus;
  changed: boolean;
  current?: T | null;
  proposed?: T | null;
  issues: string[];
  error?: string;
}

export interface ReconciliationOutcome {
  bucket: string;
  policy: DimensionResult<PolicyDocument>;
  logging: DimensionResult<LoggingConfig>;
  status: OutcomeStatus;
}

export type DimensionCounts = Record<DimensionStatus, number>;

export interface RunSummary {
  total: number;
  policy: DimensionCounts;
  logging: DimensionCounts;
  status: Record<OutcomeStatus, number>;
}

export type NotFoundReason = 'excluded' | 'log-sink' | 'missing';

export interface NotFoundBucket {
  bucket: string;
  reason: NotFoundReason;
}

export interface LogSinkResult {
  bucket: string;
  existed: boolean;
  created: boolean;
}

export interface RunReport {
  accountId: string;
  dryRun: boolean;
  logSink: LogSinkResult;
  outcomes: ReconciliationOutcome[];
  notFound: NotFoundBucket[];
  summary: RunSummary;
  aborted: boolean;
  startedAt: Date;
  finishedAt: Date;
}

export interface BaselineConfig {
  dryRun: boolean;
  region?: string;
  profile?: string;
  bucket?: string;
  excludeBuckets: string[];
  policyOnly: boolean;
  loggingOnly: boolean;
  showPolicy: boolean;
  showLogging: boolean;
  concurrency: number;
}

export interface CreateBucketOptions {
  blockPublicAccess: boolean;
}

export interface IdentityProvider {
  getAccountId(): Promise<string>;
}

/**
 * Storage operations the reconciliation core needs. `putBucketPolicy`
 * replaces the whole document, so callers always submit the full result
 * of a read-merge cycle.
 */
export interface StorageClient {
  listBuckets(): Promise<string[]>;
  bucketExists(bucket: string): Promise<boolean>;
  createBucket(bucket: string, options: CreateBucketOptions): Promise<void>;
  getBucketPolicy(bucket: string): Promise<PolicyDocument | null>;
  putBucketPolicy(bucket: string, policy: PolicyDocument): Promise<void>;
  getBucketLogging(bucket: string): Promise<LoggingConfig | null>;
  putBucketLogging(bucket: string, config: LoggingConfig): Promise<void>;
}

export interface AWSCredentials {
  // Unset means the SDK resolves it from the profile or environment.
  region?: string;
  profile?: string;
}
