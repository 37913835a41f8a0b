import {
  CreateBucketOptions,
  LoggingConfig,
  PolicyDocument,
  StorageClient,
} from '../../src/types/index.js';

interface BucketState {
  policy: PolicyDocument | null;
  logging: LoggingConfig | null;
  publicAccessBlocked: boolean;
}

type Operation = keyof StorageClient;

const WRITES: Operation[] = ['createBucket', 'putBucketPolicy', 'putBucketLogging'];

/**
 * StorageClient stand-in that keeps buckets in memory and records every
 * call as `<operation>:<bucket>`.
 */
export class InMemoryStorage implements StorageClient {
  readonly buckets = new Map<string, BucketState>();
  readonly calls: string[] = [];
  private failures = new Map<string, Error>();

  addBucket(name: string, state: Partial<BucketState> = {}): this {
    this.buckets.set(name, {
      policy: state.policy ? structuredClone(state.policy) : null,
      logging: state.logging ? structuredClone(state.logging) : null,
      publicAccessBlocked: state.publicAccessBlocked ?? false,
    });
    return this;
  }

  failOn(operation: Operation, bucket: string, error: Error = new Error('AccessDenied')): this {
    this.failures.set(`${operation}:${bucket}`, error);
    return this;
  }

  writes(): string[] {
    return this.calls.filter(call => WRITES.some(op => call.startsWith(`${op}:`)));
  }

  async listBuckets(): Promise<string[]> {
    this.record('listBuckets', '*');
    return Array.from(this.buckets.keys());
  }

  async bucketExists(bucket: string): Promise<boolean> {
    this.record('bucketExists', bucket);
    return this.buckets.has(bucket);
  }

  async createBucket(bucket: string, options: CreateBucketOptions): Promise<void> {
    this.record('createBucket', bucket);
    this.addBucket(bucket, { publicAccessBlocked: options.blockPublicAccess });
  }

  async getBucketPolicy(bucket: string): Promise<PolicyDocument | null> {
    this.record('getBucketPolicy', bucket);
    const policy = this.state(bucket).policy;
    return policy ? structuredClone(policy) : null;
  }

  async putBucketPolicy(bucket: string, policy: PolicyDocument): Promise<void> {
    this.record('putBucketPolicy', bucket);
    this.state(bucket).policy = structuredClone(policy);
  }

  async getBucketLogging(bucket: string): Promise<LoggingConfig | null> {
    this.record('getBucketLogging', bucket);
    const logging = this.state(bucket).logging;
    return logging ? { ...logging } : null;
  }

  async putBucketLogging(bucket: string, config: LoggingConfig): Promise<void> {
    this.record('putBucketLogging', bucket);
    this.state(bucket).logging = { ...config };
  }

  private record(operation: Operation, bucket: string): void {
    this.calls.push(`${operation}:${bucket}`);
    const failure = this.failures.get(`${operation}:${bucket}`);
    if (failure) {
      throw failure;
    }
  }

  private state(bucket: string): BucketState {
    const state = this.buckets.get(bucket);
    if (!state) {
      throw new Error(`NoSuchBucket: ${bucket}`);
    }
    return state;
  }
}
