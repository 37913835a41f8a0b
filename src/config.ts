import { ConfigError } from './errors.js';
import { MAX_CONCURRENCY } from './services/baseline.js';
import { BaselineConfig } from './types/index.js';

export interface CliOptions {
  apply?: boolean;
  bucket?: string;
  profile?: string;
  region?: string;
  exclude?: string[];
  showPolicy?: boolean;
  showLogging?: boolean;
  policyOnly?: boolean;
  loggingOnly?: boolean;
  concurrency?: string;
}

export function buildConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): BaselineConfig {
  if (options.policyOnly && options.loggingOnly) {
    throw new ConfigError('--policy-only and --logging-only cannot be used together');
  }

  const concurrency = options.concurrency === undefined ? 1 : Number(options.concurrency);
  if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
    throw new ConfigError(`Concurrency must be an integer between 1 and ${MAX_CONCURRENCY}`);
  }

  if (options.bucket !== undefined && options.bucket.trim() === '') {
    throw new ConfigError('Bucket name must not be empty');
  }

  return {
    dryRun: !options.apply,
    region: options.region || env['AWS_REGION'] || env['AWS_DEFAULT_REGION'] || undefined,
    profile: options.profile,
    bucket: options.bucket,
    excludeBuckets: options.exclude || [],
    policyOnly: Boolean(options.policyOnly),
    loggingOnly: Boolean(options.loggingOnly),
    showPolicy: Boolean(options.showPolicy),
    showLogging: Boolean(options.showLogging),
    concurrency,
  };
}
