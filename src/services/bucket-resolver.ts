import { NotFoundBucket } from '../types/index.js';

export interface ResolveOptions {
  allBuckets: string[];
  excludeBuckets: string[];
  logSink: string;
  bucket?: string;
}

export interface ResolvedBuckets {
  buckets: string[];
  notFound: NotFoundBucket[];
}

/**
 * Worklist for a run: the account's buckets in listing order, minus
 * exclusions and the log sink. With a single-bucket filter the worklist is
 * that bucket or nothing.
 */
export function resolveBuckets(options: ResolveOptions): ResolvedBuckets {
  const excluded = new Set(options.excludeBuckets);
  const candidates = Array.from(new Set(options.allBuckets)).filter(
    name => !excluded.has(name) && name !== options.logSink
  );

  if (options.bucket === undefined) {
    return { buckets: candidates, notFound: [] };
  }

  const bucket = options.bucket;
  if (candidates.includes(bucket)) {
    return { buckets: [bucket], notFound: [] };
  }

  let reason: NotFoundBucket['reason'] = 'missing';
  if (bucket === options.logSink) {
    reason = 'log-sink';
  } else if (excluded.has(bucket)) {
    reason = 'excluded';
  }

  return { buckets: [], notFound: [{ bucket, reason }] };
}
