import { resolveBuckets } from '../src/services/bucket-resolver.js';

describe('resolveBuckets', () => {
  const allBuckets = ['alpha', 'beta', 'access-logs-123', 'gamma'];

  it('should drop exclusions and the log sink while keeping listing order', () => {
    const result = resolveBuckets({ allBuckets, excludeBuckets: ['beta'], logSink: 'access-logs-123' });

    expect(result).toEqual({ buckets: ['alpha', 'gamma'], notFound: [] });
  });

  it('should deduplicate the listing', () => {
    const result = resolveBuckets({
      allBuckets: ['alpha', 'beta', 'alpha'],
      excludeBuckets: [],
      logSink: 'access-logs-123',
    });

    expect(result.buckets).toEqual(['alpha', 'beta']);
  });

  it('should ignore exclusions that are not in the listing', () => {
    const result = resolveBuckets({ allBuckets, excludeBuckets: ['unknown'], logSink: 'access-logs-123' });

    expect(result.buckets).toEqual(['alpha', 'beta', 'gamma']);
  });

  describe('with a single-bucket filter', () => {
    it('should return only that bucket', () => {
      const result = resolveBuckets({ allBuckets, excludeBuckets: [], logSink: 'access-logs-123', bucket: 'gamma' });

      expect(result).toEqual({ buckets: ['gamma'], notFound: [] });
    });

    it('should report an excluded bucket as not found', () => {
      const result = resolveBuckets({
        allBuckets,
        excludeBuckets: ['beta'],
        logSink: 'access-logs-123',
        bucket: 'beta',
      });

      expect(result).toEqual({ buckets: [], notFound: [{ bucket: 'beta', reason: 'excluded' }] });
    });

    it('should refuse the log sink', () => {
      const result = resolveBuckets({
        allBuckets,
        excludeBuckets: [],
        logSink: 'access-logs-123',
        bucket: 'access-logs-123',
      });

      expect(result.notFound).toEqual([{ bucket: 'access-logs-123', reason: 'log-sink' }]);
    });

    it('should report a bucket missing from the account', () => {
      const result = resolveBuckets({ allBuckets, excludeBuckets: [], logSink: 'access-logs-123', bucket: 'delta' });

      expect(result).toEqual({ buckets: [], notFound: [{ bucket: 'delta', reason: 'missing' }] });
    });
  });
});
