import {
  BucketLocationConstraint,
  CreateBucketCommand,
  GetBucketLoggingCommand,
  GetBucketPolicyCommand,
  HeadBucketCommand,
  ListBucketsCommand,
  PutBucketLoggingCommand,
  PutBucketPolicyCommand,
  PutPublicAccessBlockCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { wrapError } from '../errors.js';
import {
  AWSCredentials,
  CreateBucketOptions,
  LoggingConfig,
  PolicyDocument,
  StorageClient,
} from '../types/index.js';
import { parsePolicyDocument } from './policy-document.js';

function hasErrorName(error: unknown, ...names: string[]): boolean {
  return error instanceof Error && names.includes(error.name);
}

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return Object.values(BucketLocationConstraint).some(value => value === region);
}

export class S3Service implements StorageClient {
  private client: S3Client;

  constructor(credentials: AWSCredentials) {
    // ListBuckets spans every region; follow redirects so buckets elsewhere can still be read.
    this.client = new S3Client({
      region: credentials.region,
      profile: credentials.profile,
      followRegionRedirects: true,
    });
  }

  async listBuckets(): Promise<string[]> {
    try {
      const response = await this.client.send(new ListBucketsCommand({}));
      return (response.Buckets || []).flatMap(bucket => (bucket.Name ? [bucket.Name] : []));
    } catch (error) {
      throw wrapError('ResourceListUnavailable', 'list buckets', 'account', error);
    }
  }

  async bucketExists(bucketName: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucketName }));
      return true;
    } catch (error) {
      if (hasErrorName(error, 'NotFound', 'NoSuchBucket')) {
        return false;
      }
      throw wrapError('ResourceReadError', 'check bucket', bucketName, error);
    }
  }

  async createBucket(bucketName: string, options: CreateBucketOptions): Promise<void> {
    try {
      const region = await this.client.config.region();
      // us-east-1 rejects an explicit LocationConstraint
      if (region === 'us-east-1') {
        await this.client.send(new CreateBucketCommand({ Bucket: bucketName }));
      } else if (isLocationConstraint(region)) {
        await this.client.send(
          new CreateBucketCommand({
            Bucket: bucketName,
            CreateBucketConfiguration: { LocationConstraint: region },
          })
        );
      } else {
        throw new Error(`Region ${region} is not a valid bucket location`);
      }

      if (options.blockPublicAccess) {
        await this.client.send(
          new PutPublicAccessBlockCommand({
            Bucket: bucketName,
            PublicAccessBlockConfiguration: {
              BlockPublicAcls: true,
              IgnorePublicAcls: true,
              BlockPublicPolicy: true,
              RestrictPublicBuckets: true,
            },
          })
        );
      }
    } catch (error) {
      throw wrapError('ResourceWriteError', 'create bucket', bucketName, error);
    }
  }

  async getBucketPolicy(bucketName: string): Promise<PolicyDocument | null> {
    try {
      const response = await this.client.send(new GetBucketPolicyCommand({ Bucket: bucketName }));
      return response.Policy ? parsePolicyDocument(response.Policy) : null;
    } catch (error) {
      if (hasErrorName(error, 'NoSuchBucketPolicy')) {
        return null;
      }
      throw wrapError('ResourceReadError', 'get bucket policy', bucketName, error);
    }
  }

  async putBucketPolicy(bucketName: string, policy: PolicyDocument): Promise<void> {
    try {
      await this.client.send(
        new PutBucketPolicyCommand({ Bucket: bucketName, Policy: JSON.stringify(policy) })
      );
    } catch (error) {
      throw wrapError('ResourceWriteError', 'put bucket policy', bucketName, error);
    }
  }

  async getBucketLogging(bucketName: string): Promise<LoggingConfig | null> {
    try {
      const response = await this.client.send(new GetBucketLoggingCommand({ Bucket: bucketName }));
      const enabled = response.LoggingEnabled;
      if (!enabled) {
        return null;
      }
      return {
        targetBucket: enabled.TargetBucket || null,
        targetPrefix: enabled.TargetPrefix || '',
      };
    } catch (error) {
      throw wrapError('ResourceReadError', 'get bucket logging', bucketName, error);
    }
  }

  async putBucketLogging(bucketName: string, config: LoggingConfig): Promise<void> {
    try {
      await this.client.send(
        new PutBucketLoggingCommand({
          Bucket: bucketName,
          BucketLoggingStatus: config.targetBucket
            ? {
                LoggingEnabled: {
                  TargetBucket: config.targetBucket,
                  TargetPrefix: config.targetPrefix,
                },
              }
            : {},
        })
      );
    } catch (error) {
      throw wrapError('ResourceWriteError', 'put bucket logging', bucketName, error);
    }
  }
}
