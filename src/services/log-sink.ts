import { wrapError } from '../errors.js';
import { LogSinkResult, StorageClient } from '../types/index.js';
import { logSinkName } from './access-logging.js';
import { TransportPolicyService } from './transport-policy.js';

export class LogSinkService {
  private storage: StorageClient;
  private policyService: TransportPolicyService;

  constructor(storage: StorageClient, policyService: TransportPolicyService = new TransportPolicyService()) {
    this.storage = storage;
    this.policyService = policyService;
  }

  /**
   * Makes sure `access-logs-<account-id>` exists. An existing sink is left
   * alone; a missing one is created with public access blocked and a policy
   * that lets the logging service write to it over TLS only.
   */
  async ensureLogSink(accountId: string, dryRun: boolean): Promise<LogSinkResult> {
    const bucket = logSinkName(accountId);

    try {
      if (await this.storage.bucketExists(bucket)) {
        console.log(`Log sink ${bucket} already exists`);
        return { bucket, existed: true, created: false };
      }

      if (dryRun) {
        console.log(`[DRY RUN] Would create log sink ${bucket}`);
        return { bucket, existed: false, created: false };
      }

      console.log(`Creating log sink ${bucket}...`);
      await this.storage.createBucket(bucket, { blockPublicAccess: true });
      await this.storage.putBucketPolicy(bucket, this.policyService.createLogSinkPolicy(bucket, accountId));
      console.log(`Created log sink ${bucket}`);

      return { bucket, existed: false, created: true };
    } catch (error) {
      throw wrapError('LogSinkCreateError', 'prepare log sink', bucket, error);
    }
  }
}
