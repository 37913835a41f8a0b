import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { wrapError } from '../errors.js';
import { AWSCredentials, IdentityProvider } from '../types/index.js';

export class IdentityService implements IdentityProvider {
  private client: STSClient;

  constructor(credentials: AWSCredentials) {
    this.client = new STSClient({ region: credentials.region, profile: credentials.profile });
  }

  async getAccountId(): Promise<string> {
    try {
      const response = await this.client.send(new GetCallerIdentityCommand({}));
      if (!response.Account) {
        throw new Error('GetCallerIdentity returned no account');
      }
      return response.Account;
    } catch (error) {
      throw wrapError('IdentityUnavailable', 'resolve account id', 'caller', error);
    }
  }
}
