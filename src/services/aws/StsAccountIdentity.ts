import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { FeatureStoreConfigurationError } from '../../types/FeatureStoreErrors';
import type { IAccountIdentity } from '../featurestore/IFeatureStoreClients';

export type STSSender = Pick<STSClient, 'send'>;

/**
 * Resolves the caller's account id once per instance.
 */
export class StsAccountIdentity implements IAccountIdentity {
  private accountId?: string;

  constructor(private readonly stsClient: STSSender) {}

  async getAccountId(): Promise<string> {
    if (!this.accountId) {
      this.accountId = await this.fetchAccountId();
    }
    return this.accountId;
  }

  private async fetchAccountId(): Promise<string> {
    const identity = await this.stsClient.send(new GetCallerIdentityCommand({}));
    if (!identity.Account) {
      throw new FeatureStoreConfigurationError('STS did not return an account id', 'ACCOUNT_ID_MISSING');
    }
    return identity.Account;
  }
}
