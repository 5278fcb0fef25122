import {
  CostExplorerClient,
  GetCostAndUsageCommand,
  GetDimensionValuesCommand,
  type GetCostAndUsageCommandInput,
  type GetDimensionValuesCommandInput
} from '@aws-sdk/client-cost-explorer';
import { createCostExplorerClient } from '../utils/aws-clients';
import { safeExecute } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import type { CostAndUsageResponse, DimensionValuesResponse } from './response-formatter';

/**
 * Adapter over the Cost Explorer API for one profile.
 *
 * The SDK client is created on first use and reused for the adapter's
 * lifetime. Failures are rethrown as CredentialsMissingError, ProviderError
 * or InternalError.
 */
export class BillingClient {
  private client?: CostExplorerClient;
  private logger: Logger;

  constructor(private readonly profile?: string, logger?: Logger) {
    this.logger = logger ? logger.child('BillingClient') : createLogger('BillingClient');
  }

  getProfile(): string | undefined {
    return this.profile;
  }

  private getClient(): CostExplorerClient {
    if (!this.client) {
      this.logger.debug('Creating Cost Explorer client', { profile: this.profile ?? 'default' });
      this.client = createCostExplorerClient(this.profile);
    }
    return this.client;
  }

  async getCostAndUsage(input: GetCostAndUsageCommandInput): Promise<CostAndUsageResponse> {
    const startTime = Date.now();
    const response = await safeExecute(
      () => this.getClient().send(new GetCostAndUsageCommand(input)),
      'GetCostAndUsage',
      { profile: this.profile }
    );
    this.logger.logDuration('GetCostAndUsage', startTime, {
      resultCount: response.ResultsByTime?.length ?? 0
    });
    return response;
  }

  async getDimensionValues(input: GetDimensionValuesCommandInput): Promise<DimensionValuesResponse> {
    const startTime = Date.now();
    const response = await safeExecute(
      () => this.getClient().send(new GetDimensionValuesCommand(input)),
      'GetDimensionValues',
      { profile: this.profile, dimension: input.Dimension }
    );
    this.logger.logDuration('GetDimensionValues', startTime, {
      returnSize: response.ReturnSize ?? 0
    });
    return response;
  }
}
