import { GetCostAndUsageCommand } from '@aws-sdk/client-cost-explorer';
import { GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import type { ServerConfig } from '../types';
import { createCostExplorerClient, createStsClient } from './aws-clients';
import { defaultLookback } from './date-range';
import { errorHandler } from './errors';
import { createLogger } from './logger';

export interface AccessValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  info: string[];
  accountId?: string;
}

/**
 * Checks at startup that AWS credentials resolve and that Cost Explorer
 * answers a minimal query with them
 */
export class AccessValidator {
  private logger = createLogger('AccessValidator');

  constructor(private readonly config: Pick<ServerConfig, 'profile' | 'region'>) {}

  async validate(): Promise<AccessValidationResult> {
    const result: AccessValidationResult = {
      isValid: true,
      errors: [],
      warnings: [],
      info: []
    };

    if (this.config.profile) {
      result.info.push(`Using AWS profile: ${this.config.profile}`);
    } else {
      result.info.push('Using default AWS credential chain');
    }

    const identityResolved = await this.validateCallerIdentity(result);

    // Without an identity the Cost Explorer check would fail the same way
    if (identityResolved) {
      await this.validateCostExplorerAccess(result);
    }

    result.isValid = result.errors.length === 0;
    this.logger.info('Startup access validation finished', {
      isValid: result.isValid,
      errorCount: result.errors.length,
      accountId: result.accountId
    });
    return result;
  }

  private async validateCallerIdentity(result: AccessValidationResult): Promise<boolean> {
    try {
      const sts = createStsClient(this.config.region, this.config.profile);
      const identity = await sts.send(new GetCallerIdentityCommand({}));

      if (identity.Account) {
        result.accountId = identity.Account;
        result.info.push(`Authenticated as ${identity.Arn ?? 'unknown principal'} in account ${identity.Account}`);
      } else {
        result.warnings.push('Caller identity did not include an account ID');
      }
      return true;
    } catch (error) {
      const handled = errorHandler.handleError(error, 'GetCallerIdentity');
      result.errors.push(`Cannot resolve AWS identity: ${handled.message}`);
      return false;
    }
  }

  /**
   * Runs a minimal query for the last 2 days
   */
  private async validateCostExplorerAccess(result: AccessValidationResult): Promise<void> {
    try {
      const { start, end } = defaultLookback(2);
      const client = createCostExplorerClient(this.config.profile);

      await client.send(new GetCostAndUsageCommand({
        TimePeriod: { Start: start, End: end },
        Granularity: 'DAILY',
        Metrics: ['BlendedCost']
      }));
      result.info.push('Cost Explorer API is accessible');
    } catch (error) {
      const handled = errorHandler.handleError(error, 'GetCostAndUsage');
      result.errors.push(`Cannot access Cost Explorer API: ${handled.message}`);
    }
  }
}
