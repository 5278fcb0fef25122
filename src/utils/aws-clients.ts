import { CostExplorerClient } from '@aws-sdk/client-cost-explorer';
import { STSClient } from '@aws-sdk/client-sts';
import { fromIni } from '@aws-sdk/credential-providers';
import { COST_EXPLORER_REGION, MAX_RETRIES, USER_AGENT } from '../constants';

/**
 * Credentials for a named profile from the shared config files, or the
 * SDK default chain when no profile is given
 */
function credentialsFor(profile?: string) {
  return profile ? { credentials: fromIni({ profile }) } : {};
}

/**
 * Creates a Cost Explorer client pinned to its canonical region with the
 * standard retry mode and the server's user agent
 */
export function createCostExplorerClient(profile?: string): CostExplorerClient {
  return new CostExplorerClient({
    region: COST_EXPLORER_REGION,
    maxAttempts: MAX_RETRIES,
    retryMode: 'standard',
    customUserAgent: USER_AGENT,
    ...credentialsFor(profile)
  });
}

export function createStsClient(region: string, profile?: string): STSClient {
  return new STSClient({
    region,
    maxAttempts: MAX_RETRIES,
    retryMode: 'standard',
    customUserAgent: USER_AGENT,
    ...credentialsFor(profile)
  });
}
