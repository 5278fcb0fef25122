import { CostExplorerClient } from '@aws-sdk/client-cost-explorer';
import { STSClient } from '@aws-sdk/client-sts';
import { fromIni } from '@aws-sdk/credential-providers';
import { createCostExplorerClient, createStsClient } from '../src/utils/aws-clients';

jest.mock('@aws-sdk/client-cost-explorer', () => ({ CostExplorerClient: jest.fn() }));
jest.mock('@aws-sdk/client-sts', () => ({ STSClient: jest.fn() }));
jest.mock('@aws-sdk/credential-providers', () => ({ fromIni: jest.fn() }));

const profileCredentials = jest.fn();

describe('AWS client factories', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.mocked(fromIni).mockReturnValue(profileCredentials);
  });

  describe('createCostExplorerClient', () => {
    it('should pin the region, retry budget and user agent', () => {
      createCostExplorerClient();

      expect(CostExplorerClient).toHaveBeenCalledWith({
        region: 'us-east-1',
        maxAttempts: 10,
        retryMode: 'standard',
        customUserAgent: 'mcp-aws-cost-explorer/1.0'
      });
      expect(fromIni).not.toHaveBeenCalled();
    });

    it('should load credentials for a named profile', () => {
      createCostExplorerClient('analytics');

      expect(fromIni).toHaveBeenCalledWith({ profile: 'analytics' });
      expect(CostExplorerClient).toHaveBeenCalledWith(
        expect.objectContaining({ region: 'us-east-1', credentials: profileCredentials })
      );
    });
  });

  describe('createStsClient', () => {
    it('should use the configured region', () => {
      createStsClient('eu-west-1', 'analytics');

      expect(STSClient).toHaveBeenCalledWith({
        region: 'eu-west-1',
        maxAttempts: 10,
        retryMode: 'standard',
        customUserAgent: 'mcp-aws-cost-explorer/1.0',
        credentials: profileCredentials
      });
    });
  });
});
