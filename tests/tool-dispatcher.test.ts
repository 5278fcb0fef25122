import { CostExplorerClient } from '@aws-sdk/client-cost-explorer';
import { ToolDispatcher, createCostExplorerTool } from '../src/tools/tool-dispatcher';
import { createCostExplorerClient } from '../src/utils/aws-clients';

jest.mock('../src/utils/aws-clients', () => ({
  createCostExplorerClient: jest.fn(),
  createStsClient: jest.fn()
}));

const mockSend = jest.fn();

describe('ToolDispatcher', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.mocked(createCostExplorerClient).mockReturnValue({ send: mockSend } as unknown as CostExplorerClient);
  });

  describe('listTools', () => {
    it('should advertise both tools', () => {
      const names = new ToolDispatcher().listTools().map(tool => tool.name);

      expect(names).toEqual(['get_cost_and_usage', 'get_dimension_values']);
    });

    it('should require dimension for get_dimension_values only', () => {
      const [costTool, dimensionTool] = new ToolDispatcher().listTools();

      expect(costTool.inputSchema.required).toBeUndefined();
      expect(dimensionTool.inputSchema.required).toEqual(['dimension']);
    });
  });

  describe('dispatch', () => {
    it('should return the result as 2-space indented JSON', async () => {
      mockSend.mockResolvedValue({ DimensionValues: [], TotalSize: 0, ReturnSize: 0 });

      const text = await new ToolDispatcher().dispatch('get_dimension_values', {
        dimension: 'SERVICE',
        time_period_start: '2024-01-01',
        time_period_end: '2024-01-31'
      });

      const expected = {
        dimension: 'SERVICE',
        time_period: { start: '2024-01-01', end: '2024-01-31' },
        dimension_values: [],
        next_page_token: null,
        total_size: 0,
        return_size: 0
      };
      expect(text).toBe(JSON.stringify(expected, null, 2));
    });

    it('should return validation errors without contacting AWS', async () => {
      const text = await new ToolDispatcher().dispatch('get_dimension_values', { dimension: 'INVALID' });

      expect(JSON.parse(text)).toEqual({
        error:
          'Invalid dimension: INVALID. Allowed: [SERVICE, LINKED_ACCOUNT, REGION, USAGE_TYPE, OPERATION, INSTANCE_TYPE, PURCHASE_TYPE, RECORD_TYPE]'
      });
      expect(createCostExplorerClient).not.toHaveBeenCalled();
    });

    it('should report unknown tools', async () => {
      const text = await new ToolDispatcher().dispatch('foo', {});

      expect(text).toBe(JSON.stringify({ error: 'Unknown tool: foo' }, null, 2));
    });

    it('should report Cost Explorer errors with code and message', async () => {
      mockSend.mockRejectedValue(
        Object.assign(new Error('Data is not available'), {
          name: 'DataUnavailableException',
          $fault: 'client',
          $metadata: { httpStatusCode: 400 }
        })
      );

      const text = await new ToolDispatcher().dispatch('get_cost_and_usage', {});

      expect(JSON.parse(text)).toEqual({
        error: 'Cost Explorer API error (DataUnavailableException): Data is not available'
      });
    });

    it('should report missing credentials', async () => {
      mockSend.mockRejectedValue(
        Object.assign(new Error('Could not load credentials from any providers'), { name: 'CredentialsProviderError' })
      );

      const text = await new ToolDispatcher().dispatch('get_cost_and_usage', {});

      expect(JSON.parse(text)).toEqual({
        error: 'AWS credentials not found. Please configure AWS credentials or specify a profile.'
      });
    });

    it('should use the server default profile when the call names none', async () => {
      mockSend.mockResolvedValue({ ResultsByTime: [] });

      await new ToolDispatcher('team-default').dispatch('get_cost_and_usage', {});

      expect(createCostExplorerClient).toHaveBeenCalledWith('team-default');
    });

    it('should let a per-call profile override the default', async () => {
      mockSend.mockResolvedValue({ ResultsByTime: [] });

      await new ToolDispatcher('team-default').dispatch('get_cost_and_usage', { profile: 'billing-readonly' });

      expect(createCostExplorerClient).toHaveBeenCalledWith('billing-readonly');
    });

    it('should build a fresh tool for every call', async () => {
      const factory = jest.fn(createCostExplorerTool);
      mockSend.mockResolvedValue({ ResultsByTime: [] });
      const dispatcher = new ToolDispatcher(undefined, factory);

      await dispatcher.dispatch('get_cost_and_usage', {});
      await dispatcher.dispatch('get_cost_and_usage', {});

      expect(factory).toHaveBeenCalledTimes(2);
      expect(createCostExplorerClient).toHaveBeenCalledTimes(2);
    });

    it('should log the outcome of each call', async () => {
      await new ToolDispatcher().dispatch('foo', {});

      const logged = jest
        .mocked(console.warn)
        .mock.calls.map(call => JSON.parse(String(call[0])));
      expect(logged).toContainEqual(
        expect.objectContaining({
          level: 'WARN',
          message: 'Tool call failed',
          tool: 'foo',
          errorCode: 'INVALID_INPUT'
        })
      );
    });
  });
});
