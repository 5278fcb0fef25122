import { formatCostResponse, formatDimensionResponse } from '../src/tools/response-formatter';
import type { CostQuery, DimensionQuery } from '../src/types';

const costQuery: CostQuery = {
  timePeriod: { start: '2024-01-01', end: '2024-04-01' },
  granularity: 'MONTHLY',
  groupBy: ['SERVICE'],
  metrics: ['UnblendedCost', 'UsageQuantity']
};

const dimensionQuery: DimensionQuery = {
  dimension: 'REGION',
  timePeriod: { start: '2024-01-01', end: '2024-01-31' },
  maxResults: 10
};

function monthResult(start: string, end: string, amount: string) {
  return {
    TimePeriod: { Start: start, End: end },
    Total: { UnblendedCost: { Amount: amount, Unit: 'USD' } },
    Groups: [],
    Estimated: false
  };
}

describe('Response formatter', () => {
  describe('formatCostResponse', () => {
    it('should count results_by_time entries', () => {
      const response = {
        ResultsByTime: [
          monthResult('2024-01-01', '2024-02-01', '10.00'),
          monthResult('2024-02-01', '2024-03-01', '12.50'),
          monthResult('2024-03-01', '2024-04-01', '9.75')
        ]
      };

      const result = formatCostResponse(response, costQuery);

      expect(result.total_results).toBe(3);
      expect(result.results_by_time).toBe(response.ResultsByTime);
    });

    it('should echo the resolved query context', () => {
      const result = formatCostResponse({ ResultsByTime: [] }, costQuery);

      expect(result).toEqual({
        time_period: { start: '2024-01-01', end: '2024-04-01' },
        granularity: 'MONTHLY',
        metrics: ['UnblendedCost', 'UsageQuantity'],
        group_by: ['SERVICE'],
        results_by_time: [],
        next_page_token: null,
        total_results: 0
      });
    });

    it('should treat missing results as an empty list', () => {
      const result = formatCostResponse({}, { ...costQuery, groupBy: [] });

      expect(result.results_by_time).toEqual([]);
      expect(result.total_results).toBe(0);
      expect(result.group_by).toEqual([]);
    });

    it('should pass the page token through verbatim', () => {
      const result = formatCostResponse({ ResultsByTime: [], NextPageToken: 'opaque==' }, costQuery);

      expect(result.next_page_token).toBe('opaque==');
    });

    it('should serialize an absent page token as null', () => {
      const json = JSON.parse(JSON.stringify(formatCostResponse({ ResultsByTime: [] }, costQuery)));

      expect(json).toHaveProperty('next_page_token', null);
    });
  });

  describe('formatDimensionResponse', () => {
    it('should pass values and sizes through', () => {
      const response = {
        DimensionValues: [
          { Value: 'us-east-1', Attributes: {} },
          { Value: 'eu-west-1', Attributes: {} }
        ],
        TotalSize: 14,
        ReturnSize: 2,
        NextPageToken: 'more'
      };

      expect(formatDimensionResponse(response, dimensionQuery)).toEqual({
        dimension: 'REGION',
        time_period: { start: '2024-01-01', end: '2024-01-31' },
        dimension_values: response.DimensionValues,
        next_page_token: 'more',
        total_size: 14,
        return_size: 2
      });
    });

    it('should default missing sizes to zero and the token to null', () => {
      const result = formatDimensionResponse({}, dimensionQuery);

      expect(result.dimension_values).toEqual([]);
      expect(result.total_size).toBe(0);
      expect(result.return_size).toBe(0);
      expect(result.next_page_token).toBeNull();
    });
  });
});
