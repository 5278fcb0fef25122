import type {
  GetCostAndUsageCommandOutput,
  GetDimensionValuesCommandOutput
} from '@aws-sdk/client-cost-explorer';
import type { CostAndUsageResult, CostQuery, DimensionQuery, DimensionValuesResult } from '../types';

// Any member may be missing from what Cost Explorer returns
export type CostAndUsageResponse = Partial<Omit<GetCostAndUsageCommandOutput, '$metadata'>>;
export type DimensionValuesResponse = Partial<Omit<GetDimensionValuesCommandOutput, '$metadata'>>;

/**
 * Builds the cost envelope. total_results is always recounted from
 * ResultsByTime and the request context is echoed from the resolved query.
 */
export function formatCostResponse(response: CostAndUsageResponse, query: CostQuery): CostAndUsageResult {
  const resultsByTime = response.ResultsByTime ?? [];

  return {
    time_period: { start: query.timePeriod.start, end: query.timePeriod.end },
    granularity: query.granularity,
    metrics: [...query.metrics],
    group_by: [...query.groupBy],
    results_by_time: resultsByTime,
    next_page_token: response.NextPageToken ?? null,
    total_results: resultsByTime.length
  };
}

export function formatDimensionResponse(
  response: DimensionValuesResponse,
  query: DimensionQuery
): DimensionValuesResult {
  return {
    dimension: query.dimension,
    time_period: { start: query.timePeriod.start, end: query.timePeriod.end },
    dimension_values: response.DimensionValues ?? [],
    next_page_token: response.NextPageToken ?? null,
    total_size: response.TotalSize ?? 0,
    return_size: response.ReturnSize ?? 0
  };
}
