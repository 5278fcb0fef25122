import type {
  GetCostAndUsageCommandInput,
  GetDimensionValuesCommandInput
} from '@aws-sdk/client-cost-explorer';
import { MAX_GROUP_BY } from '../constants';
import type { CostQuery, DimensionQuery } from '../types';

/**
 * Maps a validated cost query onto the GetCostAndUsage request shape.
 * Optional sections are left out entirely when the query does not set them.
 */
export function buildCostRequest(query: CostQuery): GetCostAndUsageCommandInput {
  const input: GetCostAndUsageCommandInput = {
    TimePeriod: {
      Start: query.timePeriod.start,
      End: query.timePeriod.end
    },
    Granularity: query.granularity,
    Metrics: [...query.metrics]
  };

  if (query.groupBy.length > 0) {
    input.GroupBy = query.groupBy.slice(0, MAX_GROUP_BY).map(dimension => ({
      Type: 'DIMENSION',
      Key: dimension
    }));
  }

  if (query.filter) {
    input.Filter = {
      Dimensions: {
        Key: query.filter.dimension,
        Values: [...query.filter.values],
        MatchOptions: ['EQUALS']
      }
    };
  }

  if (query.nextPageToken) {
    input.NextPageToken = query.nextPageToken;
  }

  return input;
}

/**
 * Maps a validated dimension query onto the GetDimensionValues request shape
 */
export function buildDimensionRequest(query: DimensionQuery): GetDimensionValuesCommandInput {
  const input: GetDimensionValuesCommandInput = {
    Dimension: query.dimension,
    TimePeriod: {
      Start: query.timePeriod.start,
      End: query.timePeriod.end
    },
    MaxResults: query.maxResults
  };

  if (query.searchString) {
    input.SearchString = query.searchString;
  }

  if (query.nextPageToken) {
    input.NextPageToken = query.nextPageToken;
  }

  return input;
}
