import type { CostAndUsageResult, DimensionValuesResult, ToolArguments } from '../types';
import { validateCostAndUsageArgs, validateDimensionValuesArgs } from '../validation';
import { Logger, createLogger } from '../utils/logger';
import { BillingClient } from './billing-client';
import { buildCostRequest, buildDimensionRequest } from './request-builder';
import { formatCostResponse, formatDimensionResponse } from './response-formatter';

/**
 * Runs the two Cost Explorer read operations end to end:
 * validate and default the arguments, build the API request, call
 * Cost Explorer and format the response envelope.
 *
 * Validation happens before the billing client is touched, so invalid
 * arguments never create a client or reach AWS.
 */
export class CostExplorerTool {
  private billingClient: BillingClient;
  private toolLogger: Logger;

  constructor(billingClient: BillingClient, logger?: Logger) {
    this.billingClient = billingClient;
    this.toolLogger = logger ? logger.child('CostExplorerTool') : createLogger('CostExplorerTool');
  }

  /**
   * Gets AWS costs for a time period, optionally grouped by up to two dimensions
   */
  async getCostAndUsage(args: ToolArguments): Promise<CostAndUsageResult> {
    const query = validateCostAndUsageArgs(args);
    this.toolLogger.debug('Resolved cost and usage query', {
      timePeriod: query.timePeriod,
      granularity: query.granularity,
      groupBy: query.groupBy,
      metrics: query.metrics,
      filtered: query.filter !== undefined,
      paginated: query.nextPageToken !== undefined
    });

    const response = await this.billingClient.getCostAndUsage(buildCostRequest(query));
    return formatCostResponse(response, query);
  }

  /**
   * Gets available values for a Cost Explorer dimension
   */
  async getDimensionValues(args: ToolArguments): Promise<DimensionValuesResult> {
    const query = validateDimensionValuesArgs(args);
    this.toolLogger.debug('Resolved dimension values query', {
      dimension: query.dimension,
      timePeriod: query.timePeriod,
      maxResults: query.maxResults,
      searchString: query.searchString
    });

    const response = await this.billingClient.getDimensionValues(buildDimensionRequest(query));
    return formatDimensionResponse(response, query);
  }
}
