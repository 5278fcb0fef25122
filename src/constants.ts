/**
 * Cost Explorer dimensions accepted for grouping, filtering and value lookups
 */
export const DIMENSIONS = [
  'SERVICE',
  'LINKED_ACCOUNT',
  'REGION',
  'USAGE_TYPE',
  'OPERATION',
  'INSTANCE_TYPE',
  'PURCHASE_TYPE',
  'RECORD_TYPE'
] as const;

/**
 * Cost Explorer metrics accepted for cost and usage queries
 */
export const METRICS = [
  'UnblendedCost',
  'AmortizedCost',
  'NetAmortizedCost',
  'NetUnblendedCost',
  'NormalizedUsageAmount',
  'UsageQuantity',
  'BlendedCost'
] as const;

export const GRANULARITIES = ['DAILY', 'MONTHLY'] as const;

export const DEFAULT_GRANULARITY = 'MONTHLY';
export const DEFAULT_METRICS = ['UnblendedCost'] as const;
export const DEFAULT_MAX_RESULTS = 50;
export const DEFAULT_DAYS_LOOKBACK = 30;
export const MAX_GROUP_BY = 2;
export const MIN_MAX_RESULTS = 1;
export const MAX_MAX_RESULTS = 1000;

// Cost Explorer is a global service addressed through us-east-1
export const COST_EXPLORER_REGION = 'us-east-1';
export const DEFAULT_AWS_REGION = 'us-east-1';
export const MAX_RETRIES = 10;
export const USER_AGENT = 'mcp-aws-cost-explorer/1.0';

export const SERVER_NAME = 'aws-cost-explorer';
export const SERVER_VERSION = '1.0.0';

export const TOOL_GET_COST_AND_USAGE = 'get_cost_and_usage';
export const TOOL_GET_DIMENSION_VALUES = 'get_dimension_values';
