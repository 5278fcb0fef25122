import type { DimensionValuesWithAttributes, ResultByTime } from '@aws-sdk/client-cost-explorer';
import { DIMENSIONS, GRANULARITIES, METRICS } from './constants';

export type Dimension = typeof DIMENSIONS[number];
export type Metric = typeof METRICS[number];
export type Granularity = typeof GRANULARITIES[number];

/**
 * Untyped tool arguments as they arrive over the protocol
 */
export type ToolArguments = Record<string, unknown>;

/**
 * Date window for Cost Explorer queries
 */
export interface TimeRange {
  /** Start date (YYYY-MM-DD, inclusive) */
  start: string;
  /** End date (YYYY-MM-DD, exclusive) */
  end: string;
}

/**
 * Single-dimension EQUALS filter applied to cost queries
 */
export interface DimensionFilter {
  dimension: Dimension;
  values: string[];
}

/**
 * Validated and defaulted cost and usage query
 */
export interface CostQuery {
  timePeriod: TimeRange;
  granularity: Granularity;
  groupBy: Dimension[];
  metrics: Metric[];
  filter?: DimensionFilter;
  nextPageToken?: string;
}

/**
 * Validated and defaulted dimension values query
 */
export interface DimensionQuery {
  dimension: Dimension;
  timePeriod: TimeRange;
  searchString?: string;
  maxResults: number;
  nextPageToken?: string;
}

/**
 * Envelope returned by the get_cost_and_usage tool
 */
export interface CostAndUsageResult {
  time_period: TimeRange;
  granularity: Granularity;
  metrics: Metric[];
  group_by: Dimension[];
  results_by_time: ResultByTime[];
  next_page_token: string | null;
  total_results: number;
}

/**
 * Envelope returned by the get_dimension_values tool
 */
export interface DimensionValuesResult {
  dimension: Dimension;
  time_period: TimeRange;
  dimension_values: DimensionValuesWithAttributes[];
  next_page_token: string | null;
  total_size: number;
  return_size: number;
}

/**
 * Error envelope every failed tool call collapses into
 */
export interface ToolErrorResult {
  error: string;
}

/**
 * Runtime configuration for the MCP server process
 */
export interface ServerConfig {
  serverName: string;
  serverVersion: string;
  /** Default AWS profile, overridable per tool call */
  profile?: string;
  /** Region for clients other than Cost Explorer */
  region: string;
  skipStartupValidation: boolean;
  showHelp: boolean;
}
