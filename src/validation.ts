import {
  DEFAULT_GRANULARITY,
  DEFAULT_MAX_RESULTS,
  DEFAULT_METRICS,
  DIMENSIONS,
  GRANULARITIES,
  MAX_GROUP_BY,
  MAX_MAX_RESULTS,
  METRICS,
  MIN_MAX_RESULTS
} from './constants';
import type {
  CostQuery,
  Dimension,
  DimensionFilter,
  DimensionQuery,
  Granularity,
  Metric,
  TimeRange,
  ToolArguments
} from './types';
import { defaultLookback, defaultRange, validateDate } from './utils/date-range';
import { InvalidInputError } from './utils/errors';

const DIMENSION_SET: ReadonlySet<string> = new Set(DIMENSIONS);
const METRIC_SET: ReadonlySet<string> = new Set(METRICS);

/**
 * Renders a list of values the way validation messages report them
 */
export function formatList(values: readonly string[]): string {
  return `[${values.join(', ')}]`;
}

export function isDimension(value: unknown): value is Dimension {
  return typeof value === 'string' && DIMENSION_SET.has(value);
}

export function isMetric(value: unknown): value is Metric {
  return typeof value === 'string' && METRIC_SET.has(value);
}

function isGranularity(value: unknown): value is Granularity {
  return GRANULARITIES.some(granularity => granularity === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

/**
 * Reads an optional string argument. Empty strings count as absent.
 */
export function optionalString(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  if (isAbsent(value) || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InvalidInputError(`${key} must be a string`);
  }
  return value;
}

export function validateGranularity(value: unknown): Granularity {
  if (isAbsent(value)) {
    return DEFAULT_GRANULARITY;
  }
  if (!isGranularity(value)) {
    throw new InvalidInputError("granularity must be 'DAILY' or 'MONTHLY'");
  }
  return value;
}

/**
 * Validates group_by dimensions, reporting every invalid entry at once
 */
export function validateGroupBy(value: unknown): Dimension[] {
  if (isAbsent(value)) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new InvalidInputError('group_by must be an array of dimension names');
  }

  const entries: unknown[] = value;
  const dimensions = entries.filter(isDimension);
  const invalid = entries.filter(entry => !isDimension(entry)).map(String);

  if (invalid.length > 0) {
    throw new InvalidInputError(`Invalid group_by dimensions: ${formatList(invalid)}`);
  }
  if (dimensions.length > MAX_GROUP_BY) {
    throw new InvalidInputError(`Maximum ${MAX_GROUP_BY} group_by dimensions allowed`);
  }

  return dimensions;
}

/**
 * Validates metrics, defaulting an absent or empty list to UnblendedCost
 */
export function validateMetrics(value: unknown): Metric[] {
  if (isAbsent(value) || (Array.isArray(value) && value.length === 0)) {
    return [...DEFAULT_METRICS];
  }
  if (!Array.isArray(value)) {
    throw new InvalidInputError('metrics must be an array of metric names');
  }

  const entries: unknown[] = value;
  const metrics = entries.filter(isMetric);
  const invalid = entries.filter(entry => !isMetric(entry)).map(String);

  if (invalid.length > 0) {
    throw new InvalidInputError(`Invalid metrics: ${formatList(invalid)}`);
  }

  return metrics;
}

export function validateDimension(value: unknown): Dimension {
  if (isAbsent(value)) {
    throw new InvalidInputError('dimension is required');
  }
  if (!isDimension(value)) {
    throw new InvalidInputError(`Invalid dimension: ${String(value)}. Allowed: ${formatList(DIMENSIONS)}`);
  }
  return value;
}

export function validateMaxResults(value: unknown): number {
  if (isAbsent(value)) {
    return DEFAULT_MAX_RESULTS;
  }
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < MIN_MAX_RESULTS ||
    value > MAX_MAX_RESULTS
  ) {
    throw new InvalidInputError(`max_results must be between ${MIN_MAX_RESULTS} and ${MAX_MAX_RESULTS}`);
  }
  return value;
}

/**
 * Validates filter_config. An absent or empty object means no filter.
 */
export function validateFilter(value: unknown): DimensionFilter | undefined {
  if (isAbsent(value)) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new InvalidInputError('filter_config must be an object with dimension and values');
  }
  if (Object.keys(value).length === 0) {
    return undefined;
  }

  const dimension = value.dimension;
  if (!isDimension(dimension)) {
    throw new InvalidInputError(
      `Invalid filter dimension: ${String(dimension)}. Allowed: ${formatList(DIMENSIONS)}`
    );
  }

  const values = value.values;
  if (isAbsent(values)) {
    return { dimension, values: [] };
  }
  if (!Array.isArray(values)) {
    throw new InvalidInputError('filter_config.values must be an array of strings');
  }

  const entries: unknown[] = values;
  const strings = entries.filter((entry): entry is string => typeof entry === 'string');
  if (strings.length !== entries.length) {
    throw new InvalidInputError('filter_config.values must be an array of strings');
  }

  return { dimension, values: strings };
}

/**
 * Uses the caller's range when both bounds are given, otherwise the fallback window
 */
export function resolveTimeRange(
  start: string | undefined,
  end: string | undefined,
  fallback: () => TimeRange
): TimeRange {
  if (!start || !end) {
    return fallback();
  }
  return {
    start: validateDate(start),
    end: validateDate(end)
  };
}

/**
 * Validates and defaults get_cost_and_usage arguments
 */
export function validateCostAndUsageArgs(args: ToolArguments): CostQuery {
  const granularity = validateGranularity(args.granularity);
  const groupBy = validateGroupBy(args.group_by);
  const metrics = validateMetrics(args.metrics);
  const filter = validateFilter(args.filter_config);
  const nextPageToken = optionalString(args, 'next_page_token');

  const timePeriod = resolveTimeRange(
    optionalString(args, 'start'),
    optionalString(args, 'end'),
    () => defaultRange(granularity)
  );

  return {
    timePeriod,
    granularity,
    groupBy,
    metrics,
    ...(filter ? { filter } : {}),
    ...(nextPageToken ? { nextPageToken } : {})
  };
}

/**
 * Validates and defaults get_dimension_values arguments
 */
export function validateDimensionValuesArgs(args: ToolArguments): DimensionQuery {
  const dimension = validateDimension(args.dimension);
  const maxResults = validateMaxResults(args.max_results);
  const searchString = optionalString(args, 'search_string');
  const nextPageToken = optionalString(args, 'next_page_token');

  const timePeriod = resolveTimeRange(
    optionalString(args, 'time_period_start'),
    optionalString(args, 'time_period_end'),
    () => defaultLookback()
  );

  return {
    dimension,
    timePeriod,
    maxResults,
    ...(searchString ? { searchString } : {}),
    ...(nextPageToken ? { nextPageToken } : {})
  };
}
