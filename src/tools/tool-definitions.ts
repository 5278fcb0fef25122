import {
  DEFAULT_GRANULARITY,
  DEFAULT_MAX_RESULTS,
  DEFAULT_METRICS,
  DIMENSIONS,
  GRANULARITIES,
  MAX_MAX_RESULTS,
  METRICS,
  MIN_MAX_RESULTS,
  TOOL_GET_COST_AND_USAGE,
  TOOL_GET_DIMENSION_VALUES
} from '../constants';

export type JsonSchemaProperty = {
  type: 'string' | 'integer' | 'array' | 'object';
  description?: string;
  enum?: string[];
  default?: string | number | string[];
  minimum?: number;
  maximum?: number;
  items?: JsonSchemaProperty;
  properties?: Record<string, JsonSchemaProperty>;
  required?: string[];
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required?: string[];
  };
};

const profileProperty: JsonSchemaProperty = {
  type: 'string',
  description: 'AWS profile name from ~/.aws/config'
};

export const GET_COST_AND_USAGE_TOOL: ToolDefinition = {
  name: TOOL_GET_COST_AND_USAGE,
  description:
    'Get AWS costs for a time period, optionally grouped by dimensions. End date is exclusive (YYYY-MM-DD).',
  inputSchema: {
    type: 'object',
    properties: {
      start: { type: 'string', description: 'Start date (YYYY-MM-DD, inclusive)' },
      end: { type: 'string', description: 'End date (YYYY-MM-DD, exclusive)' },
      granularity: { type: 'string', enum: [...GRANULARITIES], default: DEFAULT_GRANULARITY },
      group_by: {
        type: 'array',
        items: { type: 'string', enum: [...DIMENSIONS] },
        description: 'Dimensions to group by (max 2 per Cost Explorer API).'
      },
      metrics: {
        type: 'array',
        items: { type: 'string', enum: [...METRICS] },
        default: [...DEFAULT_METRICS]
      },
      filter_config: {
        type: 'object',
        properties: {
          dimension: { type: 'string', enum: [...DIMENSIONS] },
          values: { type: 'array', items: { type: 'string' } }
        },
        required: ['dimension', 'values']
      },
      next_page_token: { type: 'string' },
      profile: profileProperty
    }
  }
};

export const GET_DIMENSION_VALUES_TOOL: ToolDefinition = {
  name: TOOL_GET_DIMENSION_VALUES,
  description: 'Get available values for a specific Cost Explorer dimension.',
  inputSchema: {
    type: 'object',
    properties: {
      dimension: { type: 'string', enum: [...DIMENSIONS] },
      time_period_start: { type: 'string', description: 'Start date (YYYY-MM-DD)' },
      time_period_end: { type: 'string', description: 'End date (YYYY-MM-DD)' },
      search_string: { type: 'string' },
      max_results: {
        type: 'integer',
        minimum: MIN_MAX_RESULTS,
        maximum: MAX_MAX_RESULTS,
        default: DEFAULT_MAX_RESULTS
      },
      next_page_token: { type: 'string' },
      profile: profileProperty
    },
    required: ['dimension']
  }
};

export const TOOL_DEFINITIONS: ToolDefinition[] = [GET_COST_AND_USAGE_TOOL, GET_DIMENSION_VALUES_TOOL];
