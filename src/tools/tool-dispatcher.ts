import { TOOL_GET_COST_AND_USAGE, TOOL_GET_DIMENSION_VALUES } from '../constants';
import type { CostAndUsageResult, DimensionValuesResult, ToolArguments, ToolErrorResult } from '../types';
import { optionalString } from '../validation';
import { InvalidInputError, errorHandler } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import { BillingClient } from './billing-client';
import { CostExplorerTool } from './cost-explorer-tool';
import { TOOL_DEFINITIONS, type ToolDefinition } from './tool-definitions';

export type CostExplorerToolFactory = (profile: string | undefined, logger: Logger) => CostExplorerTool;

/**
 * Default factory: one billing client, and so one Cost Explorer connection, per call
 */
export const createCostExplorerTool: CostExplorerToolFactory = (profile, logger) =>
  new CostExplorerTool(new BillingClient(profile, logger), logger);

/**
 * Routes tool calls by name and serializes their outcome.
 *
 * dispatch() never throws: every failure becomes a `{"error": "..."}` body.
 */
export class ToolDispatcher {
  private logger: Logger;

  constructor(
    private readonly defaultProfile?: string,
    private readonly toolFactory: CostExplorerToolFactory = createCostExplorerTool,
    logger?: Logger
  ) {
    this.logger = logger ? logger.child('ToolDispatcher') : createLogger('ToolDispatcher');
  }

  listTools(): ToolDefinition[] {
    return TOOL_DEFINITIONS;
  }

  /**
   * Runs the named tool and returns its result as 2-space indented JSON
   */
  async dispatch(name: string, args: ToolArguments = {}): Promise<string> {
    const startTime = Date.now();

    try {
      const result = await this.execute(name, args);
      this.logger.logToolCall(name, true, { durationMs: Date.now() - startTime });
      return JSON.stringify(result, null, 2);
    } catch (error) {
      const handled = errorHandler.handleError(error, name);
      this.logger.logToolCall(name, false, {
        durationMs: Date.now() - startTime,
        errorCode: handled.code,
        retryable: handled.retryable
      });
      const body: ToolErrorResult = { error: handled.message };
      return JSON.stringify(body, null, 2);
    }
  }

  private async execute(name: string, args: ToolArguments): Promise<CostAndUsageResult | DimensionValuesResult> {
    switch (name) {
      case TOOL_GET_COST_AND_USAGE:
        return this.toolFor(args).getCostAndUsage(args);
      case TOOL_GET_DIMENSION_VALUES:
        return this.toolFor(args).getDimensionValues(args);
      default:
        throw new InvalidInputError(`Unknown tool: ${name}`);
    }
  }

  /**
   * A per-call profile argument overrides the server's default profile
   */
  private toolFor(args: ToolArguments): CostExplorerTool {
    const profile = optionalString(args, 'profile') ?? this.defaultProfile;
    return this.toolFactory(profile, this.logger);
  }
}
