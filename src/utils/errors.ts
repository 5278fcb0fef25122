import { createLogger } from './logger';

/**
 * Base error class for Cost Explorer MCP server errors
 */
export abstract class CostExplorerMcpError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * A caller-supplied argument violates a validation rule. The message is
 * reported to the caller verbatim.
 */
export class InvalidInputError extends CostExplorerMcpError {
  readonly code = 'INVALID_INPUT';
  readonly retryable = false;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
  }
}

/**
 * No AWS credentials could be resolved
 */
export class CredentialsMissingError extends CostExplorerMcpError {
  readonly code = 'CREDENTIALS_MISSING';
  readonly retryable = false;

  constructor(context?: Record<string, unknown>) {
    super('AWS credentials not found. Please configure AWS credentials or specify a profile.', context);
  }
}

/**
 * Cost Explorer rejected or failed the request after the SDK retry budget
 */
export class ProviderError extends CostExplorerMcpError {
  readonly code = 'PROVIDER_ERROR';
  readonly retryable: boolean;

  constructor(
    public readonly providerCode: string,
    public readonly providerMessage: string,
    retryable: boolean = false,
    context?: Record<string, unknown>
  ) {
    super(`Cost Explorer API error (${providerCode}): ${providerMessage}`, context);
    this.retryable = retryable;
  }
}

/**
 * Unexpected transport or serialization fault. Carries a generic message;
 * the original fault is logged.
 */
export class InternalError extends CostExplorerMcpError {
  readonly code = 'INTERNAL_ERROR';
  readonly retryable = false;

  constructor(operation: string, context?: Record<string, unknown>) {
    super(`Internal error while processing ${operation}`, context);
  }
}

/**
 * Invalid process configuration (flags or environment)
 */
export class ConfigurationError extends CostExplorerMcpError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration error: ${message}`, context);
  }
}

const RETRYABLE_ERROR_CODES = [
  'ThrottlingException',
  'TooManyRequestsException',
  'LimitExceededException',
  'ServiceUnavailableException',
  'InternalServerErrorException',
  'RequestTimeout',
  'RequestTimeoutException'
];

const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

const CREDENTIAL_ERROR_NAMES = ['CredentialsProviderError', 'CredentialsError'];

type AwsServiceError = Error & {
  $fault: 'client' | 'server';
  $metadata?: { httpStatusCode?: number };
};

/**
 * Error handler utility class
 */
export class ErrorHandler {
  private logger = createLogger('ErrorHandler');

  /**
   * Classifies an arbitrary thrown value into one of the server's error kinds
   */
  handleError(error: unknown, operation: string, context?: Record<string, unknown>): CostExplorerMcpError {
    const errorContext = {
      operation,
      originalError: error instanceof Error ? error.message : String(error),
      ...context
    };

    if (error instanceof CostExplorerMcpError) {
      this.logger.error(`${operation} failed with known error`, error, errorContext);
      return error;
    }

    if (this.isCredentialsError(error)) {
      this.logger.error(`${operation} failed with missing credentials`, error, errorContext);
      return new CredentialsMissingError(errorContext);
    }

    if (this.isAwsServiceError(error)) {
      this.logger.error(`${operation} failed with Cost Explorer error`, error, errorContext);
      return new ProviderError(
        error.name,
        error.message || 'Unknown Cost Explorer error',
        this.isRetryableAWSError(error),
        { ...errorContext, httpStatusCode: error.$metadata?.httpStatusCode }
      );
    }

    this.logger.error(
      `${operation} failed with unknown error`,
      error instanceof Error ? error : undefined,
      errorContext
    );
    return new InternalError(operation, errorContext);
  }

  /**
   * Determines if an AWS service error is transient
   */
  isRetryableAWSError(error: AwsServiceError): boolean {
    const status = error.$metadata?.httpStatusCode;
    return (
      RETRYABLE_ERROR_CODES.includes(error.name) ||
      (status !== undefined && RETRYABLE_STATUS_CODES.includes(status))
    );
  }

  private isCredentialsError(error: unknown): error is Error {
    if (!(error instanceof Error)) {
      return false;
    }
    return CREDENTIAL_ERROR_NAMES.includes(error.name) || /could not load credentials/i.test(error.message);
  }

  private isAwsServiceError(error: unknown): error is AwsServiceError {
    return (
      error instanceof Error &&
      '$fault' in error &&
      (error.$fault === 'client' || error.$fault === 'server')
    );
  }
}

/**
 * Global error handler instance
 */
export const errorHandler = new ErrorHandler();

/**
 * Runs an operation and rethrows any failure as a classified error
 */
export async function safeExecute<T>(
  operation: () => Promise<T>,
  operationName: string,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw errorHandler.handleError(error, operationName, context);
  }
}
