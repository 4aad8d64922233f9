import { ErrorCode, type ApiError } from '@tempscore/shared';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toApiError(requestId: string): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        requestId,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(ErrorCode.NOT_FOUND, `${resource} not found: ${id}`, 404);
    this.name = 'NotFoundError';
  }
}

// Missing or invalid provider configuration, or an unknown aggregation method
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFIGURATION_ERROR, message, 400, details);
    this.name = 'ConfigurationError';
  }
}

export class EmptyResultError extends AppError {
  constructor(
    message = 'None of the companies in your portfolio could be found by the data providers'
  ) {
    super(ErrorCode.EMPTY_RESULT, message, 400);
    this.name = 'EmptyResultError';
  }
}

export class InvalidGroupingError extends AppError {
  constructor(columns: readonly string[], available: readonly string[]) {
    super(
      ErrorCode.INVALID_GROUPING,
      `Unknown grouping column(s): ${columns.join(', ')}`,
      400,
      { columns: [...columns], available: [...available] }
    );
    this.name = 'InvalidGroupingError';
  }
}

/**
 * A provider that could not be reached or returned unusable data.
 * The assembler recovers from it by treating the provider as empty.
 */
export class ProviderFailure extends AppError {
  constructor(
    public readonly providerName: string,
    reason: string
  ) {
    super(
      ErrorCode.PROVIDER_FAILURE,
      `Data provider ${providerName} failed: ${reason}`,
      502,
      { provider: providerName }
    );
    this.name = 'ProviderFailure';
  }
}
