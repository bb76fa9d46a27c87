// Standardized error handling utilities
// HTTP errors and the orchestrator failure taxonomy share one code space

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  CONFLICT = 'conflict',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',

  // Tool and residency failures (recovered inside a turn)
  TOOL_REJECTED = 'tool_rejected',
  TOOL_TIMEOUT = 'tool_timeout',
  TOOL_TRANSPORT_ERROR = 'tool_transport_error',
  SWAP_TIMEOUT = 'swap_timeout',

  // Turn-level outcomes
  LOOP_BOUND_EXCEEDED = 'loop_bound_exceeded',
  MODEL_UNAVAILABLE = 'model_unavailable',
  CANCELLED = 'cancelled',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static conflict(message: string = 'Conflict', details?: unknown): AppError {
    return new AppError(ErrorCode.CONFLICT, message, 409, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }

  static swapTimeout(slotId: string, model: string, timeoutMs: number): AppError {
    return new AppError(
      ErrorCode.SWAP_TIMEOUT,
      `Loading ${model} on slot ${slotId} exceeded ${Math.round(timeoutMs / 1000)}s`,
      503,
      { slotId, model, timeoutMs },
    );
  }

  static toolRejected(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.TOOL_REJECTED, message, 503, details);
  }

  static toolTransport(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.TOOL_TRANSPORT_ERROR, message, 502, details);
  }

  static modelUnavailable(message: string = 'Language model is unavailable', details?: unknown): AppError {
    return new AppError(ErrorCode.MODEL_UNAVAILABLE, message, 502, details);
  }

  static cancelled(message: string = 'Operation cancelled'): AppError {
    return new AppError(ErrorCode.CANCELLED, message, 499);
  }
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
