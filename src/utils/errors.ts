// Error types shared by the HTTP routes, the tool gateway and the orchestrator

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  SERVICE_UNAVAILABLE = 'service_unavailable',
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

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static unavailable(message: string = 'Service unavailable', details?: unknown): AppError {
    return new AppError(ErrorCode.SERVICE_UNAVAILABLE, message, 503, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
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

/**
 * Failure classes of a tool call. Transport and protocol failures mean the tool
 * did not run; application and validation failures mean it ran (or was refused)
 * and the caller should see the reason.
 */
export type ToolErrorKind = 'TransportError' | 'ProtocolError' | 'ApplicationError' | 'ValidationError';

// The remote endpoint could not be reached (refused, timeout, DNS, gateway status)
export class ToolTransportError extends Error {
  readonly kind = 'TransportError' as const;

  constructor(public endpoint: string, details: string) {
    super(`Tool endpoint unreachable at ${endpoint}: ${details}`);
    this.name = 'ToolTransportError';
  }
}

// A response arrived but is not a valid envelope for the request
export class ToolProtocolError extends Error {
  readonly kind = 'ProtocolError' as const;

  constructor(public endpoint: string, details: string) {
    super(`Malformed tool response from ${endpoint}: ${details}`);
    this.name = 'ToolProtocolError';
  }
}

export class ToolRegistrationError extends Error {
  constructor(public toolName: string, reason: string) {
    super(`Failed to register tool "${toolName}": ${reason}`);
    this.name = 'ToolRegistrationError';
  }
}

// The decision function behind an agent failed or returned unusable output
export class AgentError extends Error {
  constructor(public agentName: string, details: string) {
    super(`Agent "${agentName}" failed: ${details}`);
    this.name = 'AgentError';
  }
}

export class OrchestrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OrchestrationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
