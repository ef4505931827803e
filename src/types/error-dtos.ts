export interface APIErrorResponse {
  error: {
    code: string;
    message: string;
    details?: ErrorDetail[];
    timestamp: string;
  };
}

export interface ErrorDetail {
  field?: string;
  reason: string;
  value?: unknown;
}

export enum ErrorCode {
  // Auth errors
  UNAUTHORIZED = 'unauthorized',
  PERMISSION_DENIED = 'permission_denied',

  // Validation errors
  VALIDATION_ERROR = 'validation_error',
  UNKNOWN_PROVIDER = 'unknown_provider',

  // Resource errors
  NOT_FOUND = 'not_found',
  CONFLICT = 'conflict',

  // Upstream errors
  PROVIDER_ERROR = 'provider_error',

  // System errors
  INTERNAL_SERVER_ERROR = 'internal_server_error',
}
