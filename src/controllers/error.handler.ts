import { Response } from 'express';
import { mongo } from 'mongoose';
import { ErrorCode } from '../types/error-dtos';
import { DeviceNotFoundError, ProviderTransportError, UnknownProviderError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ResponseBuilder } from '../utils/response-builder';

/** Maps dispatch-core failures onto API error responses. */
export function respondWithError(res: Response, error: unknown, fallbackMessage: string): void {
  if (error instanceof DeviceNotFoundError) {
    return ResponseBuilder.notFound(res, 'Device');
  }
  if (error instanceof mongo.MongoServerError && error.code === 11000) {
    return ResponseBuilder.error(res, ErrorCode.CONFLICT, 'A device with this device ID is registered under another provider.', 409);
  }
  if (error instanceof UnknownProviderError) {
    return ResponseBuilder.error(res, ErrorCode.UNKNOWN_PROVIDER, error.message, 422);
  }
  if (error instanceof ProviderTransportError) {
    logger.warn('Provider call failed', { provider: error.provider, statusCode: error.statusCode, reason: error.reason });
    return ResponseBuilder.error(res, ErrorCode.PROVIDER_ERROR, error.message, 502);
  }

  const errorMessage = error instanceof Error ? error.message : 'Unknown error';
  if (errorMessage.startsWith('InvalidOptions') || errorMessage.startsWith('SchemaValidationFailed')) {
    return ResponseBuilder.error(res, ErrorCode.VALIDATION_ERROR, errorMessage, 422);
  }

  logger.error(fallbackMessage, { error: errorMessage });
  return ResponseBuilder.error(res, ErrorCode.INTERNAL_SERVER_ERROR, fallbackMessage, 500);
}
