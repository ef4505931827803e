import { Response } from 'express';
import { Result, ValidationError } from 'express-validator';
import { serializeDocument } from './serialize';
import { APIErrorResponse, ErrorCode, ErrorDetail } from '../types/error-dtos';
import { PaginationMeta, PaginationQuery } from '../types/pagination-dtos';

export class ResponseBuilder {
  /**
   * Sends a success response with automatic serialization
   */
  static success<T>(res: Response, data: T, statusCode: number = 200): void {
    res.status(statusCode).json(serializeDocument(data));
  }

  /**
   * Sends a paginated response
   */
  static paginated<T>(res: Response, data: T[], query: PaginationQuery, totalItems: number): void {
    const totalPages = Math.ceil(totalItems / query.perPage);
    const pagination: PaginationMeta = {
      page: query.page,
      per_page: query.perPage,
      total_items: totalItems,
      total_pages: totalPages,
      has_next: query.page < totalPages,
      has_prev: query.page > 1,
    };

    res.status(200).json({ data: serializeDocument(data), pagination });
  }

  /**
   * Sends an error response
   */
  static error(res: Response, code: ErrorCode, message: string, statusCode: number, details?: ErrorDetail[]): void {
    const errorResponse: APIErrorResponse = {
      error: {
        code,
        message,
        details,
        timestamp: new Date().toISOString(),
      },
    };

    res.status(statusCode).json(errorResponse);
  }

  /**
   * 404 Not Found shortcut
   */
  static notFound(res: Response, resource: string = 'Resource'): void {
    this.error(res, ErrorCode.NOT_FOUND, `${resource} not found`, 404);
  }

  /**
   * 422 Validation Error
   */
  static validationError(res: Response, details: ErrorDetail[]): void {
    this.error(res, ErrorCode.VALIDATION_ERROR, 'Input validation failed', 422, details);
  }

  /**
   * Sends a 422 when express-validator collected errors. Returns true when a response was sent.
   */
  static rejectInvalid(res: Response, errors: Result<ValidationError>): boolean {
    if (errors.isEmpty()) return false;

    this.validationError(
      res,
      errors.array().map(err => ({
        field: err.type === 'field' ? err.path : undefined,
        reason: String(err.msg),
        value: err.type === 'field' ? err.value : undefined,
      }))
    );
    return true;
  }
}
