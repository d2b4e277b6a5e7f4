/**
 * =============================================================================
 * API RESPONSE BUILDER
 * =============================================================================
 * 
 * Standardized response format for all API endpoints.
 * 
 * RESPONSE FORMAT:
 * ```json
 * {
 *   "success": true,
 *   "data": { ... },
 *   "message": "Optional success message",
 *   "meta": {
 *     "timestamp": "..."
 *   }
 * }
 * ```
 * 
 * USAGE:
 * ```typescript
 * // Simple success
 * return ApiResponse.success(res, data);
 * 
 * // With message
 * return ApiResponse.created(res, booking, 'Booking created');
 * 
 * // Lists carry a count
 * return ApiResponse.list(res, bookings);
 * ```
 * 
 * =============================================================================
 */

import { Response } from 'express';
import { HTTP_STATUS } from '../constants';

/**
 * Success response format
 */
export interface SuccessResponse<T> {
  success: true;
  data: T;
  message?: string;
  meta?: ResponseMeta;
}

/**
 * Response metadata
 */
export interface ResponseMeta {
  timestamp?: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * API Response Builder Class
 */
export class ApiResponse {
  /**
   * 200 OK - Generic success response
   */
  static success<T>(
    res: Response,
    data: T,
    message?: string,
    meta?: Omit<ResponseMeta, 'timestamp'>
  ): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
      ...(message && { message }),
      meta: {
        timestamp: new Date().toISOString(),
        ...meta
      }
    };
    return res.status(HTTP_STATUS.OK).json(response);
  }

  /**
   * 201 Created - Resource created successfully
   */
  static created<T>(
    res: Response,
    data: T,
    message: string = 'Resource created successfully'
  ): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
      message,
      meta: {
        timestamp: new Date().toISOString()
      }
    };
    return res.status(HTTP_STATUS.CREATED).json(response);
  }

  /**
   * 204 No Content - Success with no response body
   */
  static noContent(res: Response): Response {
    return res.status(HTTP_STATUS.NO_CONTENT).send();
  }

  /**
   * Success response for list endpoints (with count)
   */
  static list<T>(
    res: Response,
    data: T[],
    message?: string
  ): Response {
    return this.success(res, data, message, { count: data.length });
  }
}
