/**
 * Body of every error response produced by HttpExceptionFilter
 */
export interface ApiErrorResponse {
  success: false;
  result: null;
  error: string;
  path: string;
  timestamp: string;
}
