/**
 * Uniform failure value returned by every client call in place of a thrown error.
 * Callers tell it apart from a decoded resource by the presence of `error`.
 */
export interface ApiErrorResult {
  /** Failure kind: `HTTP <status>`, `Network error` or `Unknown error` */
  error: string;
  message?: string;
  /** Raw response body for HTTP failures */
  details?: string;
}

export type ApiResult<T> = T | ApiErrorResult;

export function isApiError(value: unknown): value is ApiErrorResult {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'error' in value;
}
