/**
 * Response Envelope
 *
 * Every response body the API produces is one of these two shapes, so
 * clients keep a single parsing path for success and failure alike.
 */

export type ApiErrorCode =
  | 'AUTHENTICATION_REQUIRED'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'DUPLICATE_EMAIL'
  | 'INVALID_CREDENTIALS'
  | 'INTERNAL_ERROR';

export interface ApiErrorDetail {
  code: ApiErrorCode;
  message: string;
}

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiFailure {
  success: false;
  error: ApiErrorDetail;
}

export type ApiResponse<T> = ApiSuccess<T> | ApiFailure;

export const ok = <T>(data: T): ApiSuccess<T> => ({ success: true, data });

export const fail = (code: ApiErrorCode, message: string): ApiFailure => ({
  success: false,
  error: { code, message },
});

export const isApiErrorCode = (value: string): value is ApiErrorCode => {
  return (
    value === 'AUTHENTICATION_REQUIRED' ||
    value === 'NOT_FOUND' ||
    value === 'VALIDATION_ERROR' ||
    value === 'DUPLICATE_EMAIL' ||
    value === 'INVALID_CREDENTIALS' ||
    value === 'INTERNAL_ERROR'
  );
};

// Checks the envelope shape only; `data` is left for the caller to validate.
export const isApiResponse = (value: unknown): value is ApiResponse<unknown> => {
  if (!value || typeof value !== 'object') return false;
  const v = value as Record<string, unknown>;

  if (v.success === true) {
    return 'data' in v;
  }

  if (v.success === false) {
    const error = v.error;
    if (!error || typeof error !== 'object') return false;
    const e = error as Record<string, unknown>;
    return typeof e.code === 'string' && isApiErrorCode(e.code) && typeof e.message === 'string';
  }

  return false;
};
