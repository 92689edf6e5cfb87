/**
 * 统一响应格式
 * { data: T | null, error: { code, message, details? } | null }
 */
export interface ApiResponse<T = unknown> {
  data: T | null;
  error: ApiError | null;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * 错误码枚举
 */
export enum ErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  DECODE_ERROR = 'DECODE_ERROR',
  BACKEND_ERROR = 'BACKEND_ERROR',
  ALIGNMENT_ERROR = 'ALIGNMENT_ERROR',
  TRANSCRIPTION_FAILED = 'TRANSCRIPTION_FAILED',
  ABORTED = 'ABORTED',
}
