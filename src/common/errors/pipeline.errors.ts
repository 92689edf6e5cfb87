import { ErrorCode } from '../interfaces/response.interface';

/**
 * 流水线错误基类
 */
export class PipelineError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * 音频无法读取或解码，整个任务失败
 */
export class DecodeError extends PipelineError {
  constructor(message: string) {
    super(ErrorCode.DECODE_ERROR, message);
  }
}

export type BackendErrorKind = 'transient' | 'permanent';

/**
 * 外部服务（语音识别 / 翻译）调用失败
 * transient 可重试；permanent（鉴权、额度等）直接中止任务
 */
export class BackendError extends PipelineError {
  constructor(
    readonly kind: BackendErrorKind,
    message: string,
    readonly status?: number,
  ) {
    super(ErrorCode.BACKEND_ERROR, message);
  }

  get isTransient(): boolean {
    return this.kind === 'transient';
  }

  static transient(message: string, status?: number): BackendError {
    return new BackendError('transient', message, status);
  }

  static permanent(message: string, status?: number): BackendError {
    return new BackendError('permanent', message, status);
  }

  /**
   * 按 HTTP 状态码分类：超时、冲突、限流、5xx 视为可重试
   */
  static fromStatus(status: number, message: string): BackendError {
    const transient = status === 408 || status === 409 || status === 425 || status === 429 || status >= 500;
    return new BackendError(transient ? 'transient' : 'permanent', message, status);
  }
}

/**
 * 翻译结果的行数 / 编号与输入不一致
 */
export class AlignmentError extends PipelineError {
  constructor(
    message: string,
    readonly expected: number,
    readonly received: number,
  ) {
    super(ErrorCode.ALIGNMENT_ERROR, message);
  }
}

export class AbortedError extends PipelineError {
  constructor(message = 'Run aborted') {
    super(ErrorCode.ABORTED, message);
  }
}

/**
 * 转录失败片段比例超过阈值
 */
export class TranscriptionFailedError extends PipelineError {
  constructor(
    readonly failed: number,
    readonly total: number,
  ) {
    super(ErrorCode.TRANSCRIPTION_FAILED, `Transcription failed for ${failed}/${total} clips`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 将 fetch / 网络层异常统一转换为 BackendError
 */
export function toBackendError(error: unknown, service: string): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  return BackendError.transient(`${service} request failed: ${errorMessage(error)}`);
}
