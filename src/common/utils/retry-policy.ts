import { AbortedError, AlignmentError, BackendError } from '../errors/pipeline.errors';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyOptions {
  /** 总尝试次数（含首次） */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** 在 [delay/2, delay] 范围内随机抖动 */
  jitter?: boolean;
  sleep?: SleepFn;
  random?: () => number;
}

export interface AttemptContext {
  attempt: number;
  signal: AbortSignal;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** 单次调用超时，超时视为可重试错误 */
  timeoutMs?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * 可中断的 sleep
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AbortedError();
  }
}

/**
 * 默认重试判定：可重试的后端错误、对齐错误
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof BackendError) {
    return error.isTransient;
  }
  return error instanceof AlignmentError;
}

/**
 * 有界重试策略（指数退避）
 * 语音识别和翻译两处调用共用，sleep / random 可注入以便测试
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly jitter: boolean;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.baseDelayMs = Math.max(0, options.baseDelayMs);
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
    this.jitter = options.jitter ?? false;
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * 第 attempt 次失败后的等待时间
   */
  delayFor(attempt: number): number {
    const exponential = Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs);
    if (!this.jitter) {
      return exponential;
    }
    return Math.round(exponential / 2 + this.random() * (exponential / 2));
  }

  async execute<T>(fn: (context: AttemptContext) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    const { signal, timeoutMs, onRetry } = options;
    const isRetryable = options.isRetryable ?? isRetryableError;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(signal);
      try {
        return await this.runAttempt(fn, attempt, signal, timeoutMs);
      } catch (error) {
        if (signal?.aborted) {
          throw new AbortedError();
        }
        if (attempt >= this.maxAttempts || !isRetryable(error)) {
          throw error;
        }
        const delayMs = this.delayFor(attempt);
        onRetry?.(error, attempt, delayMs);
        await this.sleep(delayMs, signal);
      }
    }
  }

  /**
   * 单次调用：把外部 signal 与超时合并成一个 signal 交给后端
   */
  private async runAttempt<T>(
    fn: (context: AttemptContext) => Promise<T>,
    attempt: number,
    signal: AbortSignal | undefined,
    timeoutMs: number | undefined,
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let forward: (() => void) | undefined;

    // 外部取消或超时时立即结束本次调用，不等待后端自行响应 signal
    const guard = new Promise<never>((_, reject) => {
      forward = () => {
        controller.abort();
        reject(new AbortedError());
      };
      signal?.addEventListener('abort', forward, { once: true });
      if (timeoutMs && timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          controller.abort();
          reject(BackendError.transient(`Call timed out after ${timeoutMs}ms`));
        }, timeoutMs);
      }
    });

    try {
      return await Promise.race([fn({ attempt, signal: controller.signal }), guard]);
    } catch (error) {
      if (timedOut) {
        throw BackendError.transient(`Call timed out after ${timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      if (forward) {
        signal?.removeEventListener('abort', forward);
      }
    }
  }
}
