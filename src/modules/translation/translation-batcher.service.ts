import { Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';
import {
  ProgressListener,
  TimedUtterance,
  TranslationUnit,
} from '../../common/interfaces/subtitle.interface';
import {
  AbortedError,
  AlignmentError,
  BackendError,
  errorMessage,
} from '../../common/errors/pipeline.errors';
import { RetryPolicy, SleepFn, throwIfAborted } from '../../common/utils/retry-policy';
import { NumberedLine, parseNumberedLines } from './numbered-lines';
import { TranslationBackend } from './translation-backend.interface';

export interface TranslationConfig {
  /** 每次请求最多包含的句子数 */
  batchSize: number;
  targetLanguage: string;
  sourceLanguage?: string;
  maxRetries: number;
  backoffBaseMs: number;
  timeoutMs?: number;
  maxConcurrency?: number;
  /** 大于 0 时把上一批最后 N 句译文作为上下文（仅参考，不翻译），批次改为顺序执行 */
  contextLines?: number;
  /** 整批失败后逐句重试，仍失败才保留原文 */
  lineFallback?: boolean;
}

export interface TranslateOptions {
  signal?: AbortSignal;
  onProgress?: ProgressListener;
  sleep?: SleepFn;
  random?: () => number;
}

/**
 * 重试耗尽、保留原文的批次
 */
export interface BatchFallback {
  /** 批次序号，从 1 开始 */
  batch: number;
  firstIndex: number;
  lastIndex: number;
  attempts: number;
  reason: 'alignment' | 'backend';
  message: string;
  /** 最终仍为原文的句子数 */
  passthrough: number;
}

export interface TranslationOutcome {
  units: TranslationUnit[];
  fallbacks: BatchFallback[];
}

interface BatchResult {
  texts: string[];
  fallback?: BatchFallback;
}

interface BatchJob {
  number: number;
  utterances: readonly TimedUtterance[];
}

@Injectable()
export class TranslationBatcherService {
  private readonly logger = new Logger(TranslationBatcherService.name);

  /**
   * 分批翻译，返回的 units 与输入 utterances 等长且顺序一致
   * 单批失败不会抛出，降级为原文；只有取消和永久错误会中止
   */
  async translate(
    utterances: readonly TimedUtterance[],
    backend: TranslationBackend,
    config: TranslationConfig,
    options: TranslateOptions = {},
  ): Promise<TranslationOutcome> {
    throwIfAborted(options.signal);
    if (utterances.length === 0) {
      return { units: [], fallbacks: [] };
    }

    const batches = this.partition(utterances, Math.max(1, config.batchSize));
    const policy = new RetryPolicy({
      maxAttempts: config.maxRetries + 1,
      baseDelayMs: config.backoffBaseMs,
      jitter: true,
      sleep: options.sleep,
      random: options.random,
    });
    const contextLines = config.contextLines ?? 0;

    this.logger.log(
      `Translating ${utterances.length} lines to ${config.targetLanguage} ` +
        `in ${batches.length} batches of ${config.batchSize}` +
        (contextLines > 0 ? ` (carrying ${contextLines} context lines)` : ''),
    );

    const results =
      contextLines > 0
        ? await this.translateSequential(batches, backend, config, policy, contextLines, options)
        : await this.translateConcurrent(batches, backend, config, policy, options);

    const units: TranslationUnit[] = [];
    const fallbacks: BatchFallback[] = [];
    batches.forEach((batch, position) => {
      const result = results[position];
      batch.utterances.forEach((utterance, i) => {
        units.push({ index: utterance.index, sourceText: utterance.text, translatedText: result.texts[i] });
      });
      if (result.fallback) {
        fallbacks.push(result.fallback);
      }
    });

    this.logger.log(`Translation finished: ${batches.length - fallbacks.length}/${batches.length} batches translated`);
    return { units, fallbacks };
  }

  private partition(utterances: readonly TimedUtterance[], size: number): BatchJob[] {
    const batches: BatchJob[] = [];
    for (let i = 0; i < utterances.length; i += size) {
      batches.push({ number: batches.length + 1, utterances: utterances.slice(i, i + size) });
    }
    return batches;
  }

  private async translateConcurrent(
    batches: BatchJob[],
    backend: TranslationBackend,
    config: TranslationConfig,
    policy: RetryPolicy,
    options: TranslateOptions,
  ): Promise<BatchResult[]> {
    const run = new AbortController();
    const cancel = () => run.abort();
    options.signal?.addEventListener('abort', cancel, { once: true });

    const limit = pLimit(Math.max(1, config.maxConcurrency ?? 1));
    const results: BatchResult[] = new Array(batches.length);
    let completed = 0;

    const settled = await Promise.allSettled(
      batches.map((batch, position) =>
        limit(async () => {
          throwIfAborted(run.signal);
          try {
            results[position] = await this.translateBatch(batch, [], backend, config, policy, run.signal);
          } catch (error) {
            run.abort();
            throw error;
          }
          completed++;
          options.onProgress?.({ stage: 'translation', completed, total: batches.length });
        }),
      ),
    );
    options.signal?.removeEventListener('abort', cancel);

    const rejected = settled.flatMap((outcome) => (outcome.status === 'rejected' ? [outcome.reason] : []));
    const fatal = rejected.find((reason) => !(reason instanceof AbortedError));
    if (fatal !== undefined) {
      throw fatal;
    }
    if (rejected.length > 0) {
      throw new AbortedError();
    }
    return results;
  }

  private async translateSequential(
    batches: BatchJob[],
    backend: TranslationBackend,
    config: TranslationConfig,
    policy: RetryPolicy,
    contextLines: number,
    options: TranslateOptions,
  ): Promise<BatchResult[]> {
    const results: BatchResult[] = [];
    let context: string[] = [];
    for (const batch of batches) {
      throwIfAborted(options.signal);
      const result = await this.translateBatch(batch, context, backend, config, policy, options.signal);
      results.push(result);
      context = result.texts.slice(-contextLines);
      options.onProgress?.({ stage: 'translation', completed: results.length, total: batches.length });
    }
    return results;
  }

  private async translateBatch(
    batch: BatchJob,
    context: readonly string[],
    backend: TranslationBackend,
    config: TranslationConfig,
    policy: RetryPolicy,
    signal?: AbortSignal,
  ): Promise<BatchResult> {
    const lines: NumberedLine[] = batch.utterances.map((u, i) => ({ number: i + 1, text: u.text }));
    let attempts = 0;

    try {
      const texts = await policy.execute(
        async ({ attempt, signal: callSignal }) => {
          attempts = attempt;
          const prompt = this.buildPrompt(config, lines.length, context, attempt > 1);
          const response = await backend.complete(prompt, lines, { signal: callSignal });
          return parseNumberedLines(response, lines.length);
        },
        {
          signal,
          timeoutMs: config.timeoutMs,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn(
              `Batch ${batch.number} attempt ${attempt} failed: ${errorMessage(error)}; retrying in ${delayMs}ms`,
            ),
        },
      );
      return { texts };
    } catch (error) {
      if (error instanceof AbortedError || (error instanceof BackendError && !error.isTransient)) {
        throw error;
      }

      const sources = batch.utterances.map((u) => u.text);
      const texts = config.lineFallback
        ? await this.translateLineByLine(sources, backend, config, signal)
        : sources;
      const passthrough = texts.filter((text, i) => text === sources[i]).length;

      this.logger.warn(
        `Batch ${batch.number} failed after ${attempts} attempts (${errorMessage(error)}); ` +
          `${passthrough}/${sources.length} lines kept in the original language`,
      );
      return {
        texts,
        fallback: {
          batch: batch.number,
          firstIndex: batch.utterances[0].index,
          lastIndex: batch.utterances[batch.utterances.length - 1].index,
          attempts,
          reason: error instanceof AlignmentError ? 'alignment' : 'backend',
          message: errorMessage(error),
          passthrough,
        },
      };
    }
  }

  /**
   * 逐句单独请求一次（带超时），失败则保留原文
   */
  private async translateLineByLine(
    sources: readonly string[],
    backend: TranslationBackend,
    config: TranslationConfig,
    signal?: AbortSignal,
  ): Promise<string[]> {
    const policy = new RetryPolicy({ maxAttempts: 1, baseDelayMs: 0 });
    const texts: string[] = [];
    for (const source of sources) {
      throwIfAborted(signal);
      try {
        const text = await policy.execute(
          async ({ signal: callSignal }) => {
            const response = await backend.complete(this.buildPrompt(config, 1, [], true), [{ number: 1, text: source }], {
              signal: callSignal,
            });
            return parseNumberedLines(response, 1)[0];
          },
          { signal, timeoutMs: config.timeoutMs },
        );
        texts.push(text);
      } catch (error) {
        if (error instanceof AbortedError || (error instanceof BackendError && !error.isTransient)) {
          throw error;
        }
        this.logger.debug(`Single-line fallback failed: ${errorMessage(error)}`);
        texts.push(source);
      }
    }
    return texts;
  }

  /**
   * 构建翻译指令
   * 逐行编号、要求逐行对应输出是保证顺序的关键；重试时追加更严格的要求
   */
  buildPrompt(config: TranslationConfig, count: number, context: readonly string[], strict: boolean): string {
    const source = config.sourceLanguage ? ` from ${config.sourceLanguage}` : '';
    const parts = [
      `You are a professional subtitle translator. Translate each numbered subtitle line${source} into ${config.targetLanguage}.`,
      '',
      'Rules:',
      `1. Output exactly ${count} lines, one translation per input line, in the same order.`,
      '2. Prefix every output line with "Line N:" using the number of the input line it translates.',
      '3. Never merge, split, skip or reorder lines, even when a sentence continues on the next line.',
      '4. Keep the meaning and tone of the original. Output no commentary.',
    ];

    if (context.length > 0) {
      parts.push(
        '',
        'Previous subtitle lines, for context only. Do not translate or repeat them:',
        ...context.map((line) => `> ${line}`),
      );
    }

    if (strict) {
      parts.push(
        '',
        `IMPORTANT: a previous answer did not match the input. Reply with ONLY the lines "Line 1:" through "Line ${count}:", ` +
          'each on its own line, and nothing else.',
      );
    }
    return parts.join('\n');
  }
}
