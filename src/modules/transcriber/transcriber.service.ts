import { Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';
import {
  AudioSegment,
  ProgressListener,
  TimedUtterance,
} from '../../common/interfaces/subtitle.interface';
import {
  AbortedError,
  BackendError,
  TranscriptionFailedError,
  errorMessage,
} from '../../common/errors/pipeline.errors';
import { RetryPolicy, SleepFn, throwIfAborted } from '../../common/utils/retry-policy';
import { encodeWav } from '../../common/utils/wav';
import { RecognizedSpeech, SpeechBackend } from './speech-backend.interface';
import { filterHallucinations } from './transcript-filters';

export interface TranscriberConfig {
  language?: string;
  prompt?: string;
  /** 同时进行中的识别请求数 */
  maxConcurrency: number;
  /** 单个片段失败后的重试次数 */
  maxRetries: number;
  backoffBaseMs: number;
  timeoutMs?: number;
  /** 超过该时长的片段先切成多段再识别 */
  maxSegmentMs?: number;
  /** 失败片段占比超过该值时整个任务失败 */
  maxFailureRatio: number;
  minConfidence?: number;
  filterHallucinations?: boolean;
  maxRepeat?: number;
}

export interface TranscribeOptions {
  signal?: AbortSignal;
  onProgress?: ProgressListener;
  sleep?: SleepFn;
}

/**
 * 重试耗尽后被跳过的片段
 */
export interface ClipFailure {
  clip: number;
  start: number;
  end: number;
  attempts: number;
  message: string;
}

export interface TranscriptionResult {
  utterances: TimedUtterance[];
  failures: ClipFailure[];
  clipCount: number;
}

type Draft = Omit<TimedUtterance, 'index'>;

@Injectable()
export class TranscriberService {
  private readonly logger = new Logger(TranscriberService.name);

  /**
   * 逐段调用语音识别，将片段内时间换算为全局时间
   * 并发执行，结果按片段顺序合并后统一编号
   */
  async transcribe(
    segments: readonly AudioSegment[],
    backend: SpeechBackend,
    config: TranscriberConfig,
    options: TranscribeOptions = {},
  ): Promise<TranscriptionResult> {
    throwIfAborted(options.signal);
    const clips = this.splitLongSegments(segments, this.clipLimit(backend, config));
    if (clips.length === 0) {
      return { utterances: [], failures: [], clipCount: 0 };
    }

    this.logger.log(
      `Transcribing ${clips.length} clips with ${backend.name} ` +
        `(max ${config.maxConcurrency} in flight, lang=${config.language || 'auto'})`,
    );

    const policy = new RetryPolicy({
      maxAttempts: config.maxRetries + 1,
      baseDelayMs: config.backoffBaseMs,
      sleep: options.sleep,
    });

    // 永久错误时取消其余进行中的请求
    const run = new AbortController();
    const cancel = () => run.abort();
    options.signal?.addEventListener('abort', cancel, { once: true });

    const limit = pLimit(Math.max(1, config.maxConcurrency));
    const results: Draft[][] = clips.map(() => []);
    const failures: ClipFailure[] = [];
    let completed = 0;

    const settled = await Promise.allSettled(
      clips.map((clip, position) =>
        limit(async () => {
          throwIfAborted(run.signal);
          let attempts = 0;
          try {
            const recognized = await policy.execute(
              ({ attempt, signal }) => {
                attempts = attempt;
                return backend.recognize(encodeWav(clip.samples, clip.sampleRate), {
                  language: config.language,
                  prompt: config.prompt,
                  signal,
                });
              },
              {
                signal: run.signal,
                timeoutMs: config.timeoutMs,
                onRetry: (error, attempt, delayMs) =>
                  this.logger.warn(
                    `Clip ${position + 1} attempt ${attempt} failed: ${errorMessage(error)}; retrying in ${delayMs}ms`,
                  ),
              },
            );
            results[position] = this.toGlobalTime(recognized, clip, config.minConfidence ?? 0);
          } catch (error) {
            if (error instanceof AbortedError) {
              throw error;
            }
            if (error instanceof BackendError && !error.isTransient) {
              run.abort();
              throw error;
            }
            this.logger.warn(`Skipping clip ${position + 1} after ${attempts} attempts: ${errorMessage(error)}`);
            failures.push({
              clip: position,
              start: clip.start,
              end: clip.end,
              attempts,
              message: errorMessage(error),
            });
          }
          completed++;
          options.onProgress?.({ stage: 'transcription', completed, total: clips.length });
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

    failures.sort((a, b) => a.clip - b.clip);
    if (failures.length / clips.length > config.maxFailureRatio) {
      throw new TranscriptionFailedError(failures.length, clips.length);
    }

    let drafts = results.flat();
    if (config.filterHallucinations) {
      const before = drafts.length;
      drafts = filterHallucinations(drafts, config.maxRepeat);
      if (drafts.length < before) {
        this.logger.log(`Hallucination filter removed ${before - drafts.length} utterances`);
      }
    }

    const utterances = this.assignIndexes(drafts);
    this.logger.log(
      `Transcription finished: ${utterances.length} utterances, ${failures.length}/${clips.length} clips skipped`,
    );
    return { utterances, failures, clipCount: clips.length };
  }

  private clipLimit(backend: SpeechBackend, config: TranscriberConfig): number {
    const limits = [config.maxSegmentMs, backend.maxClipMs].filter(
      (value): value is number => typeof value === 'number' && value > 0,
    );
    return limits.length > 0 ? Math.min(...limits) : Infinity;
  }

  /**
   * 将超长片段切成首尾相接、互不重叠的子片段
   */
  splitLongSegments(segments: readonly AudioSegment[], maxMs: number): AudioSegment[] {
    const clips: AudioSegment[] = [];
    for (const segment of segments) {
      if (segment.end - segment.start <= maxMs) {
        clips.push(segment);
        continue;
      }
      for (let start = segment.start; start < segment.end; start += maxMs) {
        const end = Math.min(start + maxMs, segment.end);
        const offset = (ms: number) => Math.round(((ms - segment.start) * segment.sampleRate) / 1000);
        clips.push({
          start,
          end,
          sampleRate: segment.sampleRate,
          samples: segment.samples.subarray(offset(start), offset(end)),
        });
      }
    }
    return clips;
  }

  /**
   * 片段内时间 + 片段起点 = 全局时间，并限制在片段范围内
   */
  private toGlobalTime(recognized: RecognizedSpeech[], clip: AudioSegment, minConfidence: number): Draft[] {
    const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

    return recognized
      .map((item) => {
        const start = clamp(clip.start + Math.round(item.start), clip.start, clip.end);
        const end = clamp(clip.start + Math.round(item.end), start, clip.end);
        const draft: Draft = { start, end, text: item.text.trim() };
        if (item.confidence !== undefined) {
          draft.confidence = item.confidence;
        }
        return draft;
      })
      .filter((draft) => draft.text.length > 0 && (draft.confidence ?? 1) >= minConfidence)
      .sort((a, b) => a.start - b.start);
  }

  private assignIndexes(drafts: readonly Draft[]): TimedUtterance[] {
    let previousEnd = 0;
    return drafts.map((draft, index) => {
      const end = Math.max(draft.end, previousEnd);
      previousEnd = end;
      return { ...draft, index, end };
    });
  }
}
