import { Injectable, Logger } from '@nestjs/common';
import { AudioSegment, AudioTrack } from '../../common/interfaces/subtitle.interface';
import { DecodeError } from '../../common/errors/pipeline.errors';

/**
 * VAD 参数
 */
export interface SegmenterConfig {
  /** 能量低于该值（dBFS）的帧视为静音 */
  silenceThresholdDb: number;
  /** 短于该时长的语音区间丢弃 */
  minSpeechDurationMs: number;
  /** 两段语音之间的静音短于该时长则合并 */
  minSilenceGapMs: number;
  /** 每段前后补齐的时长，避免切掉词头词尾 */
  paddingMs: number;
  /** 分帧长度，默认 20ms */
  frameMs?: number;
}

interface Interval {
  start: number;
  end: number;
}

const DEFAULT_FRAME_MS = 20;

@Injectable()
export class VadService {
  private readonly logger = new Logger(VadService.name);

  /**
   * 将音轨切分为语音区间
   * 全静音返回空数组，全语音返回覆盖整条音轨的单个区间
   */
  segment(track: AudioTrack, config: SegmenterConfig): AudioSegment[] {
    this.validate(track);

    const durationMs = this.toMs(track.samples.length, track.sampleRate);
    const speech = this.detectSpeechFrames(track, config);
    const kept = speech.filter((iv) => iv.end - iv.start >= config.minSpeechDurationMs);
    const merged = this.mergeCloseIntervals(kept, config.minSilenceGapMs);
    const padded = this.pad(merged, config.paddingMs, durationMs);

    const segments = padded.map((iv) => ({
      start: iv.start,
      end: iv.end,
      sampleRate: track.sampleRate,
      samples: track.samples.subarray(
        Math.round((iv.start * track.sampleRate) / 1000),
        Math.round((iv.end * track.sampleRate) / 1000),
      ),
    }));

    this.logger.log(
      `VAD: ${speech.length} raw intervals -> ${segments.length} speech segments ` +
        `(track ${(durationMs / 1000).toFixed(1)}s)`,
    );
    return segments;
  }

  private validate(track: AudioTrack): void {
    if (!Number.isFinite(track.sampleRate) || track.sampleRate <= 0) {
      throw new DecodeError(`Invalid sample rate: ${track.sampleRate}`);
    }
    if (!(track.samples instanceof Float32Array)) {
      throw new DecodeError('Audio samples are not decoded PCM');
    }
    for (let i = 0; i < track.samples.length; i++) {
      if (!Number.isFinite(track.samples[i])) {
        throw new DecodeError(`Corrupt sample at offset ${i}`);
      }
    }
  }

  /**
   * 按帧计算 RMS 能量，合并连续的语音帧
   */
  private detectSpeechFrames(track: AudioTrack, config: SegmenterConfig): Interval[] {
    const { samples, sampleRate } = track;
    const frameSize = Math.max(1, Math.round((sampleRate * (config.frameMs ?? DEFAULT_FRAME_MS)) / 1000));
    const intervals: Interval[] = [];
    let open: number | null = null;

    for (let from = 0; from < samples.length; from += frameSize) {
      const to = Math.min(from + frameSize, samples.length);
      let sumSquares = 0;
      for (let i = from; i < to; i++) {
        sumSquares += samples[i] * samples[i];
      }
      const rms = Math.sqrt(sumSquares / (to - from));
      const db = rms > 0 ? 20 * Math.log10(rms) : -Infinity;
      const isSpeech = db >= config.silenceThresholdDb;

      if (isSpeech && open === null) {
        open = from;
      } else if (!isSpeech && open !== null) {
        intervals.push({ start: this.toMs(open, sampleRate), end: this.toMs(from, sampleRate) });
        open = null;
      }
    }

    if (open !== null) {
      intervals.push({ start: this.toMs(open, sampleRate), end: this.toMs(samples.length, sampleRate) });
    }
    return intervals;
  }

  private mergeCloseIntervals(intervals: Interval[], minSilenceGapMs: number): Interval[] {
    const merged: Interval[] = [];
    for (const iv of intervals) {
      const last = merged[merged.length - 1];
      if (last && iv.start - last.end < minSilenceGapMs) {
        last.end = iv.end;
      } else {
        merged.push({ ...iv });
      }
    }
    return merged;
  }

  /**
   * 补齐并裁剪到音轨边界；补齐后与前一段重叠时从前一段结尾开始
   */
  private pad(intervals: Interval[], paddingMs: number, durationMs: number): Interval[] {
    const padded: Interval[] = [];
    for (const iv of intervals) {
      const previous = padded[padded.length - 1];
      const start = Math.max(0, iv.start - paddingMs, previous ? previous.end : 0);
      const end = Math.min(durationMs, iv.end + paddingMs);
      if (end > start) {
        padded.push({ start, end });
      }
    }
    return padded;
  }

  private toMs(sampleOffset: number, sampleRate: number): number {
    return Math.round((sampleOffset * 1000) / sampleRate);
  }
}
