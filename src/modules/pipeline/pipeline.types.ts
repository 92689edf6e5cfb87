import {
  AssembledCues,
  AudioTrack,
  ProgressListener,
  TimedUtterance,
  TranslationUnit,
} from '../../common/interfaces/subtitle.interface';
import { SleepFn } from '../../common/utils/retry-policy';
import { SegmenterConfig } from '../segmenter/vad.service';
import { ClipFailure, TranscriberConfig } from '../transcriber/transcriber.service';
import { BatchFallback, TranslationConfig } from '../translation/translation-batcher.service';
import { AssemblerConfig } from '../subtitles/subtitle-assembler.service';

/**
 * 单次运行的完整配置，运行开始时构造一次并向下传递
 */
export interface RunConfig {
  speechEngine: string;
  translationEngine: string;
  /** 关闭时整条音轨作为一个片段送去识别 */
  useVad: boolean;
  segmenter: SegmenterConfig;
  transcriber: TranscriberConfig;
  translation: TranslationConfig;
  subtitles: AssemblerConfig;
}

export interface PipelineInput {
  audioTrack: AudioTrack;
  title: string;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: ProgressListener;
  sleep?: SleepFn;
  random?: () => number;
}

export interface RunDiagnostics {
  segmentCount: number;
  clipCount: number;
  transcriptionFailures: ClipFailure[];
  translationFallbacks: BatchFallback[];
  /** 有片段被跳过或批次保留原文 */
  degraded: boolean;
}

export interface PipelineResult {
  title: string;
  cues: AssembledCues;
  utterances: readonly TimedUtterance[];
  units: readonly TranslationUnit[];
  diagnostics: RunDiagnostics;
}

export interface WrittenSubtitles {
  translatedPath: string;
  bilingualPath: string;
}
