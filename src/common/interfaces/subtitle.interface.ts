/**
 * 流水线各阶段之间传递的数据结构
 * 时间统一为毫秒（整数），阶段之间只传递不可变数组
 */

/**
 * 解码后的音轨（单声道 PCM，取值范围 [-1, 1]）
 */
export interface AudioTrack {
  sampleRate: number;
  samples: Float32Array;
}

/**
 * VAD 切出的语音区间
 * samples 是原音轨的视图（subarray），不复制数据
 */
export interface AudioSegment {
  start: number;
  end: number;
  sampleRate: number;
  samples: Float32Array;
}

/**
 * 带时间戳的转录句子
 * index 为全局顺序（0 起，连续）
 */
export interface TimedUtterance {
  index: number;
  start: number;
  end: number;
  text: string;
  confidence?: number;
}

/**
 * 翻译单元，与 TimedUtterance 一一对应
 */
export interface TranslationUnit {
  index: number;
  sourceText: string;
  translatedText?: string;
}

/**
 * 字幕条目
 */
export interface SubtitleCue {
  start: number;
  end: number;
  translatedLine?: string;
  originalLine: string;
}

export interface AssembledCues {
  translatedOnly: readonly SubtitleCue[];
  bilingual: readonly SubtitleCue[];
}

export type PipelineStage = 'segmentation' | 'transcription' | 'translation' | 'assembly';

/**
 * 进度回调事件（每完成一个片段 / 批次触发一次）
 */
export interface PipelineProgress {
  stage: PipelineStage;
  completed: number;
  total: number;
}

export type ProgressListener = (progress: PipelineProgress) => void;
