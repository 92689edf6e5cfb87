/**
 * 语音识别结果，时间相对于传入的音频片段（毫秒）
 */
export interface RecognizedSpeech {
  start: number;
  end: number;
  text: string;
  confidence?: number;
}

export interface RecognizeOptions {
  /** 源语言（ISO 639-1），不传则由服务自动检测 */
  language?: string;
  /** 提示词（仅部分服务支持） */
  prompt?: string;
  signal?: AbortSignal;
}

/**
 * 语音识别服务
 * Whisper、Deepgram、Google 等实现可互换，由任务配置按 name 选择
 */
export interface SpeechBackend {
  readonly name: string;
  /** 单次请求允许的最大音频时长 */
  readonly maxClipMs?: number;
  isAvailable(): boolean;
  /**
   * @param audio WAV 格式音频
   * @throws BackendError
   */
  recognize(audio: Buffer, options: RecognizeOptions): Promise<RecognizedSpeech[]>;
}

export const SPEECH_BACKENDS = Symbol('SPEECH_BACKENDS');
