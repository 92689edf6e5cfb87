const int = (value: string | undefined, fallback: number): number => {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export default () => ({
  port: int(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',

  openai: {
    apiKey: process.env.OPENAI_API_KEY,
    baseUrl: process.env.OPENAI_BASE_URL,
    transcriptionModel: process.env.OPENAI_TRANSCRIPTION_MODEL || 'whisper-1',
    translationModel: process.env.OPENAI_MODEL || 'gpt-4o',
  },

  deepgram: {
    apiKey: process.env.DEEPGRAM_API_KEY,
    model: process.env.DEEPGRAM_MODEL || 'nova-3',
  },

  google: {
    apiKey: process.env.GOOGLE_SPEECH_API_KEY,
  },

  ffmpeg: {
    path: process.env.FFMPEG_PATH || 'ffmpeg',
  },

  output: {
    dir: process.env.OUTPUT_DIR || 'output',
  },

  // 流水线默认参数，单次任务可覆盖
  pipeline: {
    speechEngine: process.env.SPEECH_ENGINE || 'whisper',
    translationEngine: process.env.TRANSLATION_ENGINE || 'openai',
    targetLanguage: process.env.DEFAULT_TARGET_LANGUAGE || 'Simplified Chinese',
    useVad: process.env.USE_VAD !== 'false',
    segmenter: {
      silenceThresholdDb: int(process.env.VAD_SILENCE_THRESHOLD_DB, -40),
      minSpeechDurationMs: 250,
      minSilenceGapMs: int(process.env.VAD_MIN_SILENCE_MS, 1000),
      paddingMs: 200,
      frameMs: 20,
    },
    transcriber: {
      maxConcurrency: int(process.env.TRANSCRIBE_CONCURRENCY, 5),
      maxRetries: 2,
      backoffBaseMs: 1000,
      timeoutMs: 120_000,
      maxSegmentMs: 10 * 60 * 1000,
      maxFailureRatio: 0.5,
      minConfidence: 0.1,
      filterHallucinations: true,
      maxRepeat: 5,
    },
    translation: {
      batchSize: int(process.env.TRANSLATION_BATCH_SIZE, 15),
      maxRetries: 3,
      backoffBaseMs: 1000,
      timeoutMs: 90_000,
      maxConcurrency: int(process.env.TRANSLATION_CONCURRENCY, 3),
      contextLines: 0,
      lineFallback: false,
    },
    subtitles: {
      minCueDurationMs: 1000,
      maxLineLength: 42,
      minGapMs: 40,
    },
  },

  jobs: {
    retentionMinutes: int(process.env.JOB_RETENTION_MINUTES, 60),
    pollIntervalSeconds: 5,
  },
});
