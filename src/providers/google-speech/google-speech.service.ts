import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BackendError, toBackendError } from '../../common/errors/pipeline.errors';
import { isRecord, records, stringField } from '../../common/utils/guards';
import {
  RecognizeOptions,
  RecognizedSpeech,
  SpeechBackend,
} from '../../modules/transcriber/speech-backend.interface';

export interface GoogleWord {
  word: string;
  /** 毫秒 */
  start: number;
  end: number;
}

// 同步识别接口只接受 1 分钟以内的音频
const MAX_CLIP_MS = 59_000;

const LANGUAGE_CODES: Record<string, string> = {
  th: 'th-TH',
  en: 'en-US',
  ja: 'ja-JP',
  zh: 'zh-CN',
};

/**
 * "1.500s" → 1500
 */
export function parseDuration(value: string | undefined): number {
  if (!value) {
    return 0;
  }
  const seconds = parseFloat(value.replace(/s$/, ''));
  return Number.isFinite(seconds) ? Math.round(seconds * 1000) : 0;
}

/**
 * 把逐词时间拼成字幕句：满 12 个词，或至少 5 个词且以标点结尾时断句
 */
export function groupWords(words: readonly GoogleWord[]): RecognizedSpeech[] {
  const segments: RecognizedSpeech[] = [];
  let current: GoogleWord[] = [];

  for (const word of words) {
    current.push(word);
    const endsSentence = /[.!?。！？,，]$/.test(word.word);
    if (current.length >= 12 || (current.length >= 5 && endsSentence)) {
      segments.push(toSegment(current));
      current = [];
    }
  }
  if (current.length > 0) {
    segments.push(toSegment(current));
  }
  return segments;
}

function toSegment(words: readonly GoogleWord[]): RecognizedSpeech {
  return {
    start: words[0].start,
    end: words[words.length - 1].end,
    text: words.map((w) => w.word).join(' '),
  };
}

export function languageCode(language: string | undefined): string {
  if (!language) {
    return 'en-US';
  }
  return LANGUAGE_CODES[language.toLowerCase().split('-')[0]] ?? (language.includes('-') ? language : 'en-US');
}

@Injectable()
export class GoogleSpeechService implements SpeechBackend, OnModuleInit {
  readonly name = 'google';
  readonly maxClipMs = MAX_CLIP_MS;
  private readonly logger = new Logger(GoogleSpeechService.name);
  private apiKey = '';
  private readonly baseUrl = 'https://speech.googleapis.com/v1';

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    this.apiKey = this.configService.get<string>('google.apiKey') || '';
    if (!this.apiKey) {
      this.logger.warn('Google Speech API key not configured');
    } else {
      this.logger.log('Google Speech service initialized');
    }
  }

  isAvailable(): boolean {
    return this.apiKey.length > 0;
  }

  async recognize(audio: Buffer, options: RecognizeOptions): Promise<RecognizedSpeech[]> {
    // WAV 头偏移 24 处为采样率
    const sampleRate = audio.length >= 44 ? audio.readUInt32LE(24) : 16000;
    const durationMs = audio.length > 44 ? Math.round(((audio.length - 44) / 2 / sampleRate) * 1000) : 0;

    const body = {
      config: {
        encoding: 'LINEAR16',
        sampleRateHertz: sampleRate,
        languageCode: languageCode(options.language),
        enableWordTimeOffsets: true,
        enableAutomaticPunctuation: true,
      },
      audio: { content: audio.toString('base64') },
    };

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/speech:recognize?key=${encodeURIComponent(this.apiKey)}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (error) {
      throw toBackendError(error, 'Google Speech');
    }

    if (!response.ok) {
      const error = await response.text();
      throw BackendError.fromStatus(response.status, `Google Speech API error: ${response.status} - ${error}`);
    }

    const segments = this.parseResponse(await response.json(), durationMs);
    this.logger.debug(`Google Speech returned ${segments.length} segments for ${durationMs}ms clip`);
    return segments;
  }

  /**
   * 有逐词时间时按词分句，否则整段文本覆盖整个片段
   */
  parseResponse(json: unknown, durationMs: number): RecognizedSpeech[] {
    const results = isRecord(json) ? records(json.results) : [];
    const words: GoogleWord[] = [];
    const transcripts: string[] = [];

    for (const result of results) {
      const alternative = records(result.alternatives)[0];
      if (!alternative) {
        continue;
      }
      const transcript = stringField(alternative, 'transcript');
      if (transcript) {
        transcripts.push(transcript.trim());
      }
      for (const w of records(alternative.words)) {
        const word = stringField(w, 'word');
        if (word) {
          words.push({
            word,
            start: parseDuration(stringField(w, 'startTime')),
            end: parseDuration(stringField(w, 'endTime')),
          });
        }
      }
    }

    if (words.length > 0) {
      return groupWords(words);
    }
    const text = transcripts.filter(Boolean).join(' ');
    return text ? [{ start: 0, end: durationMs, text }] : [];
  }
}
