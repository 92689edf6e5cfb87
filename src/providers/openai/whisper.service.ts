import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI, { toFile } from 'openai';
import { BackendError } from '../../common/errors/pipeline.errors';
import { isRecord, numberField, records, stringField } from '../../common/utils/guards';
import {
  RecognizeOptions,
  RecognizedSpeech,
  SpeechBackend,
} from '../../modules/transcriber/speech-backend.interface';
import { toOpenAIBackendError } from './openai.service';

/**
 * OpenAI Whisper 语音识别（verbose_json，按 segment 返回时间戳）
 */
@Injectable()
export class WhisperService implements SpeechBackend {
  readonly name = 'whisper';
  // 接口限制单文件 25MB，16kHz 单声道 WAV 约 13 分钟
  readonly maxClipMs = 10 * 60 * 1000;
  private readonly logger = new Logger(WhisperService.name);
  private readonly client: OpenAI | null = null;
  private readonly model: string;

  constructor(private configService: ConfigService) {
    const apiKey = this.configService.get<string>('openai.apiKey');
    this.model = this.configService.get<string>('openai.transcriptionModel') || 'whisper-1';
    if (apiKey) {
      this.client = new OpenAI({
        apiKey,
        baseURL: this.configService.get<string>('openai.baseUrl') || undefined,
        maxRetries: 0,
      });
    } else {
      this.logger.warn('OPENAI_API_KEY not configured, Whisper backend disabled');
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async recognize(audio: Buffer, options: RecognizeOptions): Promise<RecognizedSpeech[]> {
    if (!this.client) {
      throw BackendError.permanent('Whisper backend not available. Please configure OPENAI_API_KEY.');
    }

    let response: unknown;
    try {
      const file = await toFile(audio, 'clip.wav', { type: 'audio/wav' });
      response = await this.client.audio.transcriptions.create(
        {
          file,
          model: this.model,
          response_format: 'verbose_json',
          timestamp_granularities: ['segment'],
          ...(options.language ? { language: options.language } : {}),
          ...(options.prompt ? { prompt: options.prompt } : {}),
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw toOpenAIBackendError(error);
    }

    return parseVerboseTranscription(response);
  }
}

/**
 * 解析 verbose_json 响应（秒 → 毫秒）
 * confidence 取 1 - no_speech_prob；没有 segments 时用整段文本兜底
 */
export function parseVerboseTranscription(response: unknown): RecognizedSpeech[] {
  if (!isRecord(response)) {
    return [];
  }

  const segments = records(response.segments).flatMap((segment) => {
    const start = numberField(segment, 'start');
    const end = numberField(segment, 'end');
    const text = stringField(segment, 'text');
    if (start === undefined || end === undefined || text === undefined) {
      return [];
    }
    const noSpeech = numberField(segment, 'no_speech_prob');
    return [
      {
        start: Math.round(start * 1000),
        end: Math.round(end * 1000),
        text,
        ...(noSpeech !== undefined ? { confidence: 1 - noSpeech } : {}),
      },
    ];
  });
  if (segments.length > 0) {
    return segments;
  }

  const text = stringField(response, 'text')?.trim();
  const duration = numberField(response, 'duration');
  if (text && duration !== undefined) {
    return [{ start: 0, end: Math.round(duration * 1000), text }];
  }
  return [];
}
