import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BackendError, toBackendError } from '../../common/errors/pipeline.errors';
import { isRecord, numberField, records, stringField } from '../../common/utils/guards';
import {
  RecognizeOptions,
  RecognizedSpeech,
  SpeechBackend,
} from '../../modules/transcriber/speech-backend.interface';

export interface DeepgramWord {
  word: string;
  start: number;
  end: number;
  confidence: number;
  punctuated_word?: string;
}

// Deepgram utterance（按语义分段的结果）
export interface DeepgramUtterance {
  start: number;
  end: number;
  confidence: number;
  transcript: string;
}

export interface DeepgramResult {
  duration: number;
  // utterances 是按语义分段的结果，比 words 更适合做字幕
  utterances: DeepgramUtterance[];
  words: DeepgramWord[];
}

// 词之间超过该间隔（秒）时另起一句
const TIME_GAP_THRESHOLD = 1.0;

@Injectable()
export class DeepgramService implements SpeechBackend, OnModuleInit {
  readonly name = 'deepgram';
  private readonly logger = new Logger(DeepgramService.name);
  private apiKey = '';
  private model = 'nova-3';
  private readonly baseUrl = 'https://api.deepgram.com/v1';

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    this.apiKey = this.configService.get<string>('deepgram.apiKey') || '';
    this.model = this.configService.get<string>('deepgram.model') || 'nova-3';
    if (!this.apiKey) {
      this.logger.warn('Deepgram API key not configured');
    } else {
      this.logger.log('Deepgram service initialized');
    }
  }

  isAvailable(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * 同步转录一段 WAV 音频
   */
  async recognize(audio: Buffer, options: RecognizeOptions): Promise<RecognizedSpeech[]> {
    const params = new URLSearchParams({
      model: this.model,
      punctuate: 'true', // 添加标点
      utterances: 'true', // 返回语义分段
    });

    if (options.language) {
      params.set('language', options.language);
    } else {
      params.set('detect_language', 'true'); // 自动检测语言
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/listen?${params.toString()}`, {
        method: 'POST',
        headers: {
          Authorization: `Token ${this.apiKey}`,
          'Content-Type': 'audio/wav',
        },
        body: audio,
        signal: options.signal,
      });
    } catch (error) {
      throw toBackendError(error, 'Deepgram');
    }

    if (!response.ok) {
      const error = await response.text();
      throw BackendError.fromStatus(response.status, `Deepgram API error: ${response.status} - ${error}`);
    }

    const result = this.parseResponse(await response.json());

    this.logger.debug(
      `Deepgram response: duration=${result.duration}s, ` +
        `utterances=${result.utterances.length}, words=${result.words.length}`,
    );

    return this.extractSegments(result);
  }

  /**
   * duration 在 metadata 中，channels 和 utterances 在 results 中
   */
  parseResponse(json: unknown): DeepgramResult {
    const root = isRecord(json) ? json : {};
    const metadata = isRecord(root.metadata) ? root.metadata : {};
    const results = isRecord(root.results) ? root.results : {};

    const utterances = records(results.utterances).flatMap((u) => {
      const start = numberField(u, 'start');
      const end = numberField(u, 'end');
      const transcript = stringField(u, 'transcript');
      if (start === undefined || end === undefined || transcript === undefined) {
        return [];
      }
      return [{ start, end, transcript, confidence: numberField(u, 'confidence') ?? 1 }];
    });

    const channel = records(results.channels)[0];
    const alternative = channel ? records(channel.alternatives)[0] : undefined;
    const words = (alternative ? records(alternative.words) : []).flatMap((w) => {
      const word = stringField(w, 'word');
      const start = numberField(w, 'start');
      const end = numberField(w, 'end');
      if (word === undefined || start === undefined || end === undefined) {
        return [];
      }
      return [
        {
          word,
          start,
          end,
          confidence: numberField(w, 'confidence') ?? 1,
          punctuated_word: stringField(w, 'punctuated_word'),
        },
      ];
    });

    return { duration: numberField(metadata, 'duration') ?? 0, utterances, words };
  }

  /**
   * 从 Deepgram 结果提取片段（秒 → 毫秒）
   * 优先使用 utterances（按语义分段），fallback 到 words
   */
  extractSegments(result: DeepgramResult): RecognizedSpeech[] {
    if (result.utterances.length > 0) {
      return result.utterances.map((utterance) => ({
        start: Math.round(utterance.start * 1000),
        end: Math.round(utterance.end * 1000),
        text: utterance.transcript,
        confidence: utterance.confidence,
      }));
    }

    // Fallback: 按时间间隔把 words 拼成句子
    const segments: RecognizedSpeech[] = [];
    let current: { start: number; end: number; words: string[]; confidence: number[] } | null = null;

    const flush = () => {
      if (current) {
        segments.push({
          start: Math.round(current.start * 1000),
          end: Math.round(current.end * 1000),
          text: current.words.join(' '),
          confidence: current.confidence.reduce((sum, c) => sum + c, 0) / current.confidence.length,
        });
      }
    };

    for (const word of result.words) {
      const wordText = word.punctuated_word || word.word;
      if (!current || word.start - current.end > TIME_GAP_THRESHOLD) {
        flush();
        current = { start: word.start, end: word.end, words: [wordText], confidence: [word.confidence] };
      } else {
        current.end = word.end;
        current.words.push(wordText);
        current.confidence.push(word.confidence);
      }
    }
    flush();

    if (result.words.length > 0) {
      this.logger.debug(`Built ${segments.length} segments from ${result.words.length} words`);
    }
    return segments;
  }
}
