import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { BackendError, errorMessage } from '../../common/errors/pipeline.errors';
import { NumberedLine, formatNumberedLines } from '../../modules/translation/numbered-lines';
import { CompleteOptions, TranslationBackend } from '../../modules/translation/translation-backend.interface';

/**
 * 将 OpenAI SDK 异常转换为 BackendError
 * 额度耗尽（insufficient_quota）虽然是 429，但重试无意义
 */
export function toOpenAIBackendError(error: unknown): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  if (error instanceof OpenAI.APIError) {
    if (error.code === 'insufficient_quota') {
      return BackendError.permanent(`OpenAI quota exhausted: ${error.message}`, error.status);
    }
    if (error.status === undefined) {
      return BackendError.transient(`OpenAI connection error: ${error.message}`);
    }
    return BackendError.fromStatus(error.status, `OpenAI API error: ${error.status} - ${error.message}`);
  }
  return BackendError.transient(`OpenAI request failed: ${errorMessage(error)}`);
}

/**
 * 基于 Chat Completions 的字幕翻译
 */
@Injectable()
export class OpenAIService implements TranslationBackend {
  readonly name = 'openai';
  private readonly logger = new Logger(OpenAIService.name);
  private readonly client: OpenAI | null = null;
  private readonly model: string;

  constructor(private configService: ConfigService) {
    const apiKey = this.configService.get<string>('openai.apiKey');
    this.model = this.configService.get<string>('openai.translationModel') || 'gpt-4o';
    if (apiKey) {
      this.client = new OpenAI({
        apiKey,
        baseURL: this.configService.get<string>('openai.baseUrl') || undefined,
        maxRetries: 0,
      });
      this.logger.log('OpenAI client initialized');
    } else {
      this.logger.warn('OPENAI_API_KEY not configured, translation will be unavailable');
    }
  }

  /**
   * 检查 OpenAI 服务是否可用
   */
  isAvailable(): boolean {
    return this.client !== null;
  }

  async complete(prompt: string, lines: readonly NumberedLine[], options: CompleteOptions): Promise<string> {
    if (!this.client) {
      throw BackendError.permanent('OpenAI service not available. Please configure OPENAI_API_KEY.');
    }

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: prompt },
            { role: 'user', content: formatNumberedLines(lines) },
          ],
          temperature: 0.3,
        },
        { signal: options.signal },
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw BackendError.transient('Empty response from OpenAI');
      }

      this.logger.debug(`Translated ${lines.length} lines, tokens: ${response.usage?.total_tokens ?? 'unknown'}`);
      return content;
    } catch (error) {
      throw toOpenAIBackendError(error);
    }
  }
}
