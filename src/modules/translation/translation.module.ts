import { Module } from '@nestjs/common';
import { OpenAIService } from '../../providers/openai/openai.service';
import { TRANSLATION_BACKENDS, TranslationBackend } from './translation-backend.interface';
import { TranslationBackendRegistry } from './translation-backend.registry';
import { TranslationBatcherService } from './translation-batcher.service';

@Module({
  providers: [
    {
      provide: TRANSLATION_BACKENDS,
      useFactory: (openai: OpenAIService): TranslationBackend[] => [openai],
      inject: [OpenAIService],
    },
    TranslationBackendRegistry,
    TranslationBatcherService,
  ],
  exports: [TranslationBackendRegistry, TranslationBatcherService],
})
export class TranslationModule {}
