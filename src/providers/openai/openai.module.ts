import { Global, Module } from '@nestjs/common';
import { OpenAIService } from './openai.service';
import { WhisperService } from './whisper.service';

@Global()
@Module({
  providers: [OpenAIService, WhisperService],
  exports: [OpenAIService, WhisperService],
})
export class OpenAIModule {}
