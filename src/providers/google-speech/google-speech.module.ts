import { Module, Global } from '@nestjs/common';
import { GoogleSpeechService } from './google-speech.service';

@Global()
@Module({
  providers: [GoogleSpeechService],
  exports: [GoogleSpeechService],
})
export class GoogleSpeechModule {}
