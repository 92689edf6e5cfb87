import { Module } from '@nestjs/common';
import { WhisperService } from '../../providers/openai/whisper.service';
import { DeepgramService } from '../../providers/deepgram/deepgram.service';
import { GoogleSpeechService } from '../../providers/google-speech/google-speech.service';
import { SPEECH_BACKENDS, SpeechBackend } from './speech-backend.interface';
import { SpeechBackendRegistry } from './speech-backend.registry';
import { TranscriberService } from './transcriber.service';

@Module({
  providers: [
    {
      provide: SPEECH_BACKENDS,
      useFactory: (whisper: WhisperService, deepgram: DeepgramService, google: GoogleSpeechService): SpeechBackend[] => [
        whisper,
        deepgram,
        google,
      ],
      inject: [WhisperService, DeepgramService, GoogleSpeechService],
    },
    SpeechBackendRegistry,
    TranscriberService,
  ],
  exports: [SpeechBackendRegistry, TranscriberService],
})
export class TranscriberModule {}
