import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { ConfigModule } from '@nestjs/config';
import configuration from './common/config/configuration';

// Providers
import { OpenAIModule } from './providers/openai/openai.module';
import { DeepgramModule } from './providers/deepgram/deepgram.module';
import { GoogleSpeechModule } from './providers/google-speech/google-speech.module';
import { FfmpegModule } from './providers/ffmpeg/ffmpeg.module';

// Business Modules
import { PipelineModule } from './modules/pipeline/pipeline.module';
import { SubtitlesModule } from './modules/subtitles/subtitles.module';
import { JobsModule } from './modules/jobs/jobs.module';

@Module({
  imports: [
    // Config
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    }),

    // Schedule (定时任务)
    ScheduleModule.forRoot(),

    // Providers
    OpenAIModule,
    DeepgramModule,
    GoogleSpeechModule,
    FfmpegModule,

    // Business Modules
    PipelineModule,
    SubtitlesModule,
    JobsModule,
  ],
})
export class AppModule {}
