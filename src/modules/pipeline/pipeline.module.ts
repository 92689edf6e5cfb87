import { Module } from '@nestjs/common';
import { SegmenterModule } from '../segmenter/segmenter.module';
import { TranscriberModule } from '../transcriber/transcriber.module';
import { TranslationModule } from '../translation/translation.module';
import { SubtitlesModule } from '../subtitles/subtitles.module';
import { PipelineService } from './pipeline.service';
import { SubtitleWriterService } from './subtitle-writer.service';

@Module({
  imports: [SegmenterModule, TranscriberModule, TranslationModule, SubtitlesModule],
  providers: [PipelineService, SubtitleWriterService],
  exports: [PipelineService, SubtitleWriterService, TranscriberModule, TranslationModule],
})
export class PipelineModule {}
