import { Module } from '@nestjs/common';
import { SubtitlesController } from './subtitles.controller';
import { SubtitlesService } from './subtitles.service';
import { SubtitleAssemblerService } from './subtitle-assembler.service';

@Module({
  controllers: [SubtitlesController],
  providers: [SubtitlesService, SubtitleAssemblerService],
  exports: [SubtitlesService, SubtitleAssemblerService],
})
export class SubtitlesModule {}
