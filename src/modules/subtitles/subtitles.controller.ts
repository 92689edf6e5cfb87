import { Body, Controller, Post } from '@nestjs/common';
import { SubtitlesService } from './subtitles.service';
import { MergeSubtitlesDto, MergeSubtitlesResponseDto } from './dto/merge-subtitles.dto';

@Controller('subtitles')
export class SubtitlesController {
  constructor(private readonly subtitlesService: SubtitlesService) {}

  /**
   * POST /api/subtitles/merge
   * 合并两份字幕为双语字幕
   */
  @Post('merge')
  merge(@Body() dto: MergeSubtitlesDto): MergeSubtitlesResponseDto {
    return this.subtitlesService.mergeBilingual(dto.original_content, dto.translated_content);
  }
}
