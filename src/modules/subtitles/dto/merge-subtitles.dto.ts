import { IsNotEmpty, IsString } from 'class-validator';

export class MergeSubtitlesDto {
  /** 原文字幕（SRT / VTT 内容），显示在下方 */
  @IsString()
  @IsNotEmpty()
  original_content!: string;

  /** 译文字幕，显示在上方 */
  @IsString()
  @IsNotEmpty()
  translated_content!: string;
}

export interface MergeSubtitlesResponseDto {
  content: string;
  cues: number;
}
