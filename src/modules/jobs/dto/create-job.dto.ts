import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsBoolean,
  IsInt,
  Min,
  Max,
} from 'class-validator';

export class CreateJobDto {
  /** 服务器本地的音频 / 视频文件路径 */
  @IsString()
  @IsNotEmpty()
  source_path!: string;

  @IsString()
  @IsOptional()
  title?: string;

  /** 不传时使用 DEFAULT_TARGET_LANGUAGE */
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  target_language?: string;

  /** 不传时由语音识别自动检测 */
  @IsString()
  @IsOptional()
  source_language?: string;

  @IsString()
  @IsOptional()
  speech_engine?: string;

  @IsString()
  @IsOptional()
  translation_engine?: string;

  @IsBoolean()
  @IsOptional()
  use_vad?: boolean;

  @IsInt()
  @Min(1)
  @Max(100)
  @IsOptional()
  batch_size?: number;

  @IsInt()
  @Min(0)
  @Max(20)
  @IsOptional()
  context_lines?: number;

  @IsBoolean()
  @IsOptional()
  line_fallback?: boolean;

  /** 传给语音识别的提示词（专有名词等） */
  @IsString()
  @IsOptional()
  prompt?: string;
}

export class CreateJobResponseDto {
  job_id!: string;
  status!: string;
  retry_after!: number;
}
