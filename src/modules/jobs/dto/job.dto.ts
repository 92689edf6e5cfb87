import { IsIn, IsOptional } from 'class-validator';
import { JobDiagnostics, JobOutput, JobProgress } from '../../../database/entities/job.entity';

export const SUBTITLE_VARIANTS = ['bilingual', 'translated'] as const;
export type SubtitleVariant = (typeof SUBTITLE_VARIANTS)[number];

export class GetSubtitlesQueryDto {
  @IsIn(SUBTITLE_VARIANTS)
  @IsOptional()
  variant?: SubtitleVariant = 'bilingual';
}

export interface JobResponseDto {
  job_id: string;
  title: string;
  status: string;
  target_language: string;
  speech_engine: string;
  translation_engine: string;
  progress: JobProgress | null;
  diagnostics: JobDiagnostics | null;
  output: JobOutput | null;
  error: { code: string; message: string } | null;
  retry_after?: number;
  created_at: string;
  finished_at: string | null;
}

export interface SubtitlesResponseDto {
  job_id: string;
  variant: SubtitleVariant;
  content: string;
}
