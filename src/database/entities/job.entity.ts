import { PipelineStage } from '../../common/interfaces/subtitle.interface';

/**
 * 任务状态枚举
 */
export enum JobStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export const FINISHED_STATUSES: readonly JobStatus[] = [JobStatus.SUCCEEDED, JobStatus.FAILED, JobStatus.CANCELLED];

export interface JobProgress {
  stage: PipelineStage;
  completed: number;
  total: number;
}

/**
 * 运行诊断（完成后回填）
 */
export interface JobDiagnostics {
  segment_count: number;
  clip_count: number;
  cue_count: number;
  skipped_clips: number;
  fallback_batches: number;
  degraded: boolean;
}

export interface JobOutput {
  translated_path: string;
  bilingual_path: string;
}

/**
 * 字幕任务（内存中保存，进程重启即丢失）
 */
export interface Job {
  id: string; // uuid
  title: string;
  source_path: string;
  target_language: string;
  source_language: string | null;
  speech_engine: string;
  translation_engine: string;
  status: JobStatus;
  progress: JobProgress | null;
  diagnostics: JobDiagnostics | null;
  output: JobOutput | null;
  error: { code: string; message: string } | null;
  created_at: string;
  updated_at: string;
  finished_at: string | null;
}
