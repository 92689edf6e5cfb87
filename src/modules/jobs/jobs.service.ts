import {
  Injectable,
  Logger,
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import configuration from '../../common/config/configuration';
import { AbortedError, PipelineError, errorMessage } from '../../common/errors/pipeline.errors';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { throwIfAborted } from '../../common/utils/retry-policy';
import { FINISHED_STATUSES, Job, JobStatus } from '../../database/entities/job.entity';
import { FfmpegService } from '../../providers/ffmpeg/ffmpeg.service';
import { PipelineService } from '../pipeline/pipeline.service';
import { SubtitleWriterService } from '../pipeline/subtitle-writer.service';
import { PipelineResult, RunConfig } from '../pipeline/pipeline.types';
import { SpeechBackendRegistry } from '../transcriber/speech-backend.registry';
import { TranslationBackendRegistry } from '../translation/translation-backend.registry';
import { CreateJobDto, CreateJobResponseDto } from './dto/create-job.dto';
import { JobResponseDto, SubtitleVariant, SubtitlesResponseDto } from './dto/job.dto';
import { JobPatch, JobsRepository } from './jobs.repository';

type PipelineDefaults = ReturnType<typeof configuration>['pipeline'];

@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);
  private readonly pollInterval: number;
  private readonly outputDir: string;
  // 进行中任务的取消控制器
  private readonly running = new Map<string, AbortController>();

  constructor(
    private jobsRepository: JobsRepository,
    private pipelineService: PipelineService,
    private subtitleWriter: SubtitleWriterService,
    private ffmpegService: FfmpegService,
    private speechBackends: SpeechBackendRegistry,
    private translationBackends: TranslationBackendRegistry,
    private configService: ConfigService,
  ) {
    this.pollInterval = this.configService.get<number>('jobs.pollIntervalSeconds') || 5;
    this.outputDir = this.configService.get<string>('output.dir') || 'output';
  }

  /**
   * 创建任务并在后台开始处理
   */
  createJob(dto: CreateJobDto): CreateJobResponseDto {
    const config = this.buildRunConfig(dto);

    // 1. 校验引擎，凭据缺失在提交时就报错
    try {
      this.speechBackends.get(config.speechEngine);
      this.translationBackends.get(config.translationEngine);
    } catch (error) {
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: errorMessage(error),
      });
    }

    // 2. 创建任务
    const now = new Date().toISOString();
    const job: Job = {
      id: uuidv4(),
      title: dto.title?.trim() || basename(dto.source_path, extname(dto.source_path)),
      source_path: dto.source_path,
      target_language: config.translation.targetLanguage,
      source_language: dto.source_language || null,
      speech_engine: config.speechEngine,
      translation_engine: config.translationEngine,
      status: JobStatus.PENDING,
      progress: null,
      diagnostics: null,
      output: null,
      error: null,
      created_at: now,
      updated_at: now,
      finished_at: null,
    };
    this.jobsRepository.insert(job);

    // 3. 后台执行
    const controller = new AbortController();
    this.running.set(job.id, controller);
    void this.processJob(job, config, controller.signal)
      .catch((error: unknown) => this.logger.error(`Job ${job.id} crashed: ${errorMessage(error)}`))
      .finally(() => this.running.delete(job.id));

    this.logger.log(`Job created: ${job.id} (${job.title})`);

    return {
      job_id: job.id,
      status: JobStatus.PENDING,
      retry_after: this.pollInterval,
    };
  }

  /**
   * 解码 → 流水线 → 写出字幕，结果写回任务
   */
  async processJob(job: Job, config: RunConfig, signal: AbortSignal): Promise<void> {
    this.jobsRepository.update(job.id, { status: JobStatus.PROCESSING });
    this.logger.log(`Processing job ${job.id}: ${job.source_path}`);

    try {
      const audioTrack = await this.ffmpegService.decode(job.source_path, signal);
      const result = await this.pipelineService.run({ audioTrack, title: job.title }, config, {
        signal,
        onProgress: (progress) => this.jobsRepository.update(job.id, { progress }),
      });

      // 取消后不再写文件
      throwIfAborted(signal);
      const written = await this.subtitleWriter.write(result, this.outputDir, config.translation.targetLanguage);

      this.finish(job.id, {
        status: JobStatus.SUCCEEDED,
        diagnostics: this.summarize(result),
        output: { translated_path: written.translatedPath, bilingual_path: written.bilingualPath },
      });
      this.logger.log(`Job ${job.id} succeeded`);
    } catch (error) {
      if (error instanceof AbortedError) {
        this.finish(job.id, {
          status: JobStatus.CANCELLED,
          error: { code: ErrorCode.ABORTED, message: error.message },
        });
        this.logger.warn(`Job ${job.id} cancelled`);
        return;
      }

      const code = error instanceof PipelineError ? error.code : ErrorCode.INTERNAL_ERROR;
      this.finish(job.id, { status: JobStatus.FAILED, error: { code, message: errorMessage(error) } });
      this.logger.error(`Job ${job.id} failed: ${errorMessage(error)}`);
    }
  }

  /**
   * 获取任务详情
   */
  getJob(id: string): JobResponseDto {
    const job = this.findOrThrow(id);
    const response: JobResponseDto = {
      job_id: job.id,
      title: job.title,
      status: job.status,
      target_language: job.target_language,
      speech_engine: job.speech_engine,
      translation_engine: job.translation_engine,
      progress: job.progress,
      diagnostics: job.diagnostics,
      output: job.output,
      error: job.error,
      created_at: job.created_at,
      finished_at: job.finished_at,
    };
    if (!FINISHED_STATUSES.includes(job.status)) {
      response.retry_after = this.pollInterval;
    }
    return response;
  }

  /**
   * 读取已生成的字幕文件
   */
  async getSubtitles(id: string, variant: SubtitleVariant): Promise<SubtitlesResponseDto> {
    const job = this.findOrThrow(id);
    if (job.status !== JobStatus.SUCCEEDED || !job.output) {
      throw new ConflictException({
        code: ErrorCode.CONFLICT,
        message: `Job ${id} has no subtitles (status: ${job.status})`,
      });
    }

    const path = variant === 'translated' ? job.output.translated_path : job.output.bilingual_path;
    try {
      return { job_id: id, variant, content: await readFile(path, 'utf-8') };
    } catch (error) {
      this.logger.error(`Failed to read subtitles ${path}: ${errorMessage(error)}`);
      throw new NotFoundException({
        code: ErrorCode.NOT_FOUND,
        message: `Subtitle file for job ${id} is no longer available`,
      });
    }
  }

  /**
   * 取消进行中的任务
   */
  cancelJob(id: string): JobResponseDto {
    const job = this.findOrThrow(id);
    if (FINISHED_STATUSES.includes(job.status)) {
      throw new ConflictException({
        code: ErrorCode.CONFLICT,
        message: `Job ${id} already ${job.status}`,
      });
    }

    this.running.get(id)?.abort();
    this.finish(id, {
      status: JobStatus.CANCELLED,
      error: { code: ErrorCode.ABORTED, message: new AbortedError().message },
    });
    this.logger.log(`Job ${id} cancellation requested`);
    return this.getJob(id);
  }

  /**
   * 系统默认参数 + 请求覆盖，构造本次运行的配置
   */
  buildRunConfig(dto: CreateJobDto): RunConfig {
    const defaults = this.configService.getOrThrow<PipelineDefaults>('pipeline');
    return {
      speechEngine: dto.speech_engine || defaults.speechEngine,
      translationEngine: dto.translation_engine || defaults.translationEngine,
      useVad: dto.use_vad ?? defaults.useVad,
      segmenter: { ...defaults.segmenter },
      transcriber: {
        ...defaults.transcriber,
        language: dto.source_language || undefined,
        prompt: dto.prompt || undefined,
      },
      translation: {
        ...defaults.translation,
        targetLanguage: dto.target_language || defaults.targetLanguage,
        sourceLanguage: dto.source_language || undefined,
        batchSize: dto.batch_size ?? defaults.translation.batchSize,
        contextLines: dto.context_lines ?? defaults.translation.contextLines,
        lineFallback: dto.line_fallback ?? defaults.translation.lineFallback,
      },
      subtitles: { ...defaults.subtitles },
    };
  }

  private summarize(result: PipelineResult): Job['diagnostics'] {
    const { diagnostics } = result;
    return {
      segment_count: diagnostics.segmentCount,
      clip_count: diagnostics.clipCount,
      cue_count: result.cues.bilingual.length,
      skipped_clips: diagnostics.transcriptionFailures.length,
      fallback_batches: diagnostics.translationFallbacks.length,
      degraded: diagnostics.degraded,
    };
  }

  /**
   * 写入终态；已取消的任务不再被覆盖
   */
  private finish(id: string, patch: JobPatch): void {
    const current = this.jobsRepository.findById(id);
    if (!current || current.status === JobStatus.CANCELLED) {
      return;
    }
    this.jobsRepository.update(id, { ...patch, finished_at: new Date().toISOString() });
  }

  private findOrThrow(id: string): Job {
    const job = this.jobsRepository.findById(id);
    if (!job) {
      throw new NotFoundException({
        code: ErrorCode.NOT_FOUND,
        message: 'Job not found',
      });
    }
    return job;
  }
}
