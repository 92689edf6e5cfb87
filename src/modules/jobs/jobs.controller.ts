import { Controller, Get, Post, Body, Param, Query, HttpCode, HttpStatus } from '@nestjs/common';
import { JobsService } from './jobs.service';
import { CreateJobDto, CreateJobResponseDto } from './dto/create-job.dto';
import { GetSubtitlesQueryDto, JobResponseDto, SubtitlesResponseDto } from './dto/job.dto';

@Controller('jobs')
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  /**
   * POST /api/jobs
   * 创建字幕任务
   */
  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  createJob(@Body() dto: CreateJobDto): CreateJobResponseDto {
    return this.jobsService.createJob(dto);
  }

  /**
   * GET /api/jobs/:id
   * 获取任务状态
   */
  @Get(':id')
  getJob(@Param('id') id: string): JobResponseDto {
    return this.jobsService.getJob(id);
  }

  /**
   * GET /api/jobs/:id/subtitles?variant=bilingual|translated
   * 获取生成的 SRT
   */
  @Get(':id/subtitles')
  async getSubtitles(@Param('id') id: string, @Query() query: GetSubtitlesQueryDto): Promise<SubtitlesResponseDto> {
    return this.jobsService.getSubtitles(id, query.variant ?? 'bilingual');
  }

  /**
   * POST /api/jobs/:id/cancel
   */
  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  cancelJob(@Param('id') id: string): JobResponseDto {
    return this.jobsService.cancelJob(id);
  }
}
