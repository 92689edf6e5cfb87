import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { JobsRepository } from './jobs.repository';

/**
 * 任务清理服务
 * 定期移除已结束且超过保留时间的任务（字幕文件保留在输出目录）
 */
@Injectable()
export class JobCleanupService {
  private readonly logger = new Logger(JobCleanupService.name);
  private readonly retentionMinutes: number;

  constructor(
    private jobsRepository: JobsRepository,
    private configService: ConfigService,
  ) {
    this.retentionMinutes = this.configService.get<number>('jobs.retentionMinutes') || 60;
  }

  /**
   * 每 5 分钟执行一次
   */
  @Cron(CronExpression.EVERY_5_MINUTES)
  handleCron() {
    this.cleanupFinishedJobs();
  }

  cleanupFinishedJobs(now: Date = new Date()): number {
    const threshold = new Date(now.getTime() - this.retentionMinutes * 60 * 1000);
    const expired = this.jobsRepository.findFinishedBefore(threshold);

    if (expired.length === 0) {
      this.logger.debug('No expired jobs found');
      return 0;
    }

    expired.forEach((job) => this.jobsRepository.delete(job.id));
    this.logger.log(`Removed ${expired.length} finished jobs older than ${this.retentionMinutes} minutes`);
    return expired.length;
  }
}
