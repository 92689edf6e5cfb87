import { Injectable } from '@nestjs/common';
import { FINISHED_STATUSES, Job } from '../../database/entities/job.entity';

export type JobPatch = Partial<Omit<Job, 'id' | 'created_at'>>;

/**
 * 任务存储
 * 单进程内运行，直接保存在 Map 中
 */
@Injectable()
export class JobsRepository {
  private readonly jobs = new Map<string, Job>();

  insert(job: Job): Job {
    this.jobs.set(job.id, job);
    return job;
  }

  findById(id: string): Job | undefined {
    return this.jobs.get(id);
  }

  /**
   * 更新任务并刷新 updated_at，任务不存在时返回 undefined
   */
  update(id: string, patch: JobPatch): Job | undefined {
    const current = this.jobs.get(id);
    if (!current) {
      return undefined;
    }
    const next: Job = { ...current, ...patch, updated_at: new Date().toISOString() };
    this.jobs.set(id, next);
    return next;
  }

  /**
   * 已结束且结束时间早于 threshold 的任务
   */
  findFinishedBefore(threshold: Date): Job[] {
    return [...this.jobs.values()].filter(
      (job) =>
        FINISHED_STATUSES.includes(job.status) &&
        job.finished_at !== null &&
        new Date(job.finished_at).getTime() < threshold.getTime(),
    );
  }

  delete(id: string): boolean {
    return this.jobs.delete(id);
  }

  count(): number {
    return this.jobs.size;
  }
}
