import { randomUUID } from "node:crypto";
import { describeError } from "../errors.js";

export type JobStatus = "running" | "completed" | "failed";

export interface Job<TResult, TProgress> {
  id: string;
  status: JobStatus;
  startedAt: Date;
  finishedAt?: Date;
  progress?: TProgress;
  result?: TResult;
  error?: string;
}

export const DEFAULT_FINISHED_JOBS_KEPT = 100;

/**
 * In-memory registry of background jobs of one kind. Jobs are lost on restart.
 * Running jobs are always kept; finished ones are evicted oldest-finished
 * first once more than `maxFinished` of them are held.
 */
export class JobRegistry<TResult, TProgress = unknown> {
  private readonly jobs = new Map<string, Job<TResult, TProgress>>();
  private readonly settled = new Map<string, Promise<void>>();
  // ids of finished jobs, in finish order
  private readonly finished: string[] = [];
  private readonly maxFinished: number;

  constructor(maxFinished = DEFAULT_FINISHED_JOBS_KEPT) {
    this.maxFinished = Math.max(1, Math.floor(maxFinished));
  }

  /**
   * Starts `run` in the background. `report` stores progress on the job.
   */
  start(
    run: (report: (progress: TProgress) => void) => Promise<TResult>
  ): Job<TResult, TProgress> {
    const job: Job<TResult, TProgress> = {
      id: randomUUID(),
      status: "running",
      startedAt: new Date(),
    };
    this.jobs.set(job.id, job);

    const report = (progress: TProgress) => {
      job.progress = progress;
    };

    const done = run(report).then(
      (result) => {
        job.status = "completed";
        job.result = result;
        job.finishedAt = new Date();
        this.retire(job.id);
      },
      (error: unknown) => {
        job.status = "failed";
        job.error = describeError(error);
        job.finishedAt = new Date();
        console.error(`❌ Job ${job.id} failed: ${job.error}`);
        this.retire(job.id);
      }
    );
    this.settled.set(job.id, done);
    return job;
  }

  private retire(id: string): void {
    this.settled.delete(id);
    this.finished.push(id);
    while (this.finished.length > this.maxFinished) {
      const evicted = this.finished.shift();
      if (evicted !== undefined) this.jobs.delete(evicted);
    }
  }

  /** Jobs currently held, running or finished */
  get size(): number {
    return this.jobs.size;
  }

  get(id: string): Job<TResult, TProgress> | undefined {
    return this.jobs.get(id);
  }

  get running(): boolean {
    for (const job of this.jobs.values()) {
      if (job.status === "running") return true;
    }
    return false;
  }

  /** Resolves once the job has finished either way */
  async wait(id: string): Promise<Job<TResult, TProgress> | undefined> {
    await this.settled.get(id);
    return this.jobs.get(id);
  }
}
