import { type Job, type JobProgress, Queue, Worker } from "bullmq";
import { env } from "../config/env";
import type { JobView, RenderResult } from "../types/models";
import { RENDER_SUBTITLES_JOB, type JobData, type RenderJobName, type RenderSubtitlesJobData } from "./types";

const QUEUE_NAME = "karaoke-subtitles";

export const mapState = (state: string): JobView["status"] => {
  switch (state) {
    case "completed":
      return "succeeded";
    case "failed":
      return "failed";
    case "active":
      return "running";
    default:
      return "queued";
  }
};

/** Progress is numeric for render jobs; anything else reads as not started. */
export const readProgress = (progress: JobProgress | undefined): number => {
  const value = typeof progress === "number" ? progress : Number(progress ?? 0);
  return Number.isFinite(value) ? Math.min(100, Math.max(0, value)) : 0;
};

const isRenderResult = (value: unknown): value is RenderResult => {
  return typeof value === "object" && value !== null && "documentId" in value && "assUrl" in value;
};

export const toJobView = (jobId: string, state: string, job: Pick<Job, "progress" | "failedReason" | "returnvalue">): JobView<RenderResult> => {
  const returnValue: unknown = job.returnvalue;
  return {
    jobId,
    status: mapState(state),
    progress: readProgress(job.progress),
    error: job.failedReason || undefined,
    result: isRenderResult(returnValue) ? returnValue : undefined,
  };
};

const connection = {
  url: env.redisUrl,
};

export class JobQueue {
  private readonly queue: Queue<JobData, RenderResult, RenderJobName>;
  private worker?: Worker<JobData, RenderResult>;

  constructor() {
    this.queue = new Queue<JobData, RenderResult, RenderJobName>(QUEUE_NAME, {
      connection,
      defaultJobOptions: {
        removeOnComplete: 100,
        removeOnFail: 200,
      },
    });
  }

  /** One job per document: the document id doubles as the job id. */
  async enqueueRender(data: RenderSubtitlesJobData): Promise<string> {
    const job = await this.queue.add(RENDER_SUBTITLES_JOB, data, { jobId: data.documentId });
    return String(job.id);
  }

  async getJob(jobId: string): Promise<JobView<RenderResult> | null> {
    const job = await this.queue.getJob(jobId);
    if (!job) {
      return null;
    }
    return toJobView(jobId, await job.getState(), job);
  }

  startWorker(handler: (job: Job<JobData>) => Promise<RenderResult>): void {
    this.worker = new Worker<JobData, RenderResult>(QUEUE_NAME, async (job) => handler(job), {
      connection,
      concurrency: env.queueConcurrency,
    });

    this.worker.on("completed", (job, result) => {
      console.log(`[worker] job ${job.id ?? "unknown"} rendered ${result.assUrl}`);
    });

    this.worker.on("failed", (job, error) => {
      const id = job?.id ? String(job.id) : "unknown";
      console.error(`[worker] job failed: ${id}`, error.message);
    });
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
  }
}
