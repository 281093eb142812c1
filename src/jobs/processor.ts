import type { Job } from "bullmq";
import { env } from "../config/env";
import type { DocumentService } from "../services/documentService";
import { renderSubtitles } from "../subtitles/document";
import type { RenderResult } from "../types/models";
import { RENDER_SUBTITLES_JOB, type JobData, type RenderSubtitlesJobData } from "./types";

export type ProgressJob<T> = Pick<Job<T>, "name" | "data" | "updateProgress">;

export class JobProcessor {
  constructor(private readonly documentService: Pick<DocumentService, "saveRender">) {}

  async handle(job: ProgressJob<JobData>): Promise<RenderResult> {
    if (job.name === RENDER_SUBTITLES_JOB) {
      return this.renderSubtitles(job);
    }
    throw new Error(`Unknown job name: ${job.name}`);
  }

  private async renderSubtitles(job: ProgressJob<RenderSubtitlesJobData>): Promise<RenderResult> {
    const { documentId, segments, config } = job.data;

    await job.updateProgress(10);
    const output = renderSubtitles(segments, config);
    output.diagnostics.forEach((diagnostic) => {
      console.warn(`[render] ${documentId}: ${diagnostic.message}`);
    });

    await job.updateProgress(60);
    const record = await this.documentService.saveRender(documentId, config.scriptInfo.title, output);
    await job.updateProgress(100);

    console.log(`[render] ${documentId}: ${output.unitCount} units, ${output.eventCount} events, ${output.styleCount} styles`);

    return {
      documentId,
      assUrl: `${env.apiBaseUrl}${record.assUrl}`,
      ...(record.srtUrl ? { srtUrl: `${env.apiBaseUrl}${record.srtUrl}` } : {}),
      droppedWords: output.diagnostics.length,
    };
  }
}
