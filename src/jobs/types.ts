import type { RenderConfig, TranscriptSegment } from "../subtitles/types";

export const RENDER_SUBTITLES_JOB = "renderSubtitles";

export type RenderJobName = typeof RENDER_SUBTITLES_JOB;

export interface RenderSubtitlesJobData {
  documentId: string;
  segments: TranscriptSegment[];
  config: RenderConfig;
}

export type JobData = RenderSubtitlesJobData;
