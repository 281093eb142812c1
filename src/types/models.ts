import type { Diagnostic } from "../subtitles/errors";

export interface DocumentRecord {
  id: string;
  title: string;
  assPath: string;
  assUrl: string;
  srtPath?: string;
  srtUrl?: string;
  unitCount: number;
  eventCount: number;
  styleCount: number;
  diagnostics: Diagnostic[];
  createdAt: string;
  updatedAt: string;
}

export interface RenderResult {
  documentId: string;
  assUrl: string;
  srtUrl?: string;
  droppedWords: number;
}

export interface JobView<T = unknown> {
  jobId: string;
  status: "queued" | "running" | "succeeded" | "failed";
  progress: number;
  error?: string;
  result?: T;
}
