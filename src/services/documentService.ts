import fs from "node:fs/promises";
import path from "node:path";
import { env } from "../config/env";
import type { StoreService } from "./store";
import type { RenderOutput } from "../subtitles/document";
import type { DocumentRecord } from "../types/models";
import { documentFilePaths, storagePaths, toPublicFileUrl } from "../utils/storage";

export class DocumentService {
  constructor(
    private readonly store: StoreService,
    private readonly rootDir: string = storagePaths.root,
  ) {}

  getDocument(documentId: string): DocumentRecord | undefined {
    return this.store.getDocument(documentId);
  }

  listDocuments(): DocumentRecord[] {
    return this.store.listDocuments();
  }

  async saveRender(documentId: string, title: string, output: RenderOutput): Promise<DocumentRecord> {
    const paths = documentFilePaths(documentId, path.join(this.rootDir, "subtitles"));
    const assPath = paths.assPath;
    const srtPath = output.srt === undefined ? undefined : paths.srtPath;

    await fs.mkdir(path.dirname(assPath), { recursive: true });
    await fs.writeFile(assPath, output.ass, "utf-8");
    if (srtPath && output.srt !== undefined) {
      await fs.writeFile(srtPath, output.srt, "utf-8");
    } else {
      await fs.rm(paths.srtPath, { force: true });
    }

    const existing = this.store.getDocument(documentId);
    const now = new Date().toISOString();
    const record: DocumentRecord = {
      id: documentId,
      title,
      assPath,
      assUrl: toPublicFileUrl(assPath, this.rootDir),
      ...(srtPath ? { srtPath, srtUrl: toPublicFileUrl(srtPath, this.rootDir) } : {}),
      unitCount: output.unitCount,
      eventCount: output.eventCount,
      styleCount: output.styleCount,
      diagnostics: output.diagnostics,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    await this.store.upsertDocument(record);
    return record;
  }

  publicDocumentView(document: DocumentRecord): Record<string, unknown> {
    return {
      documentId: document.id,
      title: document.title,
      assUrl: `${env.apiBaseUrl}${document.assUrl}`,
      srtUrl: document.srtUrl ? `${env.apiBaseUrl}${document.srtUrl}` : undefined,
      unitCount: document.unitCount,
      eventCount: document.eventCount,
      styleCount: document.styleCount,
      diagnostics: document.diagnostics.map((diagnostic) => diagnostic.message),
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    };
  }
}
