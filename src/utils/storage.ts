import fs from "node:fs/promises";
import path from "node:path";
import { env } from "../config/env";

export const storagePaths = {
  root: env.storageDir,
  subtitles: path.join(env.storageDir, "subtitles"),
  data: path.join(env.storageDir, "data"),
};

export const ensureStorageDirs = async (): Promise<void> => {
  await Promise.all(
    Object.values(storagePaths).map(async (dirPath) => {
      await fs.mkdir(dirPath, { recursive: true });
    }),
  );
};

export const safeJoin = (baseDir: string, filename: string): string => {
  const cleaned = path.basename(filename);
  const outputPath = path.join(baseDir, cleaned);
  const relative = path.relative(baseDir, outputPath);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error("Invalid filename");
  }
  return outputPath;
};

export interface DocumentFilePaths {
  assPath: string;
  srtPath: string;
}

/** Subtitle outputs live side by side, named after the document id. */
export const documentFilePaths = (documentId: string, subtitlesDir: string = storagePaths.subtitles): DocumentFilePaths => ({
  assPath: safeJoin(subtitlesDir, `${documentId}.ass`),
  srtPath: safeJoin(subtitlesDir, `${documentId}.srt`),
});

export const toPublicFileUrl = (absolutePath: string, rootDir: string = storagePaths.root): string => {
  const relativePath = path.relative(rootDir, absolutePath).split(path.sep).join("/");
  return `/files/${relativePath}`;
};
