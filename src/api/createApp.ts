import express, { type Request, type Response } from "express";
import cors from "cors";
import multer from "multer";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { env } from "../config/env";
import type { DocumentService } from "../services/documentService";
import type { JobQueue } from "../jobs/queue";
import { SPEAKER_PALETTE } from "../subtitles/styles";
import { toHexRgb } from "../subtitles/colors";
import { assertRenderConfig, renderSubtitles, withAutoSpeakerStyles } from "../subtitles/document";
import { ConfigError } from "../subtitles/errors";
import { ANIMATION_STYLES, SUBTITLE_POSITION_NAMES, SUBTITLE_POSITIONS, type TranscriptSegment } from "../subtitles/types";
import {
  isAllowedTranscriptFile,
  renderRequestSchema,
  subtitleConfigSchema,
  type SubtitleConfigInput,
  toRenderConfig,
  transcriptSchema,
  validateSubtitleConfig,
} from "../utils/validators";
import { storagePaths } from "../utils/storage";

export interface AppDependencies {
  documentService: Pick<DocumentService, "getDocument" | "listDocuments" | "publicDocumentView">;
  jobQueue: Pick<JobQueue, "enqueueRender" | "getJob">;
}

const UNSUPPORTED_TRANSCRIPT = "Unsupported transcript file. Upload a .json transcript";

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: env.maxUploadSizeMb * 1024 * 1024,
  },
  fileFilter: (_req, file, cb) => {
    if (!isAllowedTranscriptFile(file.originalname, file.mimetype)) {
      cb(new Error(UNSUPPORTED_TRANSCRIPT));
      return;
    }
    cb(null, true);
  },
});

const toClientError = (error: unknown): { statusCode: number; message: string } => {
  if (error instanceof ConfigError) {
    return { statusCode: 400, message: error.message };
  }
  if (error instanceof SyntaxError) {
    return { statusCode: 400, message: "Malformed JSON payload" };
  }
  if (error instanceof Error && error.message.includes(UNSUPPORTED_TRANSCRIPT)) {
    return { statusCode: 400, message: error.message };
  }
  return {
    statusCode: 500,
    message: "Internal server error",
  };
};

const sendIssues = (res: Response, message: string, error: z.ZodError): void => {
  res.status(400).json({ message, issues: error.issues });
};

const parseJsonText = (raw: string | undefined): unknown => {
  if (raw === undefined || raw.trim() === "") {
    return {};
  }
  return JSON.parse(raw);
};

export const createApp = ({ documentService, jobQueue }: AppDependencies): express.Express => {
  const app = express();
  const frame = { playResX: env.playResX, playResY: env.playResY };

  // Configuration faults are answered with 400 before anything is queued.
  const queueRender = async (res: Response, segments: TranscriptSegment[], input: SubtitleConfigInput): Promise<void> => {
    const config = toRenderConfig(input, frame);
    try {
      assertRenderConfig(withAutoSpeakerStyles(segments, config));
    } catch (error) {
      const clientError = toClientError(error);
      res.status(clientError.statusCode).json({ message: clientError.message });
      return;
    }

    try {
      const documentId = uuidv4();
      const jobId = await jobQueue.enqueueRender({ documentId, segments, config });
      res.json({ jobId, documentId });
    } catch (error) {
      console.error(error);
      res.status(500).json({ message: "Failed to enqueue render job" });
    }
  };

  app.use(cors({ origin: env.corsOrigin }));
  app.use(express.json({ limit: "5mb" }));
  app.use("/files", express.static(storagePaths.root));

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      queueConcurrency: env.queueConcurrency,
      maxUploadSizeMb: env.maxUploadSizeMb,
    });
  });

  app.get("/api/options", (_req, res) => {
    res.json({
      positions: SUBTITLE_POSITION_NAMES.map((value) => ({ value, alignment: SUBTITLE_POSITIONS[value] })),
      borderStyles: [
        { value: 1, label: "Outline and drop shadow" },
        { value: 3, label: "Opaque box" },
      ],
      animations: ANIMATION_STYLES,
      palette: SPEAKER_PALETTE.map(toHexRgb),
    });
  });

  app.post("/api/config/validate", (req: Request, res: Response) => {
    res.json(validateSubtitleConfig(req.body));
  });

  app.post("/api/subtitles/preview", (req: Request, res: Response) => {
    const parsed = renderRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendIssues(res, "Invalid render request", parsed.error);
      return;
    }

    try {
      const output = renderSubtitles(parsed.data.transcript.segments, toRenderConfig(parsed.data.config, frame));
      res.json({
        ass: output.ass,
        srt: output.srt,
        diagnostics: output.diagnostics.map((diagnostic) => diagnostic.message),
        unitCount: output.unitCount,
        eventCount: output.eventCount,
        styleCount: output.styleCount,
      });
    } catch (error) {
      const clientError = toClientError(error);
      res.status(clientError.statusCode).json({ message: clientError.message });
    }
  });

  app.post("/api/subtitles/jobs", async (req: Request, res: Response) => {
    const parsed = renderRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendIssues(res, "Invalid render request", parsed.error);
      return;
    }

    await queueRender(res, parsed.data.transcript.segments, parsed.data.config);
  });

  app.post("/api/subtitles/jobs/upload", upload.single("transcript"), async (req: Request, res: Response) => {
    if (!req.file) {
      res.status(400).json({ message: "transcript file is required" });
      return;
    }

    const body: unknown = req.body;
    const rawConfig = typeof body === "object" && body !== null && "config" in body ? body.config : undefined;

    let transcriptJson: unknown;
    let configJson: unknown;
    try {
      transcriptJson = JSON.parse(req.file.buffer.toString("utf-8"));
      configJson = parseJsonText(typeof rawConfig === "string" ? rawConfig : undefined);
    } catch (error) {
      const clientError = toClientError(error);
      res.status(clientError.statusCode).json({ message: clientError.message });
      return;
    }

    const transcript = transcriptSchema.safeParse(transcriptJson);
    if (!transcript.success) {
      sendIssues(res, "Invalid transcript", transcript.error);
      return;
    }
    const config = subtitleConfigSchema.safeParse(configJson);
    if (!config.success) {
      sendIssues(res, "Invalid subtitle config", config.error);
      return;
    }

    await queueRender(res, transcript.data.segments, config.data);
  });

  app.get("/api/jobs/:jobId", async (req: Request, res: Response) => {
    try {
      const job = await jobQueue.getJob(req.params.jobId);
      if (!job) {
        res.status(404).json({ message: "Job not found" });
        return;
      }
      res.json(job);
    } catch (error) {
      console.error(error);
      res.status(500).json({ message: "Failed to read job status" });
    }
  });

  app.get("/api/documents", (_req, res) => {
    res.json({ documents: documentService.listDocuments().map((document) => documentService.publicDocumentView(document)) });
  });

  app.get("/api/documents/:id", (req: Request, res: Response) => {
    const document = documentService.getDocument(req.params.id);
    if (!document) {
      res.status(404).json({ message: "Document not found" });
      return;
    }
    res.json(documentService.publicDocumentView(document));
  });

  app.use((error: unknown, _req: Request, res: Response, _next: express.NextFunction) => {
    if (error instanceof multer.MulterError && error.code === "LIMIT_FILE_SIZE") {
      res.status(400).json({
        message: `File too large. Max allowed is ${env.maxUploadSizeMb}MB`,
      });
      return;
    }

    const clientError = toClientError(error);
    res.status(clientError.statusCode).json({ message: clientError.message });
  });

  return app;
};
