import path from "node:path";

const toNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const rootDir = path.resolve(__dirname, "..", "..");

const resolveStorageDir = (): string => {
  const raw = process.env.STORAGE_DIR?.trim();
  if (!raw) {
    return path.join(rootDir, "storage");
  }
  return path.isAbsolute(raw) ? raw : path.resolve(rootDir, raw);
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  port: toNumber(process.env.PORT, 4000),
  apiBaseUrl: process.env.API_BASE_URL ?? "http://localhost:4000",
  corsOrigin: process.env.CORS_ORIGIN ?? "http://localhost:3000",
  redisUrl: process.env.REDIS_URL ?? "redis://localhost:6379",
  queueConcurrency: toNumber(process.env.QUEUE_CONCURRENCY, 2),
  maxUploadSizeMb: toNumber(process.env.MAX_UPLOAD_SIZE_MB, 10),
  playResX: toNumber(process.env.PLAY_RES_X, 1280),
  playResY: toNumber(process.env.PLAY_RES_Y, 720),
  rootDir,
  storageDir: resolveStorageDir(),
};
