import "./config/loadEnv";
import { createApp } from "./api/createApp";
import { env } from "./config/env";
import { JobProcessor } from "./jobs/processor";
import { JobQueue } from "./jobs/queue";
import { DocumentService } from "./services/documentService";
import { StoreService } from "./services/store";
import { ensureStorageDirs } from "./utils/storage";

const bootstrap = async (): Promise<void> => {
  await ensureStorageDirs();

  const store = new StoreService();
  await store.init();

  const documentService = new DocumentService(store);
  const jobQueue = new JobQueue();
  const processor = new JobProcessor(documentService);
  jobQueue.startWorker((job) => processor.handle(job));

  const app = createApp({
    documentService,
    jobQueue,
  });

  const server = app.listen(env.port, () => {
    console.log(`[server] listening at http://localhost:${env.port}`);
    console.log(`[server] redis=${env.redisUrl}, queueConcurrency=${env.queueConcurrency}`);
    console.log(`[server] storageDir=${env.storageDir}, playRes=${env.playResX}x${env.playResY}`);
  });

  const shutdown = async (): Promise<void> => {
    await jobQueue.close();
    server.close();
  };

  const onSignal = (): void => {
    shutdown().catch((error) => {
      console.error("[server] shutdown failed", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
};

bootstrap().catch((error) => {
  console.error("Failed to start subtitle service", error);
  process.exit(1);
});
