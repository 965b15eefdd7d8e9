import "dotenv/config";
import {
  QUEUE_NAMES,
  closePipelineQueues,
  createPipelineQueues,
  createRedisConnection,
  stageJobSettingsFromEnv,
  toStageQueues,
  type IntegrationJobData,
} from "../queues";
import { closePipelineServices, createPipelineServices } from "../services";
import { handleIntegrationJob } from "./integrationHandler";
import { startStageWorker } from "./runStageWorker";

async function main(): Promise<void> {
  const verbose = process.argv.includes("--verbose") || process.argv.includes("-v");
  const services = await createPipelineServices({ verbose });
  const connection = createRedisConnection();
  const queues = createPipelineQueues(
    connection,
    stageJobSettingsFromEnv(services.config.maxUnitAttempts),
  );
  const stageQueues = toStageQueues(queues);

  const worker = startStageWorker<IntegrationJobData>({
    queueName: QUEUE_NAMES.integration,
    envPrefix: "INTEGRATION",
    defaultConcurrency: 2,
    connection,
    logger: services.logger,
    deadLetter: stageQueues.deadLetter,
    handle: (data, token) =>
      handleIntegrationJob(
        {
          store: services.mongo.tracking,
          objects: services.objects,
          crm: services.crm,
          logger: services.logger,
          maxAttempts: services.config.maxUnitAttempts,
        },
        data,
        token,
      ),
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    services.logger.info({ signal }, "worker-integration shutting down");

    await worker.close();
    await closePipelineQueues(queues);
    await connection.quit();
    await closePipelineServices(services);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
