import "dotenv/config";
import fs from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import { loadConfig } from "@oficios/core/config";
import { createLogger } from "@oficios/core/logger";
import { PdfCodec } from "@oficios/core/pdf/pdfCodec";
import { InMemoryObjectStore } from "@oficios/core/storage/objectStore";
import { InMemoryTrackingStore } from "@oficios/core/tracking/memoryStore";
import { BATCH_CHANNELS, type BatchChannel } from "@oficios/core/types";
import { admitBatch } from "./ingest/admitBatch";
import { createInMemoryStageQueues } from "./memoryQueues";
import { collectPipelineStats } from "./pipelineStats";
import {
  QUEUE_NAMES,
  closePipelineQueues,
  createPipelineQueues,
  createRedisConnection,
  stageJobSettingsFromEnv,
  toStageQueues,
} from "./queues";
import { reapStaleUnits } from "./retry/reapStale";
import { retryBatch, type RetryDimension } from "./retry/retryBatch";
import { closePipelineServices, createPipelineServices, type PipelineServices } from "./services";

function parseOptionalInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Invalid integer value: ${value}`);
  }

  return parsed;
}

function parseChannel(value: string): BatchChannel {
  const match = BATCH_CHANNELS.find((channel) => channel === value.trim().toLowerCase());
  if (!match) {
    throw new InvalidArgumentError(`Channel must be one of: ${BATCH_CHANNELS.join(", ")}`);
  }
  return match;
}

function parseDimension(value: string): RetryDimension {
  if (value === "extraction" || value === "integration") {
    return value;
  }
  throw new InvalidArgumentError("Dimension must be extraction or integration");
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

interface IngestCliOptions {
  channel: BatchChannel;
  namingHint?: string;
  dryRun?: boolean;
}

async function withServices(
  verbose: boolean,
  work: (services: PipelineServices) => Promise<void>,
): Promise<void> {
  const services = await createPipelineServices({ verbose });
  try {
    await work(services);
  } finally {
    await closePipelineServices(services);
  }
}

async function runIngestDryRun(file: string, options: IngestCliOptions, verbose: boolean): Promise<void> {
  const config = loadConfig();
  const result = await admitBatch(
    {
      store: new InMemoryTrackingStore(),
      objects: new InMemoryObjectStore(),
      codec: new PdfCodec(),
      queues: createInMemoryStageQueues(),
      logger: createLogger(verbose),
      pagesPerUnit: config.pagesPerUnit,
    },
    {
      location: file,
      content: await fs.readFile(file),
      channel: options.channel,
      namingHint: options.namingHint,
    },
  );

  printJson({ dry_run: true, ...result });
}

async function runIngest(file: string, options: IngestCliOptions, verbose: boolean): Promise<void> {
  if (options.dryRun) {
    await runIngestDryRun(file, options, verbose);
    return;
  }

  await withServices(verbose, async (services) => {
    const connection = createRedisConnection();
    const queues = createPipelineQueues(
      connection,
      stageJobSettingsFromEnv(services.config.maxUnitAttempts),
    );

    try {
      const result = await admitBatch(
        {
          store: services.mongo.tracking,
          objects: services.objects,
          codec: services.codec,
          queues: toStageQueues(queues),
          logger: services.logger,
          pagesPerUnit: services.config.pagesPerUnit,
        },
        {
          location: file,
          content: await fs.readFile(file),
          channel: options.channel,
          namingHint: options.namingHint,
        },
      );

      printJson(result);
    } finally {
      await closePipelineQueues(queues);
      await connection.quit();
    }
  });
}

async function runRetry(
  batchId: string,
  options: { dimension: RetryDimension; unit?: string },
  verbose: boolean,
): Promise<void> {
  await withServices(verbose, async (services) => {
    const connection = createRedisConnection();
    const queues = createPipelineQueues(
      connection,
      stageJobSettingsFromEnv(services.config.maxUnitAttempts),
    );

    try {
      const report = await retryBatch(
        {
          store: services.mongo.tracking,
          queues: toStageQueues(queues),
          logger: services.logger,
          maxAttempts: services.config.maxUnitAttempts,
        },
        { batchId, dimension: options.dimension, unitId: options.unit },
      );

      printJson(report);
    } finally {
      await closePipelineQueues(queues);
      await connection.quit();
    }
  });
}

async function runStats(verbose: boolean): Promise<void> {
  await withServices(verbose, async (services) => {
    const connection = createRedisConnection();
    const queues = createPipelineQueues(
      connection,
      stageJobSettingsFromEnv(services.config.maxUnitAttempts),
    );

    try {
      printJson(await collectPipelineStats({ store: services.mongo.tracking, queues }));
    } finally {
      await closePipelineQueues(queues);
      await connection.quit();
    }
  });
}

async function runStop(): Promise<void> {
  const config = loadConfig();
  const connection = createRedisConnection();
  const queues = createPipelineQueues(connection, stageJobSettingsFromEnv(config.maxUnitAttempts));

  try {
    await Promise.all([queues.extraction.pause(), queues.integration.pause()]);

    console.log(`Paused ${QUEUE_NAMES.extraction}, ${QUEUE_NAMES.integration}`);
  } finally {
    await closePipelineQueues(queues);
    await connection.quit();
  }
}

async function main(): Promise<void> {
  const verbose = process.argv.includes("--verbose") || process.argv.includes("-v");
  const program = new Command();

  program
    .name("oficios-pipeline")
    .description("Admision y seguimiento de lotes de oficios (BullMQ)")
    .option("-v, --verbose", "Activa logs debug");

  program
    .command("ingest")
    .description("Admite un lote PDF, lo divide en oficios y encola la extraccion")
    .argument("<file>", "Ruta del PDF del lote")
    .requiredOption("--channel <channel>", "Canal de entrada (email|direct)", parseChannel)
    .option("--naming-hint <name>", "Nombre de archivo original (deduce el operador)")
    .option("--dry-run", "Valida y divide sin escribir en Mongo, almacenamiento ni colas")
    .action(async (file: string, options: IngestCliOptions) => {
      await runIngest(file, options, verbose);
    });

  program
    .command("batch-status")
    .description("Estado agregado de un lote")
    .argument("<batch_id>", "Identificador del lote")
    .action(async (batchId: string) => {
      await withServices(verbose, async (services) => {
        printJson(await services.status.getBatchStatus(batchId));
      });
    });

  program
    .command("unit-status")
    .description("Estado de un oficio por dimension")
    .argument("<unit_id>", "Identificador del oficio")
    .action(async (unitId: string) => {
      await withServices(verbose, async (services) => {
        printJson(await services.status.getUnitStatus(unitId));
      });
    });

  program
    .command("retry")
    .description("Rearma oficios en error (respetando el maximo de intentos) y los reencola")
    .argument("<batch_id>", "Identificador del lote")
    .option("--dimension <dimension>", "extraction|integration", parseDimension, "extraction")
    .option("--unit <unit_id>", "Limita el reintento a un oficio")
    .action(async (batchId: string, options: { dimension: RetryDimension; unit?: string }) => {
      await runRetry(batchId, options, verbose);
    });

  program
    .command("reap")
    .description("Pasa a error los oficios atascados en processing")
    .option("--older-than-minutes <number>", "Antiguedad minima del lease", parseOptionalInt)
    .action(async (options: { olderThanMinutes?: number }) => {
      await withServices(verbose, async (services) => {
        const report = await reapStaleUnits(
          { store: services.mongo.tracking, logger: services.logger },
          options.olderThanMinutes ?? services.config.staleProcessingMinutes,
        );
        printJson(report);
      });
    });

  program
    .command("stop")
    .description("Pausa las colas de extraccion e integracion")
    .action(async () => {
      await runStop();
    });

  program
    .command("stats")
    .description("Resumen de colas y estados por dimension")
    .action(async () => {
      await runStats(verbose);
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
