import { loadConfig, type AppConfig } from "@oficios/core/config";
import { createLogger, type Logger } from "@oficios/core/logger";
import { createMongoContext, type MongoContext } from "@oficios/core/db/mongo";
import { createHttpClient, type RetryPolicy } from "@oficios/core/client/http";
import { CreatioCrmGateway, type CrmGateway } from "@oficios/core/crm/crmClient";
import { ChatRecognitionClient, type RecognitionClient } from "@oficios/core/extraction/recognitionClient";
import { PdfCodec, type DocumentCodec } from "@oficios/core/pdf/pdfCodec";
import { FsObjectStore, type ObjectStore } from "@oficios/core/storage/objectStore";
import { StatusQueryService } from "@oficios/core/status/statusService";

export interface PipelineServices {
  config: AppConfig;
  logger: Logger;
  mongo: MongoContext;
  objects: ObjectStore;
  codec: DocumentCodec;
  recognition: RecognitionClient;
  crm: CrmGateway;
  status: StatusQueryService;
}

export async function createPipelineServices(options: { verbose?: boolean } = {}): Promise<PipelineServices> {
  const config = loadConfig();
  const logger = createLogger(options.verbose ?? false);
  const mongo = await createMongoContext(config, logger);

  const http = createHttpClient({ timeoutMs: config.httpTimeoutMs, userAgent: config.userAgent });
  const policy: RetryPolicy = { retryCount: config.retryCount, retryBackoffMs: config.retryBackoffMs };

  return {
    config,
    logger,
    mongo,
    objects: new FsObjectStore(config.storageRoot),
    codec: new PdfCodec(),
    recognition: new ChatRecognitionClient(config.recognition, http, policy, logger),
    crm: new CreatioCrmGateway(config.crm, http, policy, logger),
    status: new StatusQueryService(mongo.tracking),
  };
}

export async function closePipelineServices(services: PipelineServices): Promise<void> {
  await services.mongo.client.close();
}
