import { MongoClient, type Db } from "mongodb";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { MongoTrackingStore, type BatchDoc, type UnitDoc } from "../tracking/mongoStore";
import { STATUS_DIMENSIONS, statusField } from "../tracking/stateMachine";

export const COLLECTIONS = {
  batches: "batches",
  units: "units",
} as const;

export interface MongoContext {
  client: MongoClient;
  db: Db;
  tracking: MongoTrackingStore;
}

export async function ensureIndexes(db: Db, logger: Logger): Promise<void> {
  const batchesCollection = db.collection<BatchDoc>(COLLECTIONS.batches);
  const unitsCollection = db.collection<UnitDoc>(COLLECTIONS.units);

  await Promise.all([
    batchesCollection.createIndex({ batch_id: 1 }, { unique: true, name: "uq_batches_batch_id" }),
    batchesCollection.createIndex({ created_at: -1 }, { name: "idx_batches_created_at" }),

    unitsCollection.createIndex({ unit_id: 1 }, { unique: true, name: "uq_units_unit_id" }),
    unitsCollection.createIndex(
      { batch_id: 1, sequence: 1 },
      { unique: true, name: "uq_units_batch_sequence" },
    ),
    ...STATUS_DIMENSIONS.map((dimension) =>
      unitsCollection.createIndex(
        { [statusField(dimension)]: 1, updated_at: 1 },
        { name: `idx_units_${dimension}_status` },
      ),
    ),
  ]);

  logger.debug("Mongo indexes ensured");
}

export async function createMongoContext(config: AppConfig, logger: Logger): Promise<MongoContext> {
  const client = new MongoClient(config.mongoUri, {
    appName: "oficios-pipeline",
  });

  await client.connect();
  const db = client.db(config.mongoDb);

  await ensureIndexes(db, logger);

  return {
    client,
    db,
    tracking: new MongoTrackingStore(
      client,
      db.collection<BatchDoc>(COLLECTIONS.batches),
      db.collection<UnitDoc>(COLLECTIONS.units),
    ),
  };
}
