import { MongoClient, type Collection } from "mongodb";
import type { RemapRun } from "../../core/runs/RemapRun";
import type { RemapRunRepository } from "../../ports/RemapRunRepository";
import { mongoIndexes } from "./mongo.indexes";

/**
 * Stores one document per run, upserted by `runId`.
 */
export class MongoRemapRunRepository implements RemapRunRepository {
  private client?: MongoClient;
  private collection?: Collection<RemapRun>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "id_remap",
    private readonly collectionName = "runs"
  ) {}

  private async getCollection(): Promise<Collection<RemapRun>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<RemapRun>(this.collectionName);
    for (const idx of mongoIndexes.runCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async save(run: RemapRun): Promise<void> {
    const col = await this.getCollection();
    const { runId, startedAt, ...rest } = run;
    await col.updateOne(
      { runId },
      {
        $setOnInsert: { runId, startedAt },
        $set: rest
      },
      { upsert: true }
    );
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
