import type { Collection, MongoClient } from "mongodb";
import type { ReportSink } from "../../ports/ReportSink";
import { createMongoClient } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type ReportObjectDoc = {
  name: string;
  body: string;
  contentType: string;
  bytes: number;
  writtenAt: Date;
};

/**
 * Stores each report body as one document keyed by object name.
 */
export class MongoReportSink implements ReportSink {
  readonly description: string;
  private client?: MongoClient;
  private collection?: Collection<ReportObjectDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "seller_reports",
    private readonly collectionName = "report_objects"
  ) {
    this.description = `mongo:${this.dbName}.${this.collectionName}`;
  }

  private async getCollection(): Promise<Collection<ReportObjectDoc>> {
    if (this.collection) return this.collection;

    this.client = await createMongoClient(this.mongoUri);
    const col = this.client.db(this.dbName).collection<ReportObjectDoc>(this.collectionName);

    for (const idx of mongoIndexes.reportObjects) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async exists(name: string): Promise<boolean> {
    const col = await this.getCollection();
    const count = await col.countDocuments({ name }, { limit: 1 });
    return count > 0;
  }

  async write(name: string, body: string, contentType: string): Promise<void> {
    const col = await this.getCollection();
    // First write wins; a concurrent duplicate leaves the stored body untouched.
    await col.updateOne(
      { name },
      {
        $setOnInsert: {
          name,
          body,
          contentType,
          bytes: Buffer.byteLength(body, "utf8"),
          writtenAt: new Date()
        }
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
