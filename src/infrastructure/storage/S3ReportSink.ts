import { HeadObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { ReportSink } from "../../ports/ReportSink";

export type S3SinkOptions = {
  bucket: string;
  prefix?: string;
  region?: string;
  endpoint?: string;
};

const isNotFound = (error: unknown): boolean => {
  if (typeof error !== "object" || error === null) return false;
  if ("name" in error && error.name === "NotFound") return true;
  if ("$metadata" in error) {
    const metadata = error.$metadata;
    return typeof metadata === "object" && metadata !== null && "httpStatusCode" in metadata
      && metadata.httpStatusCode === 404;
  }
  return false;
};

export class S3ReportSink implements ReportSink {
  readonly description: string;
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(options: S3SinkOptions, client?: S3Client) {
    this.bucket = options.bucket;
    this.prefix = options.prefix ?? "";
    this.client = client ?? new S3Client({
      region: options.region,
      ...(options.endpoint ? { endpoint: options.endpoint, forcePathStyle: true } : {})
    });
    this.description = `s3://${this.bucket}/${this.prefix}`;
  }

  private getFullKey(name: string): string {
    return `${this.prefix}${name}`;
  }

  async exists(name: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: this.getFullKey(name) }));
      return true;
    } catch (error: unknown) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async write(name: string, body: string, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.getFullKey(name),
        Body: body,
        ContentType: contentType
      })
    );
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}
