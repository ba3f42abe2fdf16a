import { GetObjectCommand, ListObjectsV2Command, S3Client } from '@aws-sdk/client-s3';
import type { ObjectStore } from '../sync/types';

export interface S3ListPage {
  Contents?: Array<{ Key?: string }>;
  IsTruncated?: boolean;
  NextContinuationToken?: string;
}

export interface S3ObjectBody {
  transformToByteArray(): Promise<Uint8Array>;
}

/** The two S3 operations the store issues; `S3Client` satisfies it. */
export interface S3CommandSender {
  send(command: ListObjectsV2Command): Promise<S3ListPage>;
  send(command: GetObjectCommand): Promise<{ Body?: S3ObjectBody }>;
}

export type S3ConnectionOptions = {
  region: string;
  endpoint?: string | null;
  forcePathStyle?: boolean;
  accessKeyId?: string | null;
  secretAccessKey?: string | null;
  sessionToken?: string | null;
};

export function createS3Client(options: S3ConnectionOptions): S3Client {
  return new S3Client({
    region: options.region,
    endpoint: options.endpoint ?? undefined,
    forcePathStyle: options.forcePathStyle ?? false,
    credentials:
      options.accessKeyId && options.secretAccessKey
        ? {
            accessKeyId: options.accessKeyId,
            secretAccessKey: options.secretAccessKey,
            sessionToken: options.sessionToken ?? undefined
          }
        : undefined
  });
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3CommandSender,
    private readonly bucket: string
  ) {}

  async listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;
    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken
        })
      );
      for (const entry of page.Contents ?? []) {
        if (entry.Key) {
          keys.push(entry.Key);
        }
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
    return keys;
  }

  async getObject(key: string): Promise<Buffer> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
    if (!response.Body) {
      throw new Error(`Object ${key} in bucket ${this.bucket} has no body`);
    }
    const bytes = await response.Body.transformToByteArray();
    return Buffer.from(bytes);
  }
}
