import {
  S3Client,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import { Logger } from '../core/Logger';
import { FeatureStoreError } from '../../types/FeatureStoreErrors';
import type { IObjectStorage } from '../featurestore/IFeatureStoreClients';

export type S3Sender = Pick<S3Client, 'send'>;

/** DeleteObjects accepts at most this many keys per request. */
export const DELETE_BATCH_SIZE = 1000;

export class S3ObjectStorage implements IObjectStorage {
  constructor(
    private readonly s3Client: S3Sender,
    private readonly logger: Logger
  ) {}

  async listObjects(bucket: string, prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;
    do {
      const page = await this.s3Client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );
      for (const object of page.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
    return keys;
  }

  async deleteObjects(bucket: string, keys: string[]): Promise<number> {
    let deleted = 0;
    for (let start = 0; start < keys.length; start += DELETE_BATCH_SIZE) {
      const batch = keys.slice(start, start + DELETE_BATCH_SIZE);
      const result = await this.s3Client.send(
        new DeleteObjectsCommand({
          Bucket: bucket,
          Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
        })
      );
      const errors = result.Errors ?? [];
      if (errors.length > 0) {
        const first = errors[0];
        throw new FeatureStoreError(
          `Failed to delete ${errors.length} object(s) in ${bucket}; first: ${first?.Key ?? '?'} (${first?.Code ?? 'unknown'})`,
          'LIFECYCLE',
          'OBJECT_DELETE_FAILED',
          true
        );
      }
      deleted += batch.length;
      this.logger.debug('Deleted object batch', { bucket, count: batch.length });
    }
    return deleted;
  }

  async downloadObject(bucket: string, key: string): Promise<string> {
    const result = await this.s3Client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!result.Body) {
      throw new FeatureStoreError(`Empty body for s3://${bucket}/${key}`, 'LIFECYCLE', 'OBJECT_BODY_MISSING');
    }
    return result.Body.transformToString();
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    await this.s3Client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  }
}
