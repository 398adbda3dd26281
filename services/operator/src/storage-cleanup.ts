import {
  DeleteObjectsCommand,
  ListObjectsV2Command,
  S3Client,
  type DeleteObjectsCommandInput,
  type DeleteObjectsCommandOutput,
  type ListObjectsV2CommandInput,
  type ListObjectsV2CommandOutput,
} from '@aws-sdk/client-s3';
import { logger } from '@forgeline/shared';
import type { StorageConfig } from './config.js';

const log = logger.child({ module: 'storage-cleanup' });

export interface StorageCleaner {
  /** Remove everything uploaded for a site. Returns the number of objects deleted. */
  removeSite(siteName: string): Promise<number>;
}

/** The two bucket operations cleanup needs. */
export interface BucketClient {
  listObjects(input: ListObjectsV2CommandInput): Promise<ListObjectsV2CommandOutput>;
  deleteObjects(input: DeleteObjectsCommandInput): Promise<DeleteObjectsCommandOutput>;
}

export function s3BucketClient(client: S3Client): BucketClient {
  return {
    listObjects: (input) => client.send(new ListObjectsV2Command(input)),
    deleteObjects: (input) => client.send(new DeleteObjectsCommand(input)),
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Deletes a site's published files (`<site>/...`) and its timestamped
 * upload archives (`.archives/<site>-YYYYmmdd-HHMMSS.zip`). Safe to call
 * repeatedly; an empty prefix is a no-op.
 */
export class S3StorageCleaner implements StorageCleaner {
  constructor(
    private readonly client: BucketClient,
    private readonly bucket: string,
  ) {}

  async removeSite(siteName: string): Promise<number> {
    const archivePattern = new RegExp(`^\\.archives/${escapeRegExp(siteName)}-\\d{8}-\\d{6}\\.zip$`);
    const files = await this.removePrefix(`${siteName}/`);
    const archives = await this.removePrefix(`.archives/${siteName}-`, (key) => archivePattern.test(key));
    log.info({ siteName, bucket: this.bucket, files, archives }, 'site storage removed');
    return files + archives;
  }

  private async removePrefix(prefix: string, match: (key: string) => boolean = () => true): Promise<number> {
    let removed = 0;
    let continuationToken: string | undefined;

    do {
      const page = await this.client.listObjects({
        Bucket: this.bucket,
        Prefix: prefix,
        ContinuationToken: continuationToken,
      });

      const keys = (page.Contents ?? []).flatMap((obj) => (obj.Key && match(obj.Key) ? [obj.Key] : []));
      if (keys.length > 0) {
        const result = await this.client.deleteObjects({
          Bucket: this.bucket,
          Delete: { Objects: keys.map((Key) => ({ Key })), Quiet: true },
        });
        const errors = result.Errors ?? [];
        if (errors.length > 0) {
          const first = errors[0];
          throw new Error(
            `Failed to delete ${errors.length} object(s) under ${prefix}: ${first?.Key ?? '?'} ${first?.Message ?? ''}`.trim(),
          );
        }
        removed += keys.length;
      }

      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return removed;
  }
}

/** Returns undefined when no storage credentials are configured. */
export function createStorageCleaner(config: StorageConfig): StorageCleaner | undefined {
  if (!config.accessKey || !config.secretKey) return undefined;
  const client = new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    credentials: {
      accessKeyId: config.accessKey,
      secretAccessKey: config.secretKey,
    },
    forcePathStyle: true,
  });
  return new S3StorageCleaner(s3BucketClient(client), config.bucket);
}
