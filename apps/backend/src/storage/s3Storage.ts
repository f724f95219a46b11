import fs from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { logger, errorMessage } from '../utils/logger.js';
import { ensureDir, getFileSize, safeUnlink } from '../services/compression/fileUtils.js';
import { contentTypeFor } from './contentTypes.js';
import { isImageKey, keyExtension, tempDownloadPath, toMediaFile } from './keys.js';
import type { MediaFile, ObjectStorage } from './types.js';

export type S3StorageConfig = {
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
};

// S3 caps a single ListObjectsV2 page at 1000 keys.
const LIST_PAGE_SIZE = 1000;

function isNotFound(error: unknown): boolean {
  return error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404;
}

export class S3ObjectStorage implements ObjectStorage {
  kind: 's3' = 's3';
  private readonly client: S3Client;

  constructor(cfg: S3StorageConfig, client?: S3Client) {
    this.client =
      client ??
      new S3Client({
        region: cfg.region,
        endpoint: cfg.endpoint,
        forcePathStyle: cfg.forcePathStyle,
        // Without explicit keys the SDK's default provider chain applies.
        credentials:
          cfg.accessKeyId && cfg.secretAccessKey
            ? { accessKeyId: cfg.accessKeyId, secretAccessKey: cfg.secretAccessKey }
            : undefined,
      });
  }

  async list(bucket: string, maxCount: number, extension?: string): Promise<MediaFile[]> {
    const files: MediaFile[] = [];
    let continuationToken: string | undefined;
    try {
      do {
        const page = await this.client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            MaxKeys: LIST_PAGE_SIZE,
            ContinuationToken: continuationToken,
          })
        );
        for (const object of page.Contents ?? []) {
          if (!object.Key || object.Key.endsWith('/') || !isImageKey(object.Key)) continue;
          if (extension && keyExtension(object.Key) !== extension) continue;
          files.push(toMediaFile(object.Key, object.Size ?? 0, object.LastModified));
          if (files.length >= maxCount) return files;
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      logger.error('storage.s3.list_failed', { bucket, errorMessage: errorMessage(error) });
      return [];
    }
    return files;
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return true;
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn('storage.s3.head_failed', { bucket, key, errorMessage: errorMessage(error) });
      }
      return false;
    }
  }

  async size(bucket: string, key: string): Promise<number | null> {
    try {
      const head = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return head.ContentLength ?? null;
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn('storage.s3.head_failed', { bucket, key, errorMessage: errorMessage(error) });
      }
      return null;
    }
  }

  async download(bucket: string, key: string, destDir: string, signal?: AbortSignal): Promise<string | null> {
    const localPath = tempDownloadPath(destDir, key);
    try {
      await ensureDir(destDir);
      const res = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }), { abortSignal: signal });
      const body = res.Body;
      if (!body) throw new Error('empty_response_body');

      if (body instanceof Readable) {
        await pipeline(body, fs.createWriteStream(localPath), { signal });
      } else {
        await fs.promises.writeFile(localPath, await body.transformToByteArray());
      }

      const size = await getFileSize(localPath);
      if (!size) throw new Error('empty_download');

      logger.info('storage.s3.downloaded', { bucket, key, localPath, size });
      return localPath;
    } catch (error) {
      logger.error('storage.s3.download_failed', { bucket, key, errorMessage: errorMessage(error) });
      await safeUnlink(localPath);
      return null;
    }
  }

  async upload(localPath: string, bucket: string, key: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const size = await getFileSize(localPath);
      if (size === null) throw new Error('local_file_missing');

      await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: fs.createReadStream(localPath),
          ContentLength: size,
          ContentType: contentTypeFor(keyExtension(key)),
        }),
        { abortSignal: signal }
      );
      logger.info('storage.s3.uploaded', { bucket, key, size });
      return true;
    } catch (error) {
      logger.error('storage.s3.upload_failed', { bucket, key, errorMessage: errorMessage(error) });
      return false;
    }
  }

  async deleteLocal(localPath: string): Promise<void> {
    await safeUnlink(localPath);
  }

  async ping(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (error) {
      logger.warn('storage.s3.ping_failed', { bucket, errorMessage: errorMessage(error) });
      return false;
    }
  }
}
