import fs from 'fs';
import path from 'path';
import { logger, errorMessage } from '../utils/logger.js';
import { validatePathWithinDirectory } from '../utils/pathSecurity.js';
import { ensureDir, getFileSize, safeUnlink } from '../services/compression/fileUtils.js';
import { isImageKey, keyExtension, tempDownloadPath, toMediaFile } from './keys.js';
import type { MediaFile, ObjectStorage } from './types.js';

/**
 * Buckets are directories under `rootDir`; keys are `/`-separated paths inside them.
 * Meant for local development without an S3 endpoint.
 */
export class LocalObjectStorage implements ObjectStorage {
  kind: 'local' = 'local';
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  private bucketDir(bucket: string): string {
    return validatePathWithinDirectory(bucket, this.rootDir);
  }

  private objectPath(bucket: string, key: string): string {
    return validatePathWithinDirectory(key, this.bucketDir(bucket));
  }

  async list(bucket: string, maxCount: number, extension?: string): Promise<MediaFile[]> {
    const files: MediaFile[] = [];
    try {
      const root = this.bucketDir(bucket);
      const walk = async (dir: string, prefix: string): Promise<void> => {
        const entries = await fs.promises.readdir(dir, { withFileTypes: true });
        entries.sort((a, b) => a.name.localeCompare(b.name));
        for (const entry of entries) {
          if (files.length >= maxCount) return;
          const key = prefix ? `${prefix}/${entry.name}` : entry.name;
          if (entry.isDirectory()) {
            await walk(path.join(dir, entry.name), key);
          } else if (entry.isFile() && isImageKey(key) && (!extension || keyExtension(key) === extension)) {
            const stats = await fs.promises.stat(path.join(dir, entry.name));
            files.push(toMediaFile(key, stats.size, stats.mtime));
          }
        }
      };
      await walk(root, '');
    } catch (error) {
      logger.error('storage.local.list_failed', { bucket, errorMessage: errorMessage(error) });
      return [];
    }
    return files;
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    return (await this.size(bucket, key)) !== null;
  }

  async size(bucket: string, key: string): Promise<number | null> {
    try {
      return await getFileSize(this.objectPath(bucket, key));
    } catch (error) {
      logger.warn('storage.local.stat_failed', { bucket, key, errorMessage: errorMessage(error) });
      return null;
    }
  }

  async download(bucket: string, key: string, destDir: string, signal?: AbortSignal): Promise<string | null> {
    const localPath = tempDownloadPath(destDir, key);
    try {
      signal?.throwIfAborted();
      await ensureDir(destDir);
      await fs.promises.copyFile(this.objectPath(bucket, key), localPath);
      if (!(await getFileSize(localPath))) throw new Error('empty_download');
      return localPath;
    } catch (error) {
      logger.error('storage.local.download_failed', { bucket, key, errorMessage: errorMessage(error) });
      await safeUnlink(localPath);
      return null;
    }
  }

  async upload(localPath: string, bucket: string, key: string, signal?: AbortSignal): Promise<boolean> {
    try {
      signal?.throwIfAborted();
      const target = this.objectPath(bucket, key);
      await ensureDir(path.dirname(target));
      await fs.promises.copyFile(localPath, target);
      return true;
    } catch (error) {
      logger.error('storage.local.upload_failed', { bucket, key, errorMessage: errorMessage(error) });
      return false;
    }
  }

  async deleteLocal(localPath: string): Promise<void> {
    await safeUnlink(localPath);
  }

  async ping(bucket: string): Promise<boolean> {
    try {
      await ensureDir(this.bucketDir(bucket));
      return true;
    } catch (error) {
      logger.warn('storage.local.ping_failed', { bucket, errorMessage: errorMessage(error) });
      return false;
    }
  }
}
