import fs from 'fs';
import { setTimeout as sleep } from 'node:timers/promises';
import { isImageKey, keyExtension, tempDownloadPath, toMediaFile } from '../../src/storage/keys.js';
import type { MediaFile, ObjectStorage } from '../../src/storage/types.js';

/** In-process ObjectStorage for tests: buckets are maps of key to bytes. */
export class MemoryStorage implements ObjectStorage {
  kind: 's3' | 'local' = 's3';
  readonly buckets = new Map<string, Map<string, Buffer>>();
  failDownloads = false;
  failUploads = false;
  pingOk = true;
  downloadDelayMs = 0;
  /** Per-bucket delays consumed one per `exists` call; the answer is read before the delay. */
  readonly existsDelays = new Map<string, number[]>();
  readonly downloads: string[] = [];
  readonly uploads: Array<{ bucket: string; key: string; size: number }> = [];

  private bucket(name: string): Map<string, Buffer> {
    let objects = this.buckets.get(name);
    if (!objects) {
      objects = new Map();
      this.buckets.set(name, objects);
    }
    return objects;
  }

  put(bucket: string, key: string, body: Buffer | string): void {
    this.bucket(bucket).set(key, Buffer.isBuffer(body) ? body : Buffer.from(body));
  }

  get(bucket: string, key: string): Buffer | null {
    return this.bucket(bucket).get(key) ?? null;
  }

  keys(bucket: string): string[] {
    return [...this.bucket(bucket).keys()].sort();
  }

  async list(bucket: string, maxCount: number, extension?: string): Promise<MediaFile[]> {
    const out: MediaFile[] = [];
    for (const key of this.keys(bucket)) {
      if (out.length >= maxCount) break;
      if (!isImageKey(key)) continue;
      if (extension && keyExtension(key) !== extension) continue;
      out.push(toMediaFile(key, this.bucket(bucket).get(key)?.length ?? 0, null));
    }
    return out;
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    const answer = this.bucket(bucket).has(key);
    const delay = this.existsDelays.get(bucket)?.shift() ?? 0;
    if (delay > 0) await sleep(delay);
    return answer;
  }

  async size(bucket: string, key: string): Promise<number | null> {
    return this.bucket(bucket).get(key)?.length ?? null;
  }

  async download(bucket: string, key: string, destDir: string, signal?: AbortSignal): Promise<string | null> {
    this.downloads.push(key);
    if (this.downloadDelayMs > 0) {
      try {
        await sleep(this.downloadDelayMs, undefined, { signal });
      } catch {
        return null;
      }
    }
    const body = this.bucket(bucket).get(key);
    if (this.failDownloads || !body || body.length === 0) return null;
    await fs.promises.mkdir(destDir, { recursive: true });
    const localPath = tempDownloadPath(destDir, key);
    await fs.promises.writeFile(localPath, body);
    return localPath;
  }

  async upload(localPath: string, bucket: string, key: string): Promise<boolean> {
    if (this.failUploads) return false;
    const body = await fs.promises.readFile(localPath);
    this.bucket(bucket).set(key, body);
    this.uploads.push({ bucket, key, size: body.length });
    return true;
  }

  async deleteLocal(localPath: string): Promise<void> {
    await fs.promises.rm(localPath, { force: true });
  }

  async ping(): Promise<boolean> {
    return this.pingOk;
  }
}
