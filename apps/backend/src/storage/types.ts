import type { MediaFileDto } from '@mediapress/api-contracts';

export type MediaFile = MediaFileDto;

export interface ObjectStorage {
  kind: 's3' | 'local';

  /**
   * Image objects only, at most `maxCount`, optionally narrowed to one extension.
   * Listing errors yield an empty array.
   */
  list(bucket: string, maxCount: number, extension?: string): Promise<MediaFile[]>;

  /** False for a missing object and for any lookup error. */
  exists(bucket: string, key: string): Promise<boolean>;

  size(bucket: string, key: string): Promise<number | null>;

  /**
   * Downloads into `destDir` under a name no other task uses, keeping the key's extension.
   * Returns null on failure, including an empty object.
   */
  download(bucket: string, key: string, destDir: string, signal?: AbortSignal): Promise<string | null>;

  upload(localPath: string, bucket: string, key: string, signal?: AbortSignal): Promise<boolean>;

  /** Best-effort. */
  deleteLocal(localPath: string): Promise<void>;

  ping(bucket: string): Promise<boolean>;
}
