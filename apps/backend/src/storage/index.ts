import type { AppConfig } from '../config/env.js';
import { LocalObjectStorage } from './localStorage.js';
import { S3ObjectStorage } from './s3Storage.js';
import type { ObjectStorage } from './types.js';

export type { MediaFile, ObjectStorage } from './types.js';

export function createObjectStorage(config: Pick<AppConfig, 'storage' | 's3'>): ObjectStorage {
  if (config.storage.driver === 'local') {
    return new LocalObjectStorage(config.storage.localRoot);
  }
  return new S3ObjectStorage(config.s3);
}
