import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import {
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { S3ObjectStorage } from '../src/storage/s3Storage.js';
import { makeTempDir, removeDir } from './helpers/media.js';

function notFound(): S3ServiceException {
  return new S3ServiceException({ name: 'NotFound', $fault: 'client', $metadata: { httpStatusCode: 404 } });
}

describe('S3ObjectStorage', () => {
  let work: string;
  let client: S3Client;
  let storage: S3ObjectStorage;
  let respond: (command: unknown) => Promise<unknown>;
  const sent: unknown[] = [];

  beforeEach(async () => {
    work = await makeTempDir();
    sent.length = 0;
    client = new S3Client({ region: 'eu-west-1', credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' } });
    respond = async () => ({});
    vi.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
      sent.push(command);
      return respond(command);
    });
    storage = new S3ObjectStorage({ region: 'eu-west-1', forcePathStyle: false }, client);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(work);
  });

  it('pages through listings and keeps image keys only', async () => {
    respond = async (command) => {
      if (!(command instanceof ListObjectsV2Command)) throw new Error('unexpected command');
      if (!command.input.ContinuationToken) {
        return {
          Contents: [
            { Key: 'a.jpg', Size: 3, LastModified: new Date('2024-01-02T03:04:05.000Z') },
            { Key: 'folder/' },
            { Key: 'notes.txt', Size: 1 },
          ],
          IsTruncated: true,
          NextContinuationToken: 'page-2',
        };
      }
      return { Contents: [{ Key: 'b.png', Size: 5 }], IsTruncated: false };
    };

    const files = await storage.list('originals', 10);

    expect(files).toEqual([
      { key: 'a.jpg', filename: 'a.jpg', size: 3, lastModified: '2024-01-02T03:04:05.000Z', extension: '.jpg' },
      { key: 'b.png', filename: 'b.png', size: 5, lastModified: null, extension: '.png' },
    ]);
    expect(sent).toHaveLength(2);
  });

  it('stops listing once the limit is reached', async () => {
    respond = async () => ({
      Contents: [{ Key: 'a.jpg', Size: 1 }, { Key: 'b.jpg', Size: 1 }],
      IsTruncated: true,
      NextContinuationToken: 'more',
    });

    expect((await storage.list('originals', 1)).map((f) => f.key)).toEqual(['a.jpg']);
    expect(sent).toHaveLength(1);
  });

  it('returns an empty list when listing fails', async () => {
    respond = async () => {
      throw new Error('AccessDenied');
    };
    expect(await storage.list('originals', 10)).toEqual([]);
  });

  it('treats a 404 head as absent', async () => {
    respond = async (command) => {
      if (command instanceof HeadObjectCommand && command.input.Key === 'a.jpg') return { ContentLength: 42 };
      throw notFound();
    };

    expect(await storage.exists('originals', 'a.jpg')).toBe(true);
    expect(await storage.size('originals', 'a.jpg')).toBe(42);
    expect(await storage.exists('originals', 'b.jpg')).toBe(false);
    expect(await storage.size('originals', 'b.jpg')).toBeNull();
  });

  it('streams a download to a local file', async () => {
    respond = async (command) => {
      if (!(command instanceof GetObjectCommand)) throw new Error('unexpected command');
      return { Body: Readable.from([Buffer.from('hello')]) };
    };

    const localPath = await storage.download('originals', 'dir/fox.jpg', work);

    expect(localPath).not.toBeNull();
    expect(path.dirname(localPath ?? '')).toBe(work);
    expect(path.extname(localPath ?? '')).toBe('.jpg');
    expect(await fs.promises.readFile(localPath ?? '', 'utf8')).toBe('hello');
  });

  it('rejects an empty download without leaving a file', async () => {
    respond = async () => ({ Body: Readable.from([]) });

    expect(await storage.download('originals', 'fox.jpg', work)).toBeNull();
    expect(await fs.promises.readdir(work)).toEqual([]);
  });

  it('uploads with length and content type', async () => {
    const local = path.join(work, 'x.png');
    await fs.promises.writeFile(local, 'abcd');

    expect(await storage.upload(local, 'processed', 'compressed/x.png')).toBe(true);

    const put = sent[0];
    expect(put).toBeInstanceOf(PutObjectCommand);
    if (put instanceof PutObjectCommand) {
      expect(put.input.Bucket).toBe('processed');
      expect(put.input.Key).toBe('compressed/x.png');
      expect(put.input.ContentLength).toBe(4);
      expect(put.input.ContentType).toBe('image/png');
    }
  });

  it('omits the content type for unknown extensions and reports failures', async () => {
    const local = path.join(work, 'clip.mp4');
    await fs.promises.writeFile(local, 'v');

    expect(await storage.upload(local, 'processed', 'copied/clip.mp4')).toBe(true);
    const put = sent[0];
    if (put instanceof PutObjectCommand) expect(put.input.ContentType).toBeUndefined();

    respond = async () => {
      throw new Error('SlowDown');
    };
    expect(await storage.upload(local, 'processed', 'copied/clip.mp4')).toBe(false);
    expect(await storage.upload(path.join(work, 'missing.png'), 'processed', 'k.png')).toBe(false);
  });

  it('pings with a bucket head', async () => {
    expect(await storage.ping('processed')).toBe(true);
    expect(sent[0]).toBeInstanceOf(HeadBucketCommand);

    respond = async () => {
      throw notFound();
    };
    expect(await storage.ping('processed')).toBe(false);
  });
});
