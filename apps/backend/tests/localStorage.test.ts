import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocalObjectStorage } from '../src/storage/localStorage.js';
import { createObjectStorage } from '../src/storage/index.js';
import { makeTempDir, removeDir } from './helpers/media.js';

describe('LocalObjectStorage', () => {
  let root: string;
  let work: string;
  let storage: LocalObjectStorage;

  async function put(bucket: string, key: string, body: string) {
    const target = path.join(root, bucket, key);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, body);
  }

  beforeEach(async () => {
    root = await makeTempDir();
    work = await makeTempDir();
    storage = new LocalObjectStorage(root);
    await put('originals', 'a.jpg', 'aaa');
    await put('originals', 'sub/b.png', 'bbbbb');
    await put('originals', 'notes.txt', 'n');
    await put('originals', 'empty.jpg', '');
  });

  afterEach(async () => {
    await removeDir(root);
    await removeDir(work);
  });

  it('lists image keys recursively in name order', async () => {
    const files = await storage.list('originals', 10);
    expect(files.map((f) => f.key)).toEqual(['a.jpg', 'empty.jpg', 'sub/b.png']);
    expect(files[2]).toMatchObject({ key: 'sub/b.png', filename: 'b.png', size: 5, extension: '.png' });
    expect(typeof files[0].lastModified).toBe('string');
  });

  it('applies the extension filter before the limit', async () => {
    expect((await storage.list('originals', 1, '.png')).map((f) => f.key)).toEqual(['sub/b.png']);
    expect((await storage.list('originals', 1)).map((f) => f.key)).toEqual(['a.jpg']);
  });

  it('returns an empty list for a missing bucket', async () => {
    expect(await storage.list('nowhere', 10)).toEqual([]);
  });

  it('answers existence and size, refusing keys outside the bucket', async () => {
    expect(await storage.exists('originals', 'a.jpg')).toBe(true);
    expect(await storage.size('originals', 'sub/b.png')).toBe(5);
    expect(await storage.exists('originals', 'missing.jpg')).toBe(false);
    expect(await storage.exists('originals', '../outside.jpg')).toBe(false);
  });

  it('downloads to a unique path keeping the extension', async () => {
    const first = await storage.download('originals', 'a.jpg', work);
    const second = await storage.download('originals', 'a.jpg', work);

    expect(first).not.toBeNull();
    expect(first).not.toBe(second);
    expect(path.extname(first ?? '')).toBe('.jpg');
    expect(await fs.promises.readFile(first ?? '', 'utf8')).toBe('aaa');
  });

  it('returns null and leaves nothing behind for empty or missing objects', async () => {
    expect(await storage.download('originals', 'empty.jpg', work)).toBeNull();
    expect(await storage.download('originals', 'missing.jpg', work)).toBeNull();
    expect(await fs.promises.readdir(work)).toEqual([]);
  });

  it('does not download after an abort', async () => {
    const controller = new AbortController();
    controller.abort();
    expect(await storage.download('originals', 'a.jpg', work, controller.signal)).toBeNull();
  });

  it('uploads under nested keys', async () => {
    const local = path.join(work, 'x.jpg');
    await fs.promises.writeFile(local, 'payload');

    expect(await storage.upload(local, 'processed', 'compressed/sub/x.jpg')).toBe(true);
    expect(await fs.promises.readFile(path.join(root, 'processed', 'compressed', 'sub', 'x.jpg'), 'utf8')).toBe(
      'payload'
    );
    expect(await storage.upload(path.join(work, 'missing.jpg'), 'processed', 'y.jpg')).toBe(false);
  });

  it('creates the bucket directory on ping', async () => {
    expect(await storage.ping('processed')).toBe(true);
    expect(fs.statSync(path.join(root, 'processed')).isDirectory()).toBe(true);
  });
});

describe('createObjectStorage', () => {
  const s3 = { region: 'eu-west-1', forcePathStyle: false };

  it('selects the driver from config', () => {
    expect(createObjectStorage({ storage: { driver: 'local', localRoot: '/tmp/mediapress' }, s3 }).kind).toBe('local');
    expect(createObjectStorage({ storage: { driver: 's3', localRoot: '/tmp/mediapress' }, s3 }).kind).toBe('s3');
  });
});
