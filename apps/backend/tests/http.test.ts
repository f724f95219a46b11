import path from 'path';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app.js';
import { CompressionService } from '../src/services/compression/CompressionService.js';
import { ProcessingPool } from '../src/services/processing/ProcessingPool.js';
import { TaskRegistry } from '../src/services/processing/TaskRegistry.js';
import { ProcessingOrchestrator } from '../src/services/processing/ProcessingOrchestrator.js';
import { MemoryStorage } from './helpers/memoryStorage.js';
import { makeTempDir, removeDir } from './helpers/media.js';
import { StubCompressor } from './helpers/stubCompressor.js';

describe('HTTP API', () => {
  let dir: string;
  let storage: MemoryStorage;
  let pool: ProcessingPool;

  beforeEach(async () => {
    dir = await makeTempDir();
    storage = new MemoryStorage();
    storage.put('originals', 'animals/fox.jpg', Buffer.alloc(1000, 1));
    storage.put('originals', 'b.png', Buffer.alloc(10, 1));
  });

  afterEach(async () => {
    await pool.shutdown(1_000);
    await removeDir(dir);
  });

  function buildApp(opts: { rateLimitPerMinute?: number; jsonBodyLimit?: string } = {}) {
    pool = new ProcessingPool({ concurrency: 2, maxQueue: 10, taskTimeoutMs: 5_000 });
    const orchestrator = new ProcessingOrchestrator({
      storage,
      compression: new CompressionService([new StubCompressor('image', ['.jpg', '.png'], path.join(dir, 'out'))]),
      pool,
      registry: new TaskRegistry(),
      settings: {
        sourceBucket: 'originals',
        destBucket: 'processed',
        workDir: path.join(dir, 'tasks'),
        maxCompressFileSize: 1_000_000,
        minCompressionSaving: 0.05,
        dedupeAcrossVariants: false,
        video: { codec: 'libx264', preset: 'medium', crf: 23, audioBitrate: '96k', skipThresholdBytes: 5_000_000 },
      },
    });
    return createApp({
      orchestrator,
      http: {
        jsonBodyLimit: opts.jsonBodyLimit ?? '1mb',
        rateLimitPerMinute: opts.rateLimitPerMinute ?? 100,
        corsOrigins: [],
        logSampleRate: 0,
        logSlowMs: 60_000,
      },
    });
  }

  it('describes the service at the root', async () => {
    const res = await request(buildApp()).get('/');
    expect(res.status).toBe(200);
    expect(res.body.service).toBe('mediapress');
    expect(res.body.status).toBe('running');
    expect(res.body.sourceBucket).toBe('originals');
    expect(res.body.destBucket).toBe('processed');
    expect(res.body.endpoints.processImage).toBe('/images/process/{key}');
  });

  it('reports health from the storage ping', async () => {
    const app = buildApp();
    const ok = await request(app).get('/health');
    expect(ok.status).toBe(200);
    expect(ok.body.status).toBe('healthy');
    expect(ok.body.storage).toBe('ok');
    expect(ok.body.pool).toEqual({ concurrency: 2, running: 0, queued: 0 });

    storage.pingOk = false;
    const down = await request(app).get('/health');
    expect(down.status).toBe(503);
    expect(down.body).toEqual({
      success: false,
      error: {
        code: 'STORAGE_UNAVAILABLE',
        message: 'Object storage is unavailable',
        details: { sourceBucket: 'originals', destBucket: 'processed' },
      },
    });
  });

  it('lists source images with a normalized filter', async () => {
    const res = await request(buildApp()).get('/images/list').query({ maxFiles: '5', fileType: 'JPG' });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      data: {
        bucket: 'originals',
        totalFiles: 1,
        maxRequested: 5,
        fileTypeFilter: '.jpg',
        files: [
          { key: 'animals/fox.jpg', filename: 'fox.jpg', size: 1000, lastModified: null, extension: '.jpg' },
        ],
      },
    });
  });

  it('rejects invalid query parameters', async () => {
    const res = await request(buildApp()).get('/images/list').query({ maxFiles: '0' });
    expect(res.status).toBe(400);
    expect(res.body.success).toBe(false);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
    expect(res.body.error.details.issues[0].path).toBe('maxFiles');
  });

  it('queues a nested key with 202 and skips it once processed', async () => {
    const app = buildApp();
    const queued = await request(app).post('/images/process/animals/fox.jpg').query({ quality: 'high' });

    expect(queued.status).toBe(202);
    expect(queued.body.data).toEqual({
      sourceKey: 'animals/fox.jpg',
      destKey: 'compressed/animals/fox.jpg',
      action: 'queued',
      compressed: true,
      quality: 'high',
      taskId: expect.any(String),
      reason: null,
    });

    await pool.drain();
    const again = await request(app).post('/images/process/animals/fox.jpg');
    expect(again.status).toBe(200);
    expect(again.body.data.action).toBe('skipped');
    expect(again.body.data.reason).toBe('already_processed');
  });

  it('copies without compression when compress=false', async () => {
    const app = buildApp();
    const res = await request(app).post('/images/process/b.png').query({ compress: 'false' });
    await pool.drain();
    expect(res.body.data.destKey).toBe('copied/b.png');
    expect(storage.get('processed', 'copied/b.png')?.length).toBe(10);
  });

  it('returns 404 for a missing source image', async () => {
    const res = await request(buildApp()).post('/images/process/missing.jpg');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Image not found: missing.jpg', details: { key: 'missing.jpg' } },
    });
  });

  it('returns 400 for an unknown quality tier', async () => {
    const res = await request(buildApp()).post('/images/process/b.png').query({ quality: 'ultra' });
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('admits a batch and reports counts', async () => {
    storage.put('processed', 'compressed/b.png', Buffer.alloc(5, 1));
    const res = await request(buildApp()).post('/images/batch-process').query({ maxFiles: '5' });
    await pool.drain();
    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      filesFound: 2,
      filesQueued: 1,
      filesAlreadyProcessed: 1,
      filesRejected: 0,
      compress: true,
      quality: 'medium',
    });
  });

  it('reports the status of a processed image', async () => {
    const app = buildApp();
    await request(app).post('/images/process/animals/fox.jpg');
    await pool.drain();

    const res = await request(app).get('/images/status/animals/fox.jpg');
    expect(res.status).toBe(200);
    expect(res.body.data.processed).toBe(true);
    expect(res.body.data.compressionRatio).toBe(50);
    expect(res.body.data.processedVariants).toEqual([
      { variant: 'compressed', key: 'compressed/animals/fox.jpg', size: 500 },
    ]);
    expect(res.body.data.task.state).toBe('done');

    const missing = await request(app).get('/images/status/nope.jpg');
    expect(missing.status).toBe(404);
    expect(missing.body.error.message).toBe('Image not found in source bucket');
  });

  it('exposes compression capabilities', async () => {
    const res = await request(buildApp()).get('/compression/stats');
    expect(res.status).toBe(200);
    expect(res.body.data.defaultTier).toBe('medium');
    expect(res.body.data.supportedExtensions).toEqual({ image: ['.jpg', '.png'], video: [] });
    expect(res.body.data.tiers).toHaveLength(3);
  });

  it('answers unknown routes with the error envelope', async () => {
    const res = await request(buildApp()).get('/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, error: { code: 'NOT_FOUND', message: 'Route GET /nope not found' } });
  });

  it('maps malformed JSON to a bad request', async () => {
    const res = await request(buildApp())
      .post('/images/batch-process')
      .set('Content-Type', 'application/json')
      .send('{"maxFiles":');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: { code: 'BAD_REQUEST', message: 'Bad request' } });
  });

  it('keeps the body parser status for oversized bodies', async () => {
    const res = await request(buildApp({ jsonBodyLimit: '20b' }))
      .post('/images/batch-process')
      .set('Content-Type', 'application/json')
      .send(JSON.stringify({ maxFiles: 5, fileType: 'jpg', compress: true, quality: 'medium' }));
    expect(res.status).toBe(413);
    expect(res.body).toEqual({ success: false, error: { code: 'BAD_REQUEST', message: 'Bad request' } });
  });

  it('rate limits the processing routes', async () => {
    const app = buildApp({ rateLimitPerMinute: 1 });
    const first = await request(app).post('/images/process/b.png');
    const second = await request(app).post('/images/process/b.png');
    await pool.drain();

    expect(first.status).toBe(202);
    expect(second.status).toBe(429);
    expect(second.body.error.code).toBe('TOO_MANY_REQUESTS');

    // listing is not limited
    expect((await request(app).get('/images/list')).status).toBe(200);
  });

  it('echoes the caller request id', async () => {
    const res = await request(buildApp()).get('/').set('X-Request-Id', 'req-123');
    expect(res.headers['x-request-id']).toBe('req-123');
  });

  it('serves prometheus metrics', async () => {
    const res = await request(buildApp()).get('/metrics');
    expect(res.status).toBe(200);
    expect(res.text).toContain('# TYPE mediapress_http_request_duration_seconds histogram');
  });
});
