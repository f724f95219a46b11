import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

const flagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((v) => v === '1' || v === 'true' || v === 'yes' || v === 'on');

const envSchemaBase = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).optional().default(8000),
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  STORAGE_DRIVER: z.enum(['s3', 'local']).optional().default('s3'),
  LOCAL_STORAGE_ROOT: z.string().min(1).optional().default('./storage'),
  AWS_REGION: z.string().min(1).optional().default('eu-west-1'),
  AWS_ACCESS_KEY_ID: z.string().min(1).optional(),
  AWS_SECRET_ACCESS_KEY: z.string().min(1).optional(),
  S3_ENDPOINT: z.string().url().optional(),
  S3_FORCE_PATH_STYLE: flagSchema.optional(),
  SOURCE_BUCKET: z.string().min(1).optional().default('media-originals'),
  DEST_BUCKET: z.string().min(1).optional().default('media-compressed'),

  WORK_DIR: z.string().min(1).optional(),

  FFMPEG_PATH: z.string().min(1).optional(),
  FFMPEG_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(60 * 60_000).optional().default(90_000),
  FFMPEG_LOW_PRIORITY: flagSchema.optional(),

  VIDEO_CODEC: z.string().min(1).optional().default('libx264'),
  VIDEO_PRESET: z
    .enum(['ultrafast', 'superfast', 'veryfast', 'faster', 'fast', 'medium', 'slow', 'slower', 'veryslow'])
    .optional()
    .default('medium'),
  VIDEO_CRF: z.coerce.number().int().min(0).max(51).optional().default(23),
  VIDEO_AUDIO_BITRATE: z
    .string()
    .regex(/^\d+k$/, 'Expected a bitrate such as 96k')
    .optional()
    .default('96k'),
  VIDEO_SKIP_THRESHOLD_BYTES: z.coerce.number().int().min(0).optional().default(5_000_000),

  MAX_COMPRESS_FILE_SIZE: z.coerce.number().int().min(1).optional().default(100 * 1024 * 1024),
  MIN_COMPRESSION_SAVING: z.coerce.number().min(0).max(1).optional().default(0.05),

  PROCESSING_CONCURRENCY: z.coerce.number().int().min(1).max(64).optional(),
  PROCESSING_MAX_QUEUE: z.coerce.number().int().min(1).optional().default(1000),
  PROCESSING_TASK_TIMEOUT_MS: z.coerce.number().int().min(1_000).optional().default(10 * 60_000),
  DEDUPE_ACROSS_VARIANTS: flagSchema.optional(),

  JSON_BODY_LIMIT: z.string().min(1).optional().default('1mb'),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).optional().default(120),
  CORS_ORIGINS: z.string().min(1).optional(),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(0).optional().default(30_000),
  HTTP_LOG_SAMPLE_RATE: z.coerce.number().min(0).max(1).optional(),
  HTTP_LOG_SLOW_MS: z.coerce.number().int().min(0).optional(),
});

const envSchema = envSchemaBase.superRefine((env, ctx) => {
  if (env.SOURCE_BUCKET === env.DEST_BUCKET) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'SOURCE_BUCKET and DEST_BUCKET must differ',
      path: ['DEST_BUCKET'],
    });
  }
  if (env.NODE_ENV !== 'production' || env.STORAGE_DRIVER !== 's3') return;

  if (!env.S3_ENDPOINT && (!env.AWS_ACCESS_KEY_ID || !env.AWS_SECRET_ACCESS_KEY)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are required in production',
      path: ['AWS_ACCESS_KEY_ID'],
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export type AppConfig = {
  port: number;
  nodeEnv: Env['NODE_ENV'];
  storage: {
    driver: Env['STORAGE_DRIVER'];
    localRoot: string;
  };
  s3: {
    region: string;
    endpoint?: string;
    forcePathStyle: boolean;
    accessKeyId?: string;
    secretAccessKey?: string;
  };
  sourceBucket: string;
  destBucket: string;
  workDir: string;
  ffmpeg: {
    path?: string;
    timeoutMs: number;
    lowPriority: boolean;
  };
  video: {
    codec: string;
    preset: string;
    crf: number;
    audioBitrate: string;
    skipThresholdBytes: number;
  };
  processing: {
    concurrency: number;
    maxQueue: number;
    taskTimeoutMs: number;
    maxCompressFileSize: number;
    minCompressionSaving: number;
    dedupeAcrossVariants: boolean;
  };
  http: {
    jsonBodyLimit: string;
    rateLimitPerMinute: number;
    corsOrigins: string[];
    shutdownTimeoutMs: number;
    logSampleRate: number;
    logSlowMs: number;
  };
};

export class EnvValidationError extends Error {
  public readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(`Invalid environment: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    this.name = 'EnvValidationError';
    this.issues = issues;
  }
}

function blankToUndefined(source: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string' && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(blankToUndefined(source));
  if (!result.success) {
    throw new EnvValidationError(result.error.issues);
  }
  const env = result.data;
  const isProduction = env.NODE_ENV === 'production';

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    storage: {
      driver: env.STORAGE_DRIVER,
      localRoot: path.resolve(env.LOCAL_STORAGE_ROOT),
    },
    s3: {
      region: env.AWS_REGION,
      endpoint: env.S3_ENDPOINT,
      // custom endpoints (MinIO, R2) usually need path-style addressing
      forcePathStyle: env.S3_FORCE_PATH_STYLE ?? !!env.S3_ENDPOINT,
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    },
    sourceBucket: env.SOURCE_BUCKET,
    destBucket: env.DEST_BUCKET,
    workDir: path.resolve(env.WORK_DIR ?? path.join(os.tmpdir(), 'mediapress')),
    ffmpeg: {
      path: env.FFMPEG_PATH,
      timeoutMs: env.FFMPEG_TIMEOUT_MS,
      lowPriority: env.FFMPEG_LOW_PRIORITY ?? false,
    },
    video: {
      codec: env.VIDEO_CODEC,
      preset: env.VIDEO_PRESET,
      crf: env.VIDEO_CRF,
      audioBitrate: env.VIDEO_AUDIO_BITRATE,
      skipThresholdBytes: env.VIDEO_SKIP_THRESHOLD_BYTES,
    },
    processing: {
      concurrency: env.PROCESSING_CONCURRENCY ?? (isProduction ? 2 : 4),
      maxQueue: env.PROCESSING_MAX_QUEUE,
      taskTimeoutMs: env.PROCESSING_TASK_TIMEOUT_MS,
      maxCompressFileSize: env.MAX_COMPRESS_FILE_SIZE,
      minCompressionSaving: env.MIN_COMPRESSION_SAVING,
      dedupeAcrossVariants: env.DEDUPE_ACROSS_VARIANTS ?? false,
    },
    http: {
      jsonBodyLimit: env.JSON_BODY_LIMIT,
      rateLimitPerMinute: env.RATE_LIMIT_PER_MINUTE,
      corsOrigins: (env.CORS_ORIGINS ?? '')
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean),
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
      logSampleRate: env.HTTP_LOG_SAMPLE_RATE ?? (isProduction ? 0.05 : 1),
      logSlowMs: env.HTTP_LOG_SLOW_MS ?? (isProduction ? 1000 : 2000),
    },
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cached) return cached;
  try {
    cached = parseConfig(process.env);
  } catch (error) {
    if (error instanceof EnvValidationError) {
      logger.error('env.invalid', { issues: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) });
    }
    throw error;
  }
  return cached;
}
