import { z } from 'zod';
import { CompressionMethodSchema, QualityTierSchema } from '../../common/enums.js';
import { createSuccessSchema } from '../../common/responses.js';
import { QualityPresetSchema } from '../../entities/media.js';

export const CompressionStatsResponseDataSchema = z.object({
  supportedExtensions: z.object({
    image: z.array(z.string()),
    video: z.array(z.string()),
  }),
  tiers: z.array(QualityPresetSchema),
  defaultTier: QualityTierSchema,
  methods: z.array(CompressionMethodSchema),
  video: z.object({
    codec: z.string(),
    preset: z.string(),
    crf: z.number().int(),
    audioBitrate: z.string(),
    skipThresholdBytes: z.number().int(),
  }),
  pool: z.object({
    concurrency: z.number().int(),
    running: z.number().int(),
    queued: z.number().int(),
  }),
});

export const CompressionStatsResponseSchema = createSuccessSchema(CompressionStatsResponseDataSchema);

export type CompressionStatsResponse = z.infer<typeof CompressionStatsResponseSchema>;
