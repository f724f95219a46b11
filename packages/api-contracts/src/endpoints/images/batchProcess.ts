import { z } from 'zod';
import { QualityTierSchema } from '../../common/enums.js';
import { ExtensionFilterSchema, QueryBooleanSchema } from '../../common/query.js';
import { createSuccessSchema } from '../../common/responses.js';

export const BatchProcessQuerySchema = z.object({
  maxFiles: z.coerce.number().int().min(1).max(100).default(10),
  fileType: ExtensionFilterSchema.optional(),
  compress: QueryBooleanSchema.default(true),
  quality: QualityTierSchema.default('medium'),
});

export const BatchProcessResponseDataSchema = z.object({
  filesFound: z.number().int().min(0),
  filesQueued: z.number().int().min(0),
  filesAlreadyProcessed: z.number().int().min(0),
  filesRejected: z.number().int().min(0),
  compress: z.boolean(),
  quality: QualityTierSchema,
});

export const BatchProcessResponseSchema = createSuccessSchema(BatchProcessResponseDataSchema);

export type BatchProcessQuery = z.infer<typeof BatchProcessQuerySchema>;
export type BatchProcessResponse = z.infer<typeof BatchProcessResponseSchema>;
