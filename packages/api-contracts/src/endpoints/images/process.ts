import { z } from 'zod';
import { ProcessingActionSchema, QualityTierSchema } from '../../common/enums.js';
import { ObjectKeySchema, QueryBooleanSchema } from '../../common/query.js';
import { createSuccessSchema } from '../../common/responses.js';

export const ProcessImageParamsSchema = z.object({
  key: ObjectKeySchema,
});

export const ProcessImageQuerySchema = z.object({
  compress: QueryBooleanSchema.default(true),
  quality: QualityTierSchema.default('medium'),
});

export const ProcessImageResponseDataSchema = z.object({
  sourceKey: z.string(),
  destKey: z.string(),
  action: ProcessingActionSchema,
  compressed: z.boolean(),
  quality: QualityTierSchema,
  taskId: z.string().nullable(),
  reason: z.string().nullable(),
});

export const ProcessImageResponseSchema = createSuccessSchema(ProcessImageResponseDataSchema);

export type ProcessImageParams = z.infer<typeof ProcessImageParamsSchema>;
export type ProcessImageQuery = z.infer<typeof ProcessImageQuerySchema>;
export type ProcessImageResponse = z.infer<typeof ProcessImageResponseSchema>;
