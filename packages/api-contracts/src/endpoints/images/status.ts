import { z } from 'zod';
import { ObjectKeySchema } from '../../common/query.js';
import { createSuccessSchema } from '../../common/responses.js';
import { ProcessedVariantInfoSchema, TaskSummarySchema } from '../../entities/media.js';

export const ImageStatusParamsSchema = z.object({
  key: ObjectKeySchema,
});

export const ImageStatusResponseDataSchema = z.object({
  imageKey: z.string(),
  sourceExists: z.boolean(),
  sourceSize: z.number().int().min(0).nullable(),
  processed: z.boolean(),
  processedVariants: z.array(ProcessedVariantInfoSchema),
  compressionRatio: z.number().nullable(),
  task: TaskSummarySchema.nullable(),
});

export const ImageStatusResponseSchema = createSuccessSchema(ImageStatusResponseDataSchema);

export type ImageStatusParams = z.infer<typeof ImageStatusParamsSchema>;
export type ImageStatusResponse = z.infer<typeof ImageStatusResponseSchema>;
