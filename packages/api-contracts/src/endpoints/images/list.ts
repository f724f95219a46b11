import { z } from 'zod';
import { ExtensionFilterSchema } from '../../common/query.js';
import { createSuccessSchema } from '../../common/responses.js';
import { MediaFileSchema } from '../../entities/media.js';

export const ListImagesQuerySchema = z.object({
  maxFiles: z.coerce.number().int().min(1).max(1000).default(50),
  fileType: ExtensionFilterSchema.optional(),
});

export const ListImagesResponseDataSchema = z.object({
  bucket: z.string(),
  totalFiles: z.number().int().min(0),
  maxRequested: z.number().int(),
  fileTypeFilter: z.string().nullable(),
  files: z.array(MediaFileSchema),
});

export const ListImagesResponseSchema = createSuccessSchema(ListImagesResponseDataSchema);

export type ListImagesQuery = z.infer<typeof ListImagesQuerySchema>;
export type ListImagesResponse = z.infer<typeof ListImagesResponseSchema>;
