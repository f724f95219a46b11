import { z } from 'zod';
import { CompressionMethodSchema, ProcessedVariantSchema, QualityTierSchema, TaskStateSchema } from '../common/enums.js';

export const MediaFileSchema = z.object({
  key: z.string(),
  filename: z.string(),
  size: z.number().int().min(0),
  lastModified: z.string().datetime().nullable(),
  extension: z.string(),
});

export const QualityPresetSchema = z.object({
  tier: QualityTierSchema,
  lossyQuality: z.number().int().min(1).max(100),
  losslessLevel: z.number().int().min(0).max(9),
  encoderQuality: z.number().int().min(1).max(31),
  description: z.string(),
});

export const CompressionOutcomeSchema = z.object({
  success: z.boolean(),
  method: CompressionMethodSchema,
  originalSize: z.number().int().min(0),
  resultSize: z.number().int().min(0),
  compressionRatio: z.number(),
});

export const TaskSummarySchema = z.object({
  id: z.string(),
  destKey: z.string(),
  state: TaskStateSchema,
  tier: QualityTierSchema,
  compress: z.boolean(),
  queuedAt: z.string().datetime(),
  finishedAt: z.string().datetime().nullable(),
  outcome: CompressionOutcomeSchema.nullable(),
  errorMessage: z.string().nullable(),
});

export const ProcessedVariantInfoSchema = z.object({
  variant: ProcessedVariantSchema,
  key: z.string(),
  size: z.number().int().min(0).nullable(),
});

export type MediaFileDto = z.infer<typeof MediaFileSchema>;
export type QualityPreset = z.infer<typeof QualityPresetSchema>;
export type CompressionOutcomeDto = z.infer<typeof CompressionOutcomeSchema>;
export type TaskSummary = z.infer<typeof TaskSummarySchema>;
export type ProcessedVariantInfo = z.infer<typeof ProcessedVariantInfoSchema>;
