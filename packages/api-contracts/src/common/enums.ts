import { z } from 'zod';

export const QualityTierSchema = z.enum(['low', 'medium', 'high']);

export const MediaFamilySchema = z.enum(['image', 'video']);

export const CompressionMethodSchema = z.enum([
  'external-encoder',
  'library-fallback',
  'stream-copy',
  'skip-copy',
  're-encode',
  'none',
]);

export const ProcessingActionSchema = z.enum(['skipped', 'queued', 'failed']);

export const TaskStateSchema = z.enum([
  'pending',
  'downloading',
  'compressing',
  'uploading',
  'cleaning_up',
  'done',
  'failed',
]);

export const ProcessedVariantSchema = z.enum(['compressed', 'copied']);

export type QualityTier = z.infer<typeof QualityTierSchema>;
export type MediaFamily = z.infer<typeof MediaFamilySchema>;
export type CompressionMethod = z.infer<typeof CompressionMethodSchema>;
export type ProcessingAction = z.infer<typeof ProcessingActionSchema>;
export type TaskState = z.infer<typeof TaskStateSchema>;
export type ProcessedVariant = z.infer<typeof ProcessedVariantSchema>;
