import type { QualityPreset } from '@mediapress/api-contracts';
import { QualityTierSchema } from '@mediapress/api-contracts';
import { AppError } from '../../shared/errors.js';
import type { CompressionSettings, MediaFamily, QualityTier } from './types.js';

export const QUALITY_TIERS = QualityTierSchema.options;

export const DEFAULT_TIER: QualityTier = 'medium';

const PRESETS: Readonly<Record<QualityTier, Readonly<QualityPreset>>> = {
  low: {
    tier: 'low',
    lossyQuality: 75,
    losslessLevel: 9,
    encoderQuality: 3,
    description: 'Maximum compression, smaller files',
  },
  medium: {
    tier: 'medium',
    lossyQuality: 85,
    losslessLevel: 6,
    encoderQuality: 2,
    description: 'Balanced compression and quality',
  },
  high: {
    tier: 'high',
    lossyQuality: 95,
    losslessLevel: 3,
    encoderQuality: 1,
    description: 'Light compression, preserve quality',
  },
};

export function isQualityTier(value: unknown): value is QualityTier {
  return QualityTierSchema.safeParse(value).success;
}

export function parseQualityTier(value: unknown): QualityTier {
  const parsed = QualityTierSchema.safeParse(value);
  if (!parsed.success) {
    throw new AppError('VALIDATION_ERROR', `Quality must be one of: ${QUALITY_TIERS.join(', ')}`, {
      details: { quality: String(value) },
    });
  }
  return parsed.data;
}

export function listQualityPresets(): QualityPreset[] {
  return QUALITY_TIERS.map((tier) => ({ ...PRESETS[tier] }));
}

export function buildCompressionSettings(tier: QualityTier, family: MediaFamily): CompressionSettings {
  const preset = PRESETS[parseQualityTier(tier)];
  return Object.freeze({
    family,
    tier: preset.tier,
    lossyQuality: preset.lossyQuality,
    losslessLevel: preset.losslessLevel,
    encoderQuality: preset.encoderQuality,
  });
}
