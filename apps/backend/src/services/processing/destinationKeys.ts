import type { ProcessedVariant } from '@mediapress/api-contracts';

export const VARIANT_PREFIXES: Readonly<Record<ProcessedVariant, string>> = {
  compressed: 'compressed/',
  copied: 'copied/',
};

export function variantFor(compress: boolean): ProcessedVariant {
  return compress ? 'compressed' : 'copied';
}

/** `compressed/<key>` when compressing, `copied/<key>` otherwise. */
export function destinationKey(sourceKey: string, compress: boolean): string {
  return `${VARIANT_PREFIXES[variantFor(compress)]}${sourceKey}`;
}

export function allDestinationKeys(sourceKey: string): Array<{ variant: ProcessedVariant; key: string }> {
  return (['compressed', 'copied'] as const).map((variant) => ({
    variant,
    key: `${VARIANT_PREFIXES[variant]}${sourceKey}`,
  }));
}
