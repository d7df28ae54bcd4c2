/**
 * 1인당 GDP 소득 구간 분류
 * 각 구간은 하한 포함, 상한 미포함 (경계값은 상위 구간)
 */

import type { GdpCategory } from './types.js';

export const GDP_CATEGORY_BINS: ReadonlyArray<{ min: number; label: GdpCategory }> = [
  { min: 0, label: 'Low Income' },
  { min: 1000, label: 'Lower Middle' },
  { min: 5000, label: 'Upper Middle' },
  { min: 15000, label: 'High Income' },
  { min: 50000, label: 'Very High Income' },
];

export const GDP_CATEGORY_LABELS: readonly GdpCategory[] = GDP_CATEGORY_BINS.map(b => b.label);

export function categorize(gdpPerCapita: number | null): GdpCategory | null {
  if (gdpPerCapita === null || Number.isNaN(gdpPerCapita) || gdpPerCapita < 0) {
    return null;
  }

  let label: GdpCategory | null = null;
  for (const bin of GDP_CATEGORY_BINS) {
    if (gdpPerCapita >= bin.min) {
      label = bin.label;
    }
  }
  return label;
}
