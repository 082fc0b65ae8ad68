/**
 * Variant scale factors
 *
 * Shared by the diet and exercise expanders. Factors are non-decreasing and
 * named positionally (Variant_1..Variant_N).
 */

import { AppError } from '@/src/lib/errors/app-error';
import type { VariantConfig } from '@/src/lib/plans/plans.types';
import { roundTo } from './rounding';

export type ScaleRange = {
  variantCount: number;
  minScale: number;
  maxScale: number;
};

export function assertValidScaleRange({
  variantCount,
  minScale,
  maxScale,
}: ScaleRange): void {
  if (!Number.isInteger(variantCount) || variantCount < 1) {
    throw new AppError(
      'PIPELINE_CONFIG_INVALID',
      'Variant count must be a positive integer',
      { variantCount },
    );
  }
  if (
    !Number.isFinite(minScale) ||
    !Number.isFinite(maxScale) ||
    minScale <= 0 ||
    maxScale <= 0
  ) {
    throw new AppError(
      'PIPELINE_CONFIG_INVALID',
      'Scale bounds must be positive numbers',
      { minScale, maxScale },
    );
  }
  if (minScale > maxScale) {
    throw new AppError(
      'PIPELINE_CONFIG_INVALID',
      'minScale must not exceed maxScale',
      { minScale, maxScale },
    );
  }
}

const SNAP_TOLERANCE = 1e-9;

/**
 * Float noise such as 1.0000000000000002 snaps to the nearby 3-decimal value,
 * unless snapping would leave the open interval (lower, upper).
 */
function snapFactor(value: number, lower: number, upper: number): number {
  const snapped = roundTo(value, 3);
  if (Math.abs(value - snapped) >= SNAP_TOLERANCE) return value;
  return snapped > lower && snapped < upper ? snapped : value;
}

/**
 * N=1 gives the midpoint, N=2 the two bounds, N>=3 an inclusive linear spread.
 * Interior factors keep the exact interpolated value, so the sequence is
 * strictly increasing whenever minScale < maxScale.
 */
export function generateScaleFactors(
  variantCount: number,
  minScale: number,
  maxScale: number,
): number[] {
  assertValidScaleRange({ variantCount, minScale, maxScale });

  if (variantCount === 1) {
    const midpoint = (minScale + maxScale) / 2;
    return [
      minScale === maxScale
        ? midpoint
        : snapFactor(midpoint, minScale, maxScale),
    ];
  }

  const step = (maxScale - minScale) / (variantCount - 1);
  const factors: number[] = [];
  for (let i = 0; i < variantCount; i++) {
    if (i === 0) {
      factors.push(minScale);
    } else if (i === variantCount - 1) {
      factors.push(maxScale);
    } else {
      factors.push(
        snapFactor(minScale + step * i, factors[i - 1], maxScale),
      );
    }
  }
  return factors;
}

export function variantName(index: number): string {
  return `Variant_${index + 1}`;
}

export function buildVariantConfigs(range: ScaleRange): VariantConfig[] {
  return generateScaleFactors(
    range.variantCount,
    range.minScale,
    range.maxScale,
  ).map((scaleFactor, index) => ({ name: variantName(index), scaleFactor }));
}
