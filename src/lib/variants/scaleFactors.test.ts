import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AppError } from '@/src/lib/errors/app-error';
import { buildVariantConfigs, generateScaleFactors } from './scaleFactors';

function isConfigError(error: unknown): boolean {
  return error instanceof AppError && error.code === 'PIPELINE_CONFIG_INVALID';
}

describe('generateScaleFactors', () => {
  it('returns the midpoint for a single variant', () => {
    assert.deepStrictEqual(generateScaleFactors(1, 0.7, 1.3), [1]);
  });

  it('returns both bounds for two variants', () => {
    assert.deepStrictEqual(generateScaleFactors(2, 0.8, 1.2), [0.8, 1.2]);
  });

  it('spreads factors linearly with inclusive bounds', () => {
    assert.deepStrictEqual(generateScaleFactors(3, 0.7, 1.3), [0.7, 1, 1.3]);
    assert.deepStrictEqual(
      generateScaleFactors(5, 0.5, 1.5),
      [0.5, 0.75, 1, 1.25, 1.5],
    );
  });

  it('is strictly increasing with exact endpoints for every N >= 2', () => {
    const ranges: Array<[number, number]> = [
      [0.5, 1.5],
      [0.7, 1.3],
      [0.9, 1.1],
      [0.33, 2.17],
    ];
    for (const [min, max] of ranges) {
      for (let n = 2; n <= 9; n++) {
        const factors = generateScaleFactors(n, min, max);
        assert.strictEqual(factors.length, n);
        assert.strictEqual(factors[0], min);
        assert.strictEqual(factors[n - 1], max);
        for (let i = 1; i < n; i++) {
          assert.ok(factors[i] > factors[i - 1], `${min}..${max} n=${n}`);
        }
      }
    }
  });

  it('keeps interior factors distinct in a narrow range', () => {
    const factors = generateScaleFactors(5, 1, 1.002);
    assert.strictEqual(factors[0], 1);
    assert.strictEqual(factors[4], 1.002);
    assert.strictEqual(factors[2], 1.001);
    for (let i = 1; i < factors.length; i++) {
      assert.ok(factors[i] > factors[i - 1], `index ${i}`);
    }
  });

  it('does not round interior factors that are not near a 3-decimal value', () => {
    const [, second] = generateScaleFactors(4, 1, 1.001);
    assert.ok(Math.abs(second - (1 + 0.001 / 3)) < 1e-12);
  });

  it('returns repeated factors when min equals max', () => {
    assert.deepStrictEqual(generateScaleFactors(3, 1, 1), [1, 1, 1]);
  });

  it('rejects min greater than max', () => {
    assert.throws(() => generateScaleFactors(3, 1.3, 0.7), isConfigError);
  });

  it('rejects a non-positive or fractional variant count', () => {
    assert.throws(() => generateScaleFactors(0, 0.7, 1.3), isConfigError);
    assert.throws(() => generateScaleFactors(2.5, 0.7, 1.3), isConfigError);
  });

  it('rejects non-positive scales', () => {
    assert.throws(() => generateScaleFactors(2, 0, 1.3), isConfigError);
    assert.throws(() => generateScaleFactors(2, Number.NaN, 1.3), isConfigError);
  });
});

describe('buildVariantConfigs', () => {
  it('names variants positionally', () => {
    assert.deepStrictEqual(
      buildVariantConfigs({ variantCount: 3, minScale: 0.7, maxScale: 1.3 }),
      [
        { name: 'Variant_1', scaleFactor: 0.7 },
        { name: 'Variant_2', scaleFactor: 1 },
        { name: 'Variant_3', scaleFactor: 1.3 },
      ],
    );
  });
});
