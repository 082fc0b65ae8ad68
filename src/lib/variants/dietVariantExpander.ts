/**
 * Diet Variant Expander
 *
 * Scales a base list of food items into named portion variants.
 *
 * - gram / ml: continuous, 1 decimal
 * - piece / slice / cup / bowl: snapped to the unit increment, never below one increment
 * - spoon: left as is
 * - anything else: continuous, with a warning
 *
 * The per-unit calorie rate of the base item is preserved within rounding.
 */

import {
  isFoodUnit,
  type BaseFoodItem,
  type FoodUnit,
  type ScaledFoodItem,
  type VariantConfig,
} from '@/src/lib/plans/plans.types';
import { roundTo } from './rounding';

const DISCRETE_INCREMENTS: Partial<Record<FoodUnit, number>> = {
  piece: 0.5,
  slice: 1.0,
  cup: 0.5,
  bowl: 0.5,
};

const FIXED_UNITS: ReadonlySet<FoodUnit> = new Set(['spoon']);

export type DietVariants = Record<string, ScaledFoodItem[]>;

export type DietExpanderOptions = {
  /** Called once per unknown unit per expansion; defaults to console.warn */
  onUnknownUnit?: (item: BaseFoodItem) => void;
};

/**
 * Calories per unit of the base item. totalCalories wins over caloriesPerUnit.
 */
export function originalCalorieRate(item: BaseFoodItem): number {
  if (!(item.quantity > 0)) return 0;
  if (item.totalCalories !== undefined) {
    return item.totalCalories / item.quantity;
  }
  return item.caloriesPerUnit ?? 0;
}

export function scaleQuantity(
  quantity: number,
  unit: string,
  factor: number,
): number {
  if (isFoodUnit(unit)) {
    if (FIXED_UNITS.has(unit)) return quantity;

    const increment = DISCRETE_INCREMENTS[unit];
    if (increment !== undefined) {
      const snapped =
        Math.round((quantity * factor) / increment) * increment;
      return Math.max(increment, roundTo(snapped, 2));
    }
  }
  return roundTo(quantity * factor, 1);
}

export function scaleFoodItem(
  item: BaseFoodItem,
  variant: VariantConfig,
): ScaledFoodItem {
  const rate = originalCalorieRate(item);
  const quantity = scaleQuantity(item.quantity, item.unit, variant.scaleFactor);
  const totalCalories = roundTo(rate * quantity, 1);

  return {
    name: item.name,
    quantity,
    unit: item.unit,
    caloriesPerUnit: quantity > 0 ? roundTo(totalCalories / quantity, 2) : 0,
    totalCalories,
    variant: variant.name,
  };
}

/**
 * Expand base items into one scaled list per variant, keyed in variant order.
 */
export function expandDietVariants(
  items: BaseFoodItem[],
  variants: VariantConfig[],
  options: DietExpanderOptions = {},
): DietVariants {
  const warnUnknownUnit =
    options.onUnknownUnit ??
    ((item: BaseFoodItem) =>
      console.warn(
        `[VariantExpander] Unknown unit "${item.unit}" for "${item.name}", scaling continuously`,
      ));

  for (const item of items) {
    if (!isFoodUnit(item.unit)) warnUnknownUnit(item);
  }

  const result: DietVariants = {};
  for (const variant of variants) {
    result[variant.name] = items.map((item) => scaleFoodItem(item, variant));
  }
  return result;
}

/**
 * Sum of item calories, 1 decimal.
 */
export function totalItemCalories(items: ScaledFoodItem[]): number {
  return roundTo(
    items.reduce((sum, item) => sum + item.totalCalories, 0),
    1,
  );
}
