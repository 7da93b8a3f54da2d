/**
 * Menu item sorting: single fields or a nutrient ratio ("protein/calories")
 */

export const SINGLE_SORT_FIELDS = [
  'restaurant_distance', 'price', 'calories', 'protein', 'carbs',
  'fat', 'fiber', 'sugar', 'sodium', 'name'
] as const;

export const RATIO_FIELDS = [
  'protein', 'carbs', 'fat', 'fiber', 'sugar', 'sodium', 'calories', 'price'
] as const;

export const SORT_ORDERS = ['asc', 'desc'] as const;

export type SingleSortField = typeof SINGLE_SORT_FIELDS[number];
export type RatioField = typeof RATIO_FIELDS[number];
export type SortOrder = typeof SORT_ORDERS[number];

export type SortSpec =
  | { kind: 'field'; field: SingleSortField }
  | { kind: 'ratio'; numerator: RatioField; denominator: RatioField };

export interface SortableMenuItem {
  name: string;
  price: number | null;
  calories: number | null;
  protein: number | null;
  carbs: number | null;
  fat: number | null;
  fiber: number | null;
  sugar: number | null;
  sodium: number | null;
  restaurant_distance_km?: number | null;
}

export interface CalculatedRatio {
  /** +Infinity is serialised as null by JSON.stringify */
  value: number;
  numerator: RatioField;
  denominator: RatioField;
  display: string;
}

export class SortSpecError extends Error {
  constructor(message: string, public readonly accepted: readonly string[]) {
    super(message);
    this.name = 'SortSpecError';
  }
}

function isRatioField(value: string): value is RatioField {
  return RATIO_FIELDS.some(field => field === value);
}

/**
 * @throws SortSpecError with the accepted values when `raw` is not a known sort
 */
export function parseSortSpec(raw: string, allowed: readonly SingleSortField[] = SINGLE_SORT_FIELDS): SortSpec {
  const slash = raw.indexOf('/');
  if (slash >= 0) {
    const numerator = raw.slice(0, slash).trim();
    const denominator = raw.slice(slash + 1).trim();
    if (!isRatioField(numerator) || !isRatioField(denominator)) {
      throw new SortSpecError(
        `Invalid ratio fields. Both numerator and denominator must be one of: ${RATIO_FIELDS.join(', ')}`,
        RATIO_FIELDS
      );
    }
    return { kind: 'ratio', numerator, denominator };
  }

  const field = allowed.find(candidate => candidate === raw.trim());
  if (!field) {
    throw new SortSpecError(
      `Invalid sort_by. Must be one of: ${allowed.join(', ')} or a ratio like 'protein/fat'`,
      allowed
    );
  }
  return { kind: 'field', field };
}

export function parseSortOrder(raw: string): SortOrder {
  const order = SORT_ORDERS.find(candidate => candidate === raw.trim().toLowerCase());
  if (!order) {
    throw new SortSpecError(`Invalid sort_order. Must be one of: ${SORT_ORDERS.join(', ')}`, SORT_ORDERS);
  }
  return order;
}

/**
 * 0 when either side is missing; a zero denominator gives +Infinity for a
 * positive numerator and 0 otherwise.
 */
export function calculateRatio(item: SortableMenuItem, numerator: RatioField, denominator: RatioField): number {
  const top = item[numerator];
  const bottom = item[denominator];
  if (top === null || bottom === null) return 0;
  if (bottom === 0) return top > 0 ? Number.POSITIVE_INFINITY : 0;
  return top / bottom;
}

export function describeRatio(item: SortableMenuItem, spec: Extract<SortSpec, { kind: 'ratio' }>): CalculatedRatio {
  return {
    value: calculateRatio(item, spec.numerator, spec.denominator),
    numerator: spec.numerator,
    denominator: spec.denominator,
    display: `${spec.numerator}/${spec.denominator}`
  };
}

function sortKey(item: SortableMenuItem, spec: SortSpec): number | string {
  if (spec.kind === 'ratio') {
    return calculateRatio(item, spec.numerator, spec.denominator);
  }
  switch (spec.field) {
    case 'restaurant_distance':
      return item.restaurant_distance_km ?? Number.POSITIVE_INFINITY;
    case 'price':
      // Unpriced items go last in ascending order
      return item.price || Number.POSITIVE_INFINITY;
    case 'name':
      return item.name.toLowerCase();
    default:
      return item[spec.field] ?? 0;
  }
}

function compareKeys(a: number | string, b: number | string): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  const left = String(a);
  const right = String(b);
  return left === right ? 0 : left < right ? -1 : 1;
}

/**
 * Stable sort; `order` applies to every key
 */
export function sortMenuItems<T extends SortableMenuItem>(items: readonly T[], spec: SortSpec, order: SortOrder): T[] {
  const direction = order === 'desc' ? -1 : 1;
  return items
    .map((item, index) => ({ item, index, key: sortKey(item, spec) }))
    .sort((a, b) => direction * compareKeys(a.key, b.key) || a.index - b.index)
    .map(entry => entry.item);
}
