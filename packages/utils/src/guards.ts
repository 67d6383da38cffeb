/**
 * Type Guards
 */

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

export function isFiniteNonNegative(value: unknown): value is number {
  return isNumber(value) && Number.isFinite(value) && value >= 0;
}
