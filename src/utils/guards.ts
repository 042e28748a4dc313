/**
 * Runtime checks for values that arrive as untyped JSON.
 */

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isInteger = (value: unknown): value is number => Number.isInteger(value);

export const isNonNegativeInteger = (value: unknown): value is number =>
  Number.isInteger(value) && typeof value === 'number' && value >= 0;

export const isPositiveInteger = (value: unknown): value is number =>
  Number.isInteger(value) && typeof value === 'number' && value > 0;

export const isOneOf = <T extends string>(options: readonly T[]) =>
  (value: unknown): value is T =>
    typeof value === 'string' && options.some((option) => option === value);

/**
 * Map every element through `read`; undefined if any element is rejected or
 * the value is not an array.
 */
export function readArray<T>(value: unknown, read: (item: unknown) => T | undefined): T[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const out: T[] = [];
  for (const item of value) {
    const parsed = read(item);
    if (parsed === undefined) return undefined;
    out.push(parsed);
  }
  return out;
}
