/**
 * Resolves a `boolean | Partial<T>` option: `false` turns the feature off,
 * `true` or absent keeps every default.
 */
export function resolveToggle<T extends object>(value: boolean | Partial<T> | undefined): Partial<T> | null {
  if (value === false) return null;
  if (value === true || value === undefined) return {};
  return value;
}
