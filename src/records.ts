/**
 * Field-keyed records without a prototype, so every field id is stored as
 * an own key. On a plain object, assigning `__proto__` replaces the
 * prototype instead.
 */
export function createRecord<T>(
  entries: Iterable<readonly [string, T]> = []
): Record<string, T> {
  const record: Record<string, T> = Object.create(null);
  for (const [key, value] of entries) {
    record[key] = value;
  }
  return record;
}
