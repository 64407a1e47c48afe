/**
 * Push `value` into a hash-bucket map, creating the bucket if absent.
 */
export function bucket_push<T>(
  map: Map<number, T[]>,
  key: number,
  value: T,
): void {
  const bucket = map.get(key);
  if (bucket !== undefined) {
    bucket.push(value);
  } else {
    map.set(key, [value]);
  }
}

/**
 * Stable sort by a numeric key. Array.prototype.sort is stable since ES2019,
 * so equal keys keep their insertion order.
 */
export function stable_sort_by<T>(items: T[], key: (item: T) => number): T[] {
  return items.sort((a, b) => key(a) - key(b));
}
