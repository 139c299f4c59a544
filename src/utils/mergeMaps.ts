export function mergeMaps<K, V>(target: Map<K, V>, source: ReadonlyMap<K, V>): Map<K, V> {
  for (const [key, value] of source) {
    target.set(key, value);
  }
  return target;
}
