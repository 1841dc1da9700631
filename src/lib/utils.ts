export function cloneRecordMap<K, V extends object>(map: Map<K, V>): Map<K, V> {
  return new Map(Array.from(map, ([key, value]) => [key, { ...value }]));
}

export function toPositionKey(first: string, second: string | number): string {
  return `${first}-${second}`;
}
