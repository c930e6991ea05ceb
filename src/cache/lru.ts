import { LRUCache } from "lru-cache";

export function createLRUCache<
  K extends NonNullable<unknown>,
  V extends NonNullable<unknown>,
>(max = 500): LRUCache<K, V> {
  return new LRUCache<K, V>({ max });
}
