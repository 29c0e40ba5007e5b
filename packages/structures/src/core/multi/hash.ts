/**
 * Maps an item to an unsigned 32-bit integer.
 */
export type HashFn<T> = (item: T) => number

/**
 * FNV-1a over UTF-16 code units with a murmur3-style final mix.
 */
export function hash32(str: string): number {
  let h = 0x811c9dc5
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i)
    h = Math.imul(h, 0x01000193)
  }

  h ^= h >>> 16
  h = Math.imul(h, 0x85ebca6b)
  h ^= h >>> 13
  h = Math.imul(h, 0xc2b2ae35)
  h ^= h >>> 16
  return h >>> 0
}

/**
 * Default routing hash: strings hash as-is, anything else by its JSON text.
 */
export function hashItem(item: unknown): number {
  return hash32(typeof item === "string" ? item : String(JSON.stringify(item)))
}
