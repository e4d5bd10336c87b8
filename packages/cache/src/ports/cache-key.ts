/**
 * CacheKey is a plain string. For image caches this is the normalized URL
 * (`new URL(input).href`), so spelling variants of one URL share an entry.
 *
 * @example
 * ```ts
 * const key: CacheKey = "https://cdn.example.com/avatars/42.png"
 * ```
 */
export type CacheKey = string
