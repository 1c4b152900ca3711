/**
 * CacheKey is a plain string.
 *
 * @remarks
 * Keys reach the cluster unchanged, so they must satisfy memcached's rules:
 * at most 250 bytes, no whitespace or control characters. Build them through
 * one helper per key family rather than interpolating at call sites.
 *
 * @example
 * ```ts
 * const key: CacheKey = "users.by-id:v1:123"
 * ```
 */
export type CacheKey = string
