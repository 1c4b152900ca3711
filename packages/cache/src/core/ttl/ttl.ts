import type { CacheTtl } from "../../ports/cache-options"
import type { Milliseconds, Seconds } from "../../ports/time"

/**
 * memcached reads an expiration above this many seconds as an absolute unix
 * timestamp rather than a relative lifetime.
 */
export const MAX_RELATIVE_EXPIRATION_SECONDS: Seconds = 60 * 60 * 24 * 30

export function remainingMs(ttl: CacheTtl, nowMs: Milliseconds): Milliseconds {
  switch (ttl.kind) {
    case "seconds":
      return ttl.seconds * 1000
    case "milliseconds":
      return ttl.milliseconds
    case "until":
      return ttl.expiresAt.getTime() - nowMs
  }
}

export function expiresAtMs(ttl: CacheTtl, nowMs: Milliseconds): Milliseconds {
  return nowMs + remainingMs(ttl, nowMs)
}

/**
 * The memcached `exptime` for a ttl.
 *
 * - no ttl: `0`, the entry does not expire
 * - a lifetime that is already over: `-1`, the entry expires at once
 * - up to 30 days: whole seconds, rounded up
 * - longer: the unix time of expiry
 */
export function toExpirationSeconds(ttl: CacheTtl | undefined, nowMs: Milliseconds): Seconds {
  if (ttl === undefined) return 0

  const ms = remainingMs(ttl, nowMs)
  if (ms <= 0) return -1

  const seconds = Math.ceil(ms / 1000)
  if (seconds <= MAX_RELATIVE_EXPIRATION_SECONDS) return seconds

  return Math.ceil((nowMs + ms) / 1000)
}
