import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheNode, ConfigurationEndpoint } from "../../ports/cluster-node"

export const keys = {
  one(): CacheKey {
    return "k:one"
  },
  two(): CacheKey {
    return "k:two"
  },
  three(): CacheKey {
    return "k:three"
  },
}

export const values = {
  a(): string {
    return "value-a"
  },
  b(): string {
    return "value-b"
  },
  c(): string {
    return "value-c"
  },
}

export const nodes = {
  endpoint(): ConfigurationEndpoint {
    return { host: "cfg.example.com", port: 11211 }
  },
  first(): CacheNode {
    return { host: "10.0.0.1", port: 11211 }
  },
  second(): CacheNode {
    return { host: "10.0.0.2", port: 11211 }
  },
  third(): CacheNode {
    return { host: "10.0.0.3", port: 11211 }
  },
}

export const entry = <T>(key: CacheKey, value: T): CacheEntry<T> => {
  return [key, value]
}
