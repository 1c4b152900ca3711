export { MemcachedNodeClient } from "./adapters/memcached/memcached-node-client"
export type { MemcachedNodeClientOptions } from "./adapters/memcached/memcached-node-client"
export {
  MemcachedNodeClientFactory,
  memcachedBehaviorsSchema,
  parseMemcachedBehaviors,
} from "./adapters/memcached/memcached-node-client-factory"
export type {
  MemcachedBehaviors,
  MemcachedNodeClientFactoryDeps,
  MemcachedNodeClientFactoryOptions,
} from "./adapters/memcached/memcached-node-client-factory"
export { MemoryCluster } from "./adapters/memory/memory-cluster"
export type { MemoryClusterOptions } from "./adapters/memory/memory-cluster"
export { MemoryNodeClient, MemoryNodeClientFactory } from "./adapters/memory/memory-node-client"
export { ClusterCache, createClusterCache } from "./cluster-cache"
export type { ClusterCacheDeps } from "./cluster-cache"
export { DEFAULT_ENV_PREFIX, loadClusterCacheConfig } from "./config/load-config"
export type { ClusterCacheEnvConfig, LoadClusterCacheConfigOptions } from "./config/load-config"
export { normalizeBehaviors } from "./config/normalize-behaviors"
export { clusterCacheParamsSchema, parseClusterCacheParams } from "./config/params-schema"
export type { ClusterCacheParams, ClusterCacheSettings } from "./config/params-schema"
export {
  ContextClientStorage,
  createClientStorage,
  InstanceClientStorage,
} from "./core/client/client-storage"
export { NodeClientCache } from "./core/client/node-client-cache"
export { NoNodesClient } from "./core/client/no-nodes-client"
export {
  DEFAULT_DISCOVERY_TIMEOUT_MS,
  SocketClusterDiscovery,
} from "./core/discovery/socket-discovery"
export { parseClusterConfig } from "./core/discovery/protocol"
export { parseEndpoint, parseLocation } from "./core/endpoint/parse-location"
export { SelfHealingCache } from "./core/healing/self-healing-cache"
export type { CacheState } from "./core/healing/self-healing-cache"
export { withSelfHealing } from "./core/healing/with-self-healing"
export { MembershipCache } from "./core/membership/membership-cache"
export type { MembershipSnapshot } from "./core/membership/membership-cache"
export { SystemClock } from "./core/time/clock"
export type { Clock } from "./core/time/clock"
export * from "./errors"
export type { CacheBackend } from "./ports/cache-backend"
export type { CacheEntry } from "./ports/cache-entry"
export type { CacheKey } from "./ports/cache-key"
export type { CacheSetOptions, CacheTtl } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { ClientScope, ClientStorage, StoredClient } from "./ports/client-storage"
export type { ClusterDiscovery, DiscoveryRequest } from "./ports/cluster-discovery"
export type {
  CacheNode,
  ClusterConfig,
  ConfigurationEndpoint,
  NodeList,
} from "./ports/cluster-node"
export { formatNode } from "./ports/cluster-node"
export type { ClientBehaviors, NodeClient, NodeClientFactory } from "./ports/node-client"
export type { Milliseconds, Seconds } from "./ports/time"
