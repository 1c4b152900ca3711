import Memcached from "memcached"

export type MemcachedCallback<R> = (err: unknown, result: R) => void

/**
 * The part of the `memcached` client the adapter uses.
 */
export type MemcachedTextClient = {
  get(key: string, cb: MemcachedCallback<unknown>): void
  getMulti(keys: string[], cb: MemcachedCallback<Record<string, unknown> | undefined>): void
  set(key: string, value: unknown, lifetime: number, cb: MemcachedCallback<boolean>): void
  del(key: string, cb: MemcachedCallback<boolean>): void
  end(): void
}

export type MemcachedClientOptions = Memcached.options

export function createMemcachedClient(
  servers: string[],
  options: MemcachedClientOptions,
): MemcachedTextClient {
  return new Memcached(servers, options)
}
