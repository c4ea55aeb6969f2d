export { MapBackend, type MapBackendDeps } from "./adapters/map/map-backend"
export { MapStore } from "./adapters/map/map-store"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export { SingleSlotBackend, type SingleSlotBackendDeps } from "./adapters/single-slot/single-slot-backend"
export { clear, clearAll, invoke } from "./core/api"
export {
  createRegistryFromConfig,
  type LoadMemoConfigOptions,
  loadMemoConfig,
  type MemoConfig,
  memoConfigSchema,
  type RegistryFromConfigDeps,
} from "./core/config/memo-config"
export { type ConfigSource, EnvSource, type EnvSourceOptions, ObjectSource } from "./core/config/sources"
export { createCache, toCacheId } from "./core/create-cache"
export {
  type ErrorContext,
  isMemoError,
  MemoError,
  type MemoErrorCode,
  type SerializedMemoError,
} from "./core/errors/memo-error"
export { isExpired, toMilliseconds } from "./core/expiration/expiration"
export { type CanonicalArg, canonicalize, EMPTY_ARG } from "./core/keys/canonicalize"
export { argsKey, ownerPrefix, SINGLE_SLOT_KEY, sharedArgsKey } from "./core/keys/derive-key"
export { encodeKey } from "./core/keys/encode-key"
export { type Memoized, type MemoizeOptions, memoize } from "./core/memoize"
export {
  CacheRegistry,
  type CacheRegistryDeps,
  type CacheRegistryOptions,
  createCacheRegistry,
  matchesNamespace,
} from "./core/registry/cache-registry"
export { type Clock, SystemClock } from "./core/time/clock"
export type { Cache, ClearableCache } from "./ports/cache"
export type { CacheEntry, ResultValues } from "./ports/cache-entry"
export type { CacheId, NamespaceFilter } from "./ports/cache-id"
export type { CacheKey, OwnerPrefix } from "./ports/cache-key"
export type { CacheTtl, ComputeFn, CreateCacheOptions, EntryStoreSource } from "./ports/cache-options"
export type { CacheResult } from "./ports/cache-result"
export type { CacheStats } from "./ports/cache-stats"
export type { ClearScope } from "./ports/clear-scope"
export type { EntryStore } from "./ports/entry-store"
export type { LogContext, LogContextPatch, LogMeta } from "./ports/log-context"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
export type { StorageBackend } from "./ports/storage-backend"
export type { StorageKind } from "./ports/storage-kind"
export type { Milliseconds, Seconds } from "./ports/time"
