import { z } from "zod"
import { PinoLogger, type PinoLoggerDeps } from "../../adapters/pino/pino-logger"
import type { CacheTtl } from "../../ports/cache-options"
import { type LogLevelName, logLevelNames } from "../../ports/log-level"
import { MemoError } from "../errors/memo-error"
import { CacheRegistry } from "../registry/cache-registry"
import type { Clock } from "../time/clock"
import { type ConfigSource, EnvSource } from "./sources"

export const memoConfigSchema = z.object({
  DEFAULT_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type MemoConfig = {
  /** Timeout for caches created without one; `undefined` means never expire. */
  defaultTimeoutMs: number | undefined
  logLevel: LogLevelName
  logPretty: boolean
}

export type LoadMemoConfigOptions = {
  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

/**
 * Merge `sources` in order (later wins) and validate the result.
 *
 * @example
 * ```ts
 * const config = await loadMemoConfig({
 *   sources: [new EnvSource(), new ObjectSource({ LOG_LEVEL: "debug" })],
 * })
 * const registry = createRegistryFromConfig(config)
 * ```
 */
export async function loadMemoConfig({ sources }: LoadMemoConfigOptions = {}): Promise<MemoConfig> {
  const merged: Record<string, unknown> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = memoConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new MemoError(`Configuration validation failed:\n${z.prettifyError(result.error)}`, {
      code: "invalid_config",
    })
  }

  return {
    defaultTimeoutMs: result.data.DEFAULT_TIMEOUT_MS,
    logLevel: result.data.LOG_LEVEL,
    logPretty: result.data.LOG_PRETTY,
  }
}

export type RegistryFromConfigDeps = {
  clock?: Clock

  /** Passed to the pino logger, e.g. to capture output in tests. */
  logger?: PinoLoggerDeps
}

export function createRegistryFromConfig(
  config: MemoConfig,
  deps: RegistryFromConfigDeps = {},
): CacheRegistry {
  const logger = new PinoLogger(deps.logger, {
    level: config.logLevel,
    prettify: config.logPretty,
  })

  const defaultTimeout: CacheTtl | undefined =
    config.defaultTimeoutMs === undefined
      ? undefined
      : { kind: "milliseconds", milliseconds: config.defaultTimeoutMs }

  return new CacheRegistry(
    { logger, ...(deps.clock && { clock: deps.clock }) },
    defaultTimeout === undefined ? {} : { defaultTimeout },
  )
}
