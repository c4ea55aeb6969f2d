/**
 * A source of raw configuration values.
 *
 * A ConfigSource only *loads*; validation and coercion happen downstream.
 * Sources are applied in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "object:overrides"
   */
  readonly name: string

  /**
   * Load configuration values. Returning undefined for a key means "value not
   * provided".
   */
  load(): Promise<Record<string, unknown>>
}

export type EnvSourceOptions = {
  /** @default "MEMO_" */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Reads variables starting with `prefix` and strips the prefix from their names.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? "MEMO_"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return filtered
  }
}

export class ObjectSource implements ConfigSource {
  readonly name = "object:overrides"

  constructor(private readonly obj: Record<string, unknown>) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
