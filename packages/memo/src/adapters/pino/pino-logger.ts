import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /**
   * Base pino logger to create children from (inherits its config).
   * When provided, this adapter only adds the context via `.child(...)`.
   */
  base?: PinoLoggerBase

  /**
   * Destination stream for pino output. Takes precedence over `prettify`.
   */
  destination?: DestinationStream
}

export class PinoLogger implements Logger {
  protected readonly logger: PinoLoggerBase

  constructor(
    protected readonly deps: PinoLoggerDeps = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.logger = this.init(context)
  }

  private init(context: LogContextPatch): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(context)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        !this.deps.destination && {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "hostname",
            },
          },
        }),
    }

    const root = this.deps.destination ? pino(pinoOpts, this.deps.destination) : pino(pinoOpts)

    return root.child(context)
  }

  trace(message: string, meta: LogMeta = {}): void {
    this.logger.trace(meta, message)
  }

  debug(message: string, meta: LogMeta = {}): void {
    this.logger.debug(meta, message)
  }

  info(message: string, meta: LogMeta = {}): void {
    this.logger.info(meta, message)
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.logger.warn(meta, message)
  }

  error(message: string, meta: LogMeta = {}): void {
    this.logger.error(meta, message)
  }

  fatal(message: string, meta: LogMeta = {}): void {
    this.logger.fatal(meta, message)
  }

  child(context: LogContextPatch): Logger {
    return new PinoLogger({ base: this.logger }, this.opts, context)
  }
}

export function createPinoLogger(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): Logger {
  return new PinoLogger(deps, opts, context)
}
