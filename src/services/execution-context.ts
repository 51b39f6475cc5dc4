/**
 * Service context construction and logger wiring for format validators
 * @module services/execution-context
 */

import type { ServiceContext, Logger } from './types.js'

/**
 * Options for {@link buildServiceContext}
 */
export interface ExecutionContextOptions {
  /** Receives validator logs; `console` satisfies the interface */
  logger?: Logger
  /** Checked before each validation starts */
  signal?: AbortSignal
  correlationId?: string
  caller?: string
}

let correlationSequence = 0

/**
 * Generates a correlation ID of the form `fmt-<time>-<sequence>`, unique
 * within the process
 */
export function generateCorrelationId(): string {
  correlationSequence += 1
  return `fmt-${Date.now().toString(36)}-${correlationSequence.toString(36)}`
}

/**
 * Builds the context a format validator executes in.
 * Validators build a bare one themselves when called without a context.
 *
 * @example
 * ```typescript
 * const context = buildServiceContext({ logger: console, caller: 'signup-form' })
 * await createFormatValidator('email').execute({ field: 'email', value }, context)
 * ```
 */
export function buildServiceContext(
  options: ExecutionContextOptions = {}
): ServiceContext {
  return {
    metadata: {
      correlationId: options.correlationId ?? generateCorrelationId(),
      startedAt: new Date(),
      caller: options.caller,
    },
    logger: options.logger,
    signal: options.signal,
  }
}

/**
 * Creates a logger that discards everything
 */
export function createSilentLogger(): Logger {
  const discard = (): void => {}
  return { debug: discard, info: discard, warn: discard, error: discard }
}

/**
 * Creates a logger that tags each message with `[prefix]`
 */
export function createPrefixedLogger(prefix: string, baseLogger: Logger): Logger {
  const tag = (message: string): string => `[${prefix}] ${message}`
  return {
    debug: (message, context) => baseLogger.debug(tag(message), context),
    info: (message, context) => baseLogger.info(tag(message), context),
    warn: (message, context) => baseLogger.warn(tag(message), context),
    error: (message, context) => baseLogger.error(tag(message), context),
  }
}

/**
 * The logger a validator writes to: the context's logger tagged with the
 * validator name, or a silent one when the context carries none.
 */
export function resolveServiceLogger(
  serviceName: string,
  context: ServiceContext
): Logger {
  return context.logger
    ? createPrefixedLogger(serviceName, context.logger)
    : createSilentLogger()
}
