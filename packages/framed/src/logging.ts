import { createDefaultLogger } from '@framed-http/shared/config'
import type { Logger } from '@framed-http/shared/logger'

let shared: Logger | undefined

/**
 * Logger used when no logger is configured, built from LOG_LEVEL and
 * LOG_JSON on first use
 */
export function defaultLogger(): Logger {
  shared ??= createDefaultLogger()
  return shared
}
