/**
 * Environment configuration
 * Validates LOG_LEVEL and LOG_JSON with zod and builds the logger from them
 */

import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'
import { ErrorCode, FramedError, displayError, isFramedError } from '../errors'
import { LogLevel, createLogger, type Logger, type LoggerConfig } from '../logger'

export const FramedConfigSchema = z.object({
  LOG_LEVEL: z
    .string()
    .optional()
    .transform(value => (value ?? LogLevel.INFO).toLowerCase())
    .pipe(z.nativeEnum(LogLevel)),
  LOG_JSON: z
    .enum(['true', 'false'])
    .optional()
    .transform(value => value === 'true'),
})

export interface FramedConfig {
  logLevel: LogLevel
  logJson: boolean
}

/**
 * Parse configuration from an environment record
 * @throws FramedError with INVALID_CONFIG when a variable is malformed
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): FramedConfig {
  const result = FramedConfigSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL,
    LOG_JSON: env.LOG_JSON,
  })

  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue ? issue.path.join('.') : 'unknown'
    throw new FramedError(`Invalid configuration: ${field}`, ErrorCode.INVALID_CONFIG, {
      details: {
        field,
        value: env[field],
        constraint: issue?.message ?? 'invalid value',
      },
    })
  }

  return {
    logLevel: result.data.LOG_LEVEL,
    logJson: result.data.LOG_JSON,
  }
}

/**
 * Load a .env file into process.env, then parse it
 */
export function loadEnvFile(path: string): FramedConfig {
  const { error } = loadDotenv({ path })
  if (error) {
    throw new FramedError(`Failed to read env file ${path}`, ErrorCode.INVALID_CONFIG, {
      details: { field: 'path', value: path, constraint: error.message },
      cause: error,
    })
  }
  return loadConfig(process.env)
}

export function createLoggerFromConfig(
  config: FramedConfig,
  overrides: Partial<LoggerConfig> = {}
): Logger {
  return createLogger({
    level: config.logLevel,
    enableJson: config.logJson,
    ...overrides,
  })
}

/**
 * Build a logger from the environment. Invalid settings fall back to the
 * defaults and are reported as a warning on the returned logger.
 */
export function createDefaultLogger(env: Record<string, string | undefined> = process.env): Logger {
  try {
    return createLoggerFromConfig(loadConfig(env))
  } catch (error) {
    if (!isFramedError(error)) {
      throw error
    }
    const logger = createLogger()
    logger.warn(`Falling back to default logging: ${displayError(error)}`, {
      code: error.code,
    })
    return logger
  }
}
