/**
 * Tool Configuration
 * Environment variables for the kiln-sim runner and live-state server
 */

import { fileURLToPath } from 'node:url'

import * as dotenv from 'dotenv'

import { CONFIG } from '../../src'
import type { LogLevel } from '../../src'

import type { ToolConfig, ToolConfigResult } from './types'

const ENV_PATH = fileURLToPath(new URL('../../.env', import.meta.url))

const LOG_LEVEL_NAMES: Partial<Record<string, LogLevel>> = {
  debug: CONFIG.LOG_LEVELS.DEBUG,
  info: CONFIG.LOG_LEVELS.INFO,
  warning: CONFIG.LOG_LEVELS.WARNING,
  warn: CONFIG.LOG_LEVELS.WARNING,
  critical: CONFIG.LOG_LEVELS.CRITICAL,
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  return Number(value)
}

/**
 * Build the tool configuration from an environment
 * Pure: reads only the env object it is given
 */
export function loadToolConfig(env: NodeJS.ProcessEnv): ToolConfigResult {
  const errors: string[] = []

  const levelName = (env.KILN_SIM_LOG_LEVEL || 'info').toLowerCase()
  const logLevel = LOG_LEVEL_NAMES[levelName]
  if (logLevel === undefined) {
    errors.push(`KILN_SIM_LOG_LEVEL must be one of debug, info, warning, critical (got ${levelName})`)
  }

  const config: ToolConfig = {
    host: env.KILN_SIM_HOST || '127.0.0.1',
    port: parseNumber(env.KILN_SIM_PORT, 8080),
    tickPeriodMs: parseNumber(env.KILN_SIM_TICK_PERIOD_MS, CONFIG.TICK_PERIOD_MS),
    dtSec: parseNumber(env.KILN_SIM_DT_SEC, CONFIG.TICK_DT_SEC),
    logLevel: logLevel ?? CONFIG.LOG_LEVELS.INFO,
    historyLimit: parseNumber(env.KILN_SIM_HISTORY_LIMIT, 600),
  }

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push('KILN_SIM_PORT must be an integer between 1 and 65535')
  }
  if (!Number.isInteger(config.tickPeriodMs) || config.tickPeriodMs < 10) {
    errors.push('KILN_SIM_TICK_PERIOD_MS must be an integer of at least 10')
  }
  if (!Number.isFinite(config.dtSec) || config.dtSec <= 0) {
    errors.push('KILN_SIM_DT_SEC must be a positive number')
  }
  if (!Number.isInteger(config.historyLimit) || config.historyLimit < 1) {
    errors.push('KILN_SIM_HISTORY_LIMIT must be a positive integer')
  }

  return { config, errors }
}

let cached: ToolConfig | undefined

/**
 * Load .env from the project root (once) and return the tool configuration
 * Exits the process on invalid settings
 */
export function getConfig(): ToolConfig {
  if (cached) return cached

  // ? override:true so .env values take precedence over inherited env vars
  dotenv.config({ path: ENV_PATH, override: true })

  const { config, errors } = loadToolConfig(process.env)
  if (errors.length > 0) {
    console.error('Configuration errors:')
    errors.forEach((error) => console.error(`  - ${error}`))
    process.exit(1)
  }

  cached = config
  return config
}
