/**
 * Live-state server protocol
 * Pure parsing and formatting of WebSocket messages (JSON text frames)
 */

import { isControlMode } from '../../src'
import type { ControllerConfigPatch, Sample, SimulationState } from '../../src'

import type {
  ClientCommand,
  HistoryMessage,
  ParseResult,
  ServerMessage,
  StateMessage,
} from './types'

type Parsed<T> = { ok: true, value: T } | { ok: false, error: string }

const GAIN_KEYS = ['kp', 'ki', 'kd'] as const
const BOUND_KEYS = ['min', 'max'] as const
const PATCH_KEYS = ['setpoint', 'gains', 'outputBounds', 'manualOutput', 'mode'] as const

// ----------------------------------------------------------
// NARROWING HELPERS
// ----------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isOneOf<K extends string>(key: string, keys: readonly K[]): key is K {
  return keys.some((candidate) => candidate === key)
}

function pickNumbers<K extends string>(
  source: unknown,
  keys: readonly K[],
  path: string,
): Parsed<Partial<Record<K, number>>> {
  if (!isRecord(source)) return { ok: false, error: `${path} must be an object` }

  const out: Partial<Record<K, number>> = {}
  for (const key of Object.keys(source)) {
    if (!isOneOf(key, keys)) return { ok: false, error: `unknown field ${path}.${key}` }
    const value = source[key]
    if (typeof value !== 'number') return { ok: false, error: `${path}.${key} must be a number` }
    out[key] = value
  }
  return { ok: true, value: out }
}

// ----------------------------------------------------------
// CLIENT -> SERVER
// ----------------------------------------------------------

/**
 * Parse a controller patch
 * Only shapes are checked here; value ranges are the driver's call (INVALID_CONFIG)
 */
export function parsePatch(source: unknown): Parsed<ControllerConfigPatch> {
  if (!isRecord(source)) return { ok: false, error: 'patch must be an object' }

  const patch: ControllerConfigPatch = {}
  for (const key of Object.keys(source)) {
    if (!isOneOf(key, PATCH_KEYS)) return { ok: false, error: `unknown field patch.${key}` }
  }

  for (const key of ['setpoint', 'manualOutput'] as const) {
    const value = source[key]
    if (value === undefined) continue
    if (typeof value !== 'number') return { ok: false, error: `patch.${key} must be a number` }
    patch[key] = value
  }

  if (source.gains !== undefined) {
    const gains = pickNumbers(source.gains, GAIN_KEYS, 'patch.gains')
    if (!gains.ok) return gains
    patch.gains = gains.value
  }

  if (source.outputBounds !== undefined) {
    const bounds = pickNumbers(source.outputBounds, BOUND_KEYS, 'patch.outputBounds')
    if (!bounds.ok) return bounds
    patch.outputBounds = bounds.value
  }

  if (source.mode !== undefined) {
    if (!isControlMode(source.mode)) return { ok: false, error: 'patch.mode must be AUTO or MANUAL' }
    patch.mode = source.mode
  }

  return { ok: true, value: patch }
}

/**
 * Parse one client frame into a command
 */
export function parseCommand(raw: string): ParseResult {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    return { ok: false, error: 'invalid JSON' }
  }

  if (!isRecord(data)) {
    return { ok: false, error: 'message must be an object with a string "type"' }
  }
  const type = data.type
  if (typeof type !== 'string') {
    return { ok: false, error: 'message must be an object with a string "type"' }
  }

  switch (type) {
    case 'start':
    case 'stop':
      return { ok: true, command: { type } }

    case 'reset': {
      const restore = data.restoreDefaultConfig
      if (restore !== undefined && typeof restore !== 'boolean') {
        return { ok: false, error: 'restoreDefaultConfig must be a boolean' }
      }
      return { ok: true, command: { type: 'reset', restoreDefaultConfig: restore === true } }
    }

    case 'configure': {
      const patch = parsePatch(data.patch)
      if (!patch.ok) return { ok: false, error: patch.error }
      return { ok: true, command: { type: 'configure', patch: patch.value } }
    }

    case 'history': {
      const limit = data.limit
      if (limit === undefined) return { ok: true, command: { type: 'history', limit: null } }
      if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 1) {
        return { ok: false, error: 'limit must be a positive integer' }
      }
      return { ok: true, command: { type: 'history', limit } }
    }

    default:
      return { ok: false, error: `unknown command ${type}` }
  }
}

// ----------------------------------------------------------
// SERVER -> CLIENT
// ----------------------------------------------------------

export function stateMessage(state: SimulationState, rotationDeg: number, quality: string): StateMessage {
  return { type: 'state', state, rotationDeg, quality }
}

/**
 * History reply holding at most `limit` newest samples, oldest first
 */
export function historyMessage(samples: readonly Sample[], limit: number): HistoryMessage {
  return { type: 'history', samples: samples.length > limit ? samples.slice(samples.length - limit) : samples }
}

export function serialize(message: ServerMessage): string {
  return JSON.stringify(message)
}

/**
 * Effective history limit: the request's, capped by the server's
 */
export function resolveHistoryLimit(command: Extract<ClientCommand, { type: 'history' }>, serverLimit: number): number {
  return command.limit === null ? serverLimit : Math.min(command.limit, serverLimit)
}
