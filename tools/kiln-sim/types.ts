// ==============================================================================
// KILN SIM TOOL TYPES
// Shared by the headless runner, the live-state server and its protocol.
// ==============================================================================

import type { ControllerConfigPatch, LogLevel, Sample, SimulationState } from '../../src'

// ----------------------------------------------------------
// TOOL CONFIGURATION
// ----------------------------------------------------------

export interface ToolConfig {
  /** WebSocket server host */
  host: string
  /** WebSocket server port */
  port: number
  /** Wall-clock period between ticks (ms) */
  tickPeriodMs: number
  /** Simulated seconds per tick */
  dtSec: number
  /** Minimum level printed by the tools */
  logLevel: LogLevel
  /** Most samples returned by one `history` request */
  historyLimit: number
}

export interface ToolConfigResult {
  config: ToolConfig
  errors: string[]
}

// ----------------------------------------------------------
// CLIENT -> SERVER
// ----------------------------------------------------------

export type ClientCommand =
  | { type: 'start' }
  | { type: 'stop' }
  | { type: 'reset', restoreDefaultConfig: boolean }
  | { type: 'configure', patch: ControllerConfigPatch }
  | { type: 'history', limit: number | null }

export type ParseResult =
  | { ok: true, command: ClientCommand }
  | { ok: false, error: string }

// ----------------------------------------------------------
// SERVER -> CLIENT
// ----------------------------------------------------------

export interface StateMessage {
  type: 'state'
  state: SimulationState
  /** Cosmetic drum angle in degrees */
  rotationDeg: number
  quality: string
}

export interface HistoryMessage {
  type: 'history'
  samples: readonly Sample[]
}

export interface AckMessage {
  type: 'ack'
  command: ClientCommand['type']
  status: string
}

export interface ErrorMessage {
  type: 'error'
  error: string
}

export interface ConditionMessage {
  type: 'condition'
  condition: string
  message: string
  tick: number
}

export type ServerMessage = StateMessage | HistoryMessage | AckMessage | ErrorMessage | ConditionMessage
