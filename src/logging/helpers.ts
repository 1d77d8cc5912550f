/**
 * Logging helper functions
 */

import type { FilterContext, LogLevel, LogLevels, SimClockReading } from './types';

/**
 * Format a kiln temperature, optionally next to its setpoint
 * @param value - Temperature in °C (null when not yet known)
 * @param setpoint - Setpoint to show alongside, if any
 * @returns e.g. "1342.5C" or "1342.5C (sp=1350.0C)"
 */
export function fmtTemp(value: number | null, setpoint?: number | null): string {
  if (value === null) return "n/a";

  let str = value.toFixed(1) + "C";

  if (setpoint !== undefined && setpoint !== null) {
    str = str + " (sp=" + setpoint.toFixed(1) + "C)";
  }

  return str;
}

/**
 * Format a percentage with one decimal place
 */
export function fmtPct(value: number): string {
  return value.toFixed(1) + "%";
}

/**
 * Simulated-time prefix for a log line: "[#12 t=12.0s] ", or "" without a reading
 */
export function formatClockStamp(reading: SimClockReading | null): string {
  if (reading === null) return "";
  return "[#" + reading.tick + " t=" + reading.time.toFixed(1) + "s] ";
}

/**
 * Prefix a message with its level tag and optional clock stamp
 *
 * DEBUG lines carry no icon; INFO, WARNING and CRITICAL get ℹ️, ⚠️ and 🚨.
 * Tags are padded to a common width so messages line up.
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels, stamp: string = ""): string {
  let tag = "[DEBUG]    ";
  if (level === logLevels.INFO) tag = "ℹ️ [INFO]     ";
  if (level === logLevels.WARNING) tag = "⚠️ [WARNING]  ";
  if (level === logLevels.CRITICAL) tag = "🚨 [CRITICAL] ";

  return tag + stamp + msg;
}

/**
 * Level gate plus INFO demotion
 *
 * A long-running server keeps WARNING and CRITICAL but stops INFO chatter once
 * the logger has been up for demoteHours, unless the level is DEBUG.
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  const demotable = level === logLevels.INFO && context.currentLevel > logLevels.DEBUG;
  return !(demotable && context.demoteHours > 0 && context.uptime > context.demoteHours * 3600);
}
