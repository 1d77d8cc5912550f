/**
 * Validation building blocks
 *
 * Checks append to an IssueCollector. Range checks hand back the narrowed
 * number, or null when the field failed, so cross-field rules only ever see
 * values that are individually sound.
 */

import { isFiniteNumber, isInteger } from '@utils/number';

import type { ConfigIssue, FieldRange, IssueCollector, ValidationResult } from './types';

export function createIssueCollector(): IssueCollector {
  const errors: ConfigIssue[] = [];
  const warnings: ConfigIssue[] = [];

  return {
    errors: errors,
    warnings: warnings,
    error: function(field: string, message: string) {
      errors.push({ level: 'CRITICAL', field: field, message: message });
    },
    warning: function(field: string, message: string) {
      warnings.push({ level: 'WARNING', field: field, message: message });
    },
    result: function(): ValidationResult {
      return { valid: errors.length === 0, errors: errors.slice(), warnings: warnings.slice() };
    }
  };
}

// ═══════════════════════════════════════════════════════════════
// FIELD CHECKS
// ═══════════════════════════════════════════════════════════════

/**
 * Check a number against its hard limits, then its recommended band
 *
 * Outside the limits (or not a finite number) is an error; outside the
 * recommended band only a warning.
 *
 * @returns The value when it passed the hard limits, otherwise null
 */
export function checkRange(issues: IssueCollector, field: string, value: unknown, range: FieldRange): number | null {
  if (!isFiniteNumber(value) || value < range.min || value > range.max) {
    issues.error(field, `${field} must be between ${range.min} and ${range.max} (got ${String(value)})`);
    return null;
  }
  if (range.integer === true && !isInteger(value)) {
    issues.error(field, `${field} must be an integer (got ${value})`);
    return null;
  }

  if (range.recommended !== undefined) {
    const [low, high] = range.recommended;
    if (value < low || value > high) {
      issues.warning(field, `${field} is outside recommended range ${low}-${high} (got ${value})`);
    }
  }

  return value;
}

export function checkBoolean(issues: IssueCollector, field: string, value: unknown): boolean | null {
  if (typeof value !== 'boolean') {
    issues.error(field, `${field} must be a boolean (got ${typeof value})`);
    return null;
  }
  return value;
}

/**
 * Check that a value is one of a fixed set
 * @returns The matching member, or null (with an error listing the choices)
 */
export function checkOneOf<T>(issues: IssueCollector, field: string, value: unknown, allowed: readonly T[]): T | null {
  const match = allowed.find(function(candidate) { return candidate === value; });
  if (match === undefined) {
    issues.error(field, `${field} must be one of ${allowed.join(', ')} (got ${String(value)})`);
    return null;
  }
  return match;
}
