/**
 * Configuration validation types
 */

import type { KilnUserConfig } from '$types';

/**
 * One finding about a configuration field
 * - CRITICAL: the configuration cannot be used
 * - WARNING: usable, but outside the recommended range
 */
export interface ConfigIssue {
  field: string;
  message: string;
  level: 'CRITICAL' | 'WARNING';
}

export interface ValidationResult {
  valid: boolean;
  errors: ConfigIssue[];
  warnings: ConfigIssue[];
}

/**
 * Every user field present, none of them trusted yet
 * (a typed KilnUserConfig, or one assembled from flags or JSON)
 */
export type UncheckedUserConfig = { readonly [K in keyof KilnUserConfig]: unknown };

/**
 * Hard limits plus an optional recommended band for a numeric field
 */
export interface FieldRange {
  min: number;
  max: number;
  recommended?: readonly [number, number];
  integer?: boolean;
}

export interface IssueCollector {
  readonly errors: readonly ConfigIssue[];
  readonly warnings: readonly ConfigIssue[];
  error(field: string, message: string): void;
  warning(field: string, message: string): void;
  /** Snapshot of what has been collected so far */
  result(): ValidationResult;
}
