/**
 * Global error types for the kiln simulator
 *
 * These are thrown only for programmer or boot-time mistakes (bad plant
 * parameters, an out-of-order history append). Run-time problems inside a
 * tick are reported as structured results instead.
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when plant parameters are invalid
 */
export class PlantConfigValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'PlantConfigValidationError';
  }
}

/**
 * Error thrown when controller configuration is invalid
 */
export class ControllerConfigValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'ControllerConfigValidationError';
  }
}

/**
 * Error thrown when emissions parameters are invalid
 */
export class EmissionsConfigValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'EmissionsConfigValidationError';
  }
}

/**
 * Error thrown when the sample history is misused
 */
export class HistoryValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'HistoryValidationError';
  }
}

/**
 * Error thrown when the user configuration fails validation at boot
 */
export class KilnConfigValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'KilnConfigValidationError';
  }
}
