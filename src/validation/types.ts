/**
 * Validation result types
 */

/**
 * Value outside its hard limits; start-up is refused
 */
export interface ValidationError {
  field: string;
  message: string;
  level?: string;
}

/**
 * Value accepted but outside the recommended range
 */
export interface ValidationWarning {
  field: string;
  message: string;
  level?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Collector the individual checks append to
 */
export interface Issues {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Hard limits, plus an optional recommended [low, high] inside them
 */
export interface Limits {
  min: number;
  max: number;
  recommended?: readonly [number, number];
}
