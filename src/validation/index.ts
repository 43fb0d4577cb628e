export { validateConfig } from './validator';
export type { ValidationError, ValidationWarning, ValidationResult } from './types';
