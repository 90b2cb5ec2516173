export { validateConfig } from './validator';
export type { ValidationResult, ValidationError, ValidationWarning } from './types';
