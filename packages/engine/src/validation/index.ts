export { Validator } from './validator';
export type { IssueSeverity, ValidationIssue, ValidationResult, ValidatorOptions } from './validator';
