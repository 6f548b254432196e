/**
 * Screening Validation Module
 */

export * from './validator';
export * from './schemas';

export type { ValidationResult, ValidationError } from '../../shared/validation/types';
