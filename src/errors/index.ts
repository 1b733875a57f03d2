/**
 * Error Module
 * Exports all domain error types and utilities.
 */

export {
  DomainError,
  DomainErrorContext,
  ErrorCode,
  ValidationError,
  ValidationIssue,
  InputError,
  isDomainError,
  wrapError,
} from './DomainError';
