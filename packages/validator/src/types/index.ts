/**
 * ContractCheck Validator — Type Exports
 *
 * No logic lives in this file.
 */

export type { BindingResult, BoundArgument } from './binding.js';
export type { Diagnostic, DiagnosticDetail, DiagnosticOf, Severity } from './diagnostic.js';
export { DiagnosticCode } from './diagnostic.js';
export type { SubjectKind, ValidationLog } from './outcome.js';
export { ValidationOutcome } from './outcome.js';
export type { ContractLookup } from './registry.js';
export type {
  CompilationUnit,
  ContractReport,
  InvocationReport,
  UnitReport,
} from './report.js';
