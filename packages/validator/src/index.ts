/**
 * @contractcheck/validator
 *
 * Access-mode rule engine, built-in shape checker, invoke call binder and
 * compilation-unit validation.
 *
 * This package is side-effect free. It imports no node:fs, node:child_process,
 * node:net or other I/O API. Log persistence is injected through LogSink.
 */

export type {
  BindingResult,
  BoundArgument,
  CompilationUnit,
  ContractLookup,
  ContractReport,
  Diagnostic,
  DiagnosticDetail,
  DiagnosticOf,
  InvocationReport,
  Severity,
  SubjectKind,
  UnitReport,
  ValidationLog,
} from './types/index.js';
export { DiagnosticCode, ValidationOutcome } from './types/index.js';

export { isLegalAccess, expectedSpaceCount, validateContract } from './rules/access.js';
export { LEGAL_ACCESS, SPACE_COUNT, WRITABLE_FIELD_ACCESS, legalAccesses } from './rules/tables.js';
export { validateBuiltIn } from './rules/builtin-shape.js';
export { bind, DEFAULT_SITE } from './binding/binder.js';
export { createDiagnostic, renderMessage } from './diagnostics/messages.js';
export { checkContract, ContractValidator } from './validation/engine.js';
export type { ContractValidatorOptions } from './validation/engine.js';
export { RegistryNotSealedError } from './errors.js';

export type { LogSink } from './logging/log-sink.js';
export { ValidationLogger } from './logging/validation-log.js';
