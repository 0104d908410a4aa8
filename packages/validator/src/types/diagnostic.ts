/**
 * ContractCheck Validator — Diagnostic Types
 *
 * Diagnostics are data, not faults. Every detected defect in a contract or
 * at a call site becomes one Diagnostic value; the validator itself never
 * throws on input it can represent.
 *
 * Argument indices in payloads are 0-based. Messages render them 1-based
 * ("argument 2").
 */

import type { AccessMode, ArgumentKind, SpaceRef } from '@contractcheck/contract-model';

// ---------------------------------------------------------------------------
// Codes
// ---------------------------------------------------------------------------

/**
 * Every diagnostic the validator can emit.
 *
 * Contract-level codes come from the access-mode rules and the built-in
 * shape checker. Call-site codes come from the binder and the
 * compilation-unit validator.
 */
export enum DiagnosticCode {
  // Contract-level (all contracts)
  EmptyArgumentList = 'EmptyArgumentList',
  IllegalAccessMode = 'IllegalAccessMode',
  InvalidSpaceCount = 'InvalidSpaceCount',

  // Contract-level (built-ins only), in rule order
  InvalidWriteCount = 'InvalidWriteCount',
  OperatorArgumentInBuiltIn = 'OperatorArgumentInBuiltIn',
  NonScalarReduction = 'NonScalarReduction',
  ConflictingReductionAndWrite = 'ConflictingReductionAndWrite',
  SpaceMismatch = 'SpaceMismatch',
  NoEffectiveOutput = 'NoEffectiveOutput',

  // Call-site
  ArityMismatch = 'ArityMismatch',
  TypeMismatch = 'TypeMismatch',
  AmbiguousInvocation = 'AmbiguousInvocation',
  UnknownKernel = 'UnknownKernel',
  InvalidContractBound = 'InvalidContractBound',
}

/** All diagnostics are errors. The reporting layer decides presentation. */
export type Severity = 'error';

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

/**
 * The code-specific part of a diagnostic. Discriminated on `code`.
 */
export type DiagnosticDetail =
  | { readonly code: DiagnosticCode.EmptyArgumentList }
  | {
      readonly code: DiagnosticCode.IllegalAccessMode;
      readonly argumentIndex: number;
      readonly kind: ArgumentKind;
      readonly access: AccessMode;
    }
  | {
      readonly code: DiagnosticCode.InvalidSpaceCount;
      readonly argumentIndex: number;
      readonly kind: ArgumentKind;
      readonly expected: number;
      readonly actual: number;
    }
  | {
      readonly code: DiagnosticCode.InvalidWriteCount;
      readonly expected: number;
      readonly actual: number;
    }
  | {
      readonly code: DiagnosticCode.OperatorArgumentInBuiltIn;
      readonly argumentIndex: number;
    }
  | {
      readonly code: DiagnosticCode.NonScalarReduction;
      readonly argumentIndex: number;
      readonly kind: ArgumentKind;
    }
  | {
      readonly code: DiagnosticCode.ConflictingReductionAndWrite;
      /** The writable field whose permission differs from the read-write field. */
      readonly argumentIndex: number;
      readonly access: AccessMode;
      /** First reduction argument. */
      readonly reductionIndex: number;
      /** First read-write field argument. */
      readonly readWriteIndex: number;
    }
  | {
      readonly code: DiagnosticCode.SpaceMismatch;
      readonly argumentIndex: number;
      readonly expected: SpaceRef;
      readonly actual: SpaceRef;
    }
  | { readonly code: DiagnosticCode.NoEffectiveOutput }
  | {
      readonly code: DiagnosticCode.ArityMismatch;
      /** Distinct candidate arities, ascending. Empty when there were no candidates. */
      readonly expected: ReadonlyArray<number>;
      readonly actual: number;
    }
  | {
      readonly code: DiagnosticCode.TypeMismatch;
      readonly argumentIndex: number;
      readonly aspect: 'kind' | 'dataType';
      readonly expected: string;
      readonly actual: string;
      readonly handle: string;
      /** Name of the candidate contract that ruled this argument out. */
      readonly candidate: string;
    }
  | {
      readonly code: DiagnosticCode.AmbiguousInvocation;
      readonly candidateNames: ReadonlyArray<string>;
      /** Full signatures, aligned with candidateNames. Overloads share a name. */
      readonly signatures: ReadonlyArray<string>;
    }
  | {
      readonly code: DiagnosticCode.UnknownKernel;
      readonly kernelName: string;
    }
  | {
      readonly code: DiagnosticCode.InvalidContractBound;
      readonly kernelName: string;
      readonly contractCodes: ReadonlyArray<DiagnosticCode>;
    };

/**
 * A complete diagnostic as handed to the reporting layer.
 */
export type Diagnostic = DiagnosticDetail & {
  readonly severity: Severity;
  /** The contract name or invocation label the diagnostic is about. */
  readonly subject: string;
  /** Human-readable rendering of the code's message template. */
  readonly message: string;
};

/** Narrow a diagnostic (or detail) to one code. */
export type DiagnosticOf<C extends DiagnosticCode> = Extract<Diagnostic, { readonly code: C }>;
