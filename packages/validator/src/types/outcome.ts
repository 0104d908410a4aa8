/**
 * ContractCheck Validator — Validation Log Types
 *
 * Every contract check and every invocation binding produces exactly one
 * log entry, accepted or rejected. Given the registry hash and the subject,
 * the outcome is reproducible.
 */

import type { DiagnosticCode } from './diagnostic.js';

export enum ValidationOutcome {
  Accepted = 'Accepted',
  Rejected = 'Rejected',
}

export type SubjectKind = 'contract' | 'invocation';

export interface ValidationLog {
  /** Contract name or invocation label. */
  readonly subject: string;
  readonly subject_kind: SubjectKind;
  readonly outcome: ValidationOutcome;
  /** Diagnostic codes in emission order. Empty when accepted. */
  readonly codes: ReadonlyArray<DiagnosticCode>;
  readonly registry_hash: string;
  /** Hash of the contract checked, or of the contract an invocation bound to. */
  readonly contract_hash: string | null;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
}
