/**
 * ContractCheck Validator — Report Types
 *
 * Reports are produced per compilation unit and consumed immediately by the
 * code generator and the reporting layer. Nothing here is persisted except
 * through the validation log.
 */

import type { Invocation, KernelContract } from '@contractcheck/contract-model';
import type { BindingResult } from './binding.js';
import type { Diagnostic } from './diagnostic.js';

/** The invocations found in one compilation unit, in source order. */
export interface CompilationUnit {
  readonly name: string;
  readonly invocations: ReadonlyArray<Invocation>;
}

export interface ContractReport {
  readonly contract: KernelContract;
  readonly hash: string;
  readonly diagnostics: ReadonlyArray<Diagnostic>;
  readonly ok: boolean;
}

export interface InvocationReport {
  readonly invocation: Invocation;
  readonly result: BindingResult;
}

export interface UnitReport {
  readonly unit: string;
  readonly registryHash: string;
  readonly contracts: ReadonlyArray<ContractReport>;
  readonly invocations: ReadonlyArray<InvocationReport>;
  /** Every diagnostic of the unit: contracts first (registry order), then invocations (unit order). */
  readonly diagnostics: ReadonlyArray<Diagnostic>;
  /** True when `diagnostics` is empty. */
  readonly ok: boolean;
}
