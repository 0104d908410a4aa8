/**
 * ContractCheck Validator — Binding Types
 */

import type {
  ArgumentDescriptor,
  InvocationArgument,
  KernelContract,
} from '@contractcheck/contract-model';
import type { Diagnostic } from './diagnostic.js';

/** One formal/actual pair of a bound call, in positional order. */
export interface BoundArgument {
  readonly index: number;
  readonly formal: ArgumentDescriptor;
  readonly actual: InvocationArgument;
}

/**
 * Outcome of binding one invocation.
 *
 * The code generator may only proceed on `ok: true`. A rejected result
 * carries every diagnostic that explains the rejection.
 */
export type BindingResult =
  | {
      readonly ok: true;
      readonly contract: KernelContract;
      readonly mapping: ReadonlyArray<BoundArgument>;
    }
  | { readonly ok: false; readonly diagnostics: ReadonlyArray<Diagnostic> };
