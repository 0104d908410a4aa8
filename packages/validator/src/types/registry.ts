/**
 * ContractCheck Validator — Contract Lookup Interface
 *
 * The validator reads contracts through this interface only. The concrete
 * registry lives in @contractcheck/registry and is constructed once per
 * compilation unit, then sealed before any validation starts.
 */

import type { KernelContract } from '@contractcheck/contract-model';

export interface ContractLookup {
  /** True once the registry accepts no further registrations. */
  isSealed(): boolean;
  /** Every contract registered under `name`. Overloads share a name. Empty if none. */
  lookup(name: string): ReadonlyArray<KernelContract>;
  /** Every registered contract, in registration order. */
  list(): ReadonlyArray<KernelContract>;
  /** SHA-256 over the registered contracts in canonical order. */
  hash(): string;
}
