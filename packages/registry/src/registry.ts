/**
 * ContractCheck Registry — Contract Registry
 *
 * The authoritative set of kernel contracts for one compilation unit.
 *
 * Lifecycle:
 *   1. register() every library built-in and user kernel
 *   2. seal()
 *   3. validate, with lookups only
 *
 * Several contracts may share a name (overloads). The exact same contract
 * may not be registered twice, and nothing may be registered after seal().
 * Both are programming errors and throw.
 */

import { canonicalize, contractHash, sha256, type KernelContract } from '@contractcheck/contract-model';
import type { ContractLookup } from '@contractcheck/validator';
import { DuplicateContractError, RegistrySealedError } from './errors.js';

interface RegistryEntry {
  readonly contract: KernelContract;
  readonly hash: string;
}

export class ContractRegistry implements ContractLookup {
  private readonly entries: RegistryEntry[] = [];
  private readonly byName: Map<string, RegistryEntry[]> = new Map();
  private readonly hashes: Set<string> = new Set();
  private sealed = false;

  /**
   * Add a contract.
   *
   * @throws {RegistrySealedError} after seal()
   * @throws {DuplicateContractError} if an identical contract is registered
   */
  register(contract: KernelContract): void {
    if (this.sealed) {
      throw new RegistrySealedError(contract.name);
    }
    const hash = contractHash(contract);
    if (this.hashes.has(hash)) {
      throw new DuplicateContractError(contract.name);
    }
    const entry = { contract, hash };
    this.entries.push(entry);
    this.hashes.add(hash);
    const overloads = this.byName.get(contract.name);
    if (overloads === undefined) {
      this.byName.set(contract.name, [entry]);
    } else {
      overloads.push(entry);
    }
  }

  registerAll(contracts: Iterable<KernelContract>): void {
    for (const contract of contracts) {
      this.register(contract);
    }
  }

  /** Stop accepting registrations. Idempotent. */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  lookup(name: string): ReadonlyArray<KernelContract> {
    return (this.byName.get(name) ?? []).map((e) => e.contract);
  }

  list(): ReadonlyArray<KernelContract> {
    return this.entries.map((e) => e.contract);
  }

  listBuiltIns(): ReadonlyArray<KernelContract> {
    return this.entries.filter((e) => e.contract.isBuiltIn).map((e) => e.contract);
  }

  /**
   * SHA-256 over the sorted contract hashes. Independent of registration
   * order; any added, removed or changed contract changes it.
   */
  hash(): string {
    const sorted = this.entries.map((e) => e.hash).sort();
    return sha256(canonicalize(sorted));
  }
}
