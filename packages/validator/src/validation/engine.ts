/**
 * ContractCheck Validator — Compilation-Unit Validation
 *
 * Drives the rule engine, the built-in shape checker and the binder over
 * one compilation unit:
 *
 *   1. The registry must be sealed. Contracts are complete before any
 *      invocation is bound.
 *   2. Every registered contract is checked, in registry order.
 *   3. Every invocation is bound, in unit order. An invocation that binds to
 *      a contract with diagnostics is rejected; code is never generated
 *      against an invalid contract.
 *
 * Every contract check and every binding is recorded through the injected
 * ValidationLogger, whatever its outcome.
 *
 * The engine keeps no state between calls. Reports depend only on the unit
 * and the registry contents.
 */

import { contractHash, type Invocation, type KernelContract } from '@contractcheck/contract-model';
import { bind } from '../binding/binder.js';
import { createDiagnostic } from '../diagnostics/messages.js';
import { RegistryNotSealedError } from '../errors.js';
import { ValidationLogger } from '../logging/validation-log.js';
import { validateContract } from '../rules/access.js';
import { validateBuiltIn } from '../rules/builtin-shape.js';
import type { BindingResult } from '../types/binding.js';
import { DiagnosticCode, type Diagnostic } from '../types/diagnostic.js';
import { ValidationOutcome, type SubjectKind } from '../types/outcome.js';
import type { ContractLookup } from '../types/registry.js';
import type {
  CompilationUnit,
  ContractReport,
  InvocationReport,
  UnitReport,
} from '../types/report.js';

// ---------------------------------------------------------------------------
// Contract check
// ---------------------------------------------------------------------------

/**
 * Check one contract: access-mode rules for every contract, followed by the
 * built-in shape rules when the contract is a built-in.
 */
export function checkContract(contract: KernelContract): ContractReport {
  const diagnostics = contract.isBuiltIn
    ? [...validateContract(contract), ...validateBuiltIn(contract)]
    : validateContract(contract);
  return {
    contract,
    hash: contractHash(contract),
    diagnostics,
    ok: diagnostics.length === 0,
  };
}

// ---------------------------------------------------------------------------
// Validator
// ---------------------------------------------------------------------------

/**
 * A binding result plus the report of the contract it settled on. `bound`
 * is set even when the invocation was refused because that contract is
 * invalid, and null when no single candidate was chosen.
 */
interface Resolution {
  readonly result: BindingResult;
  readonly bound: ContractReport | null;
}

export interface ContractValidatorOptions {
  readonly logger?: ValidationLogger;
  /** Source of log timestamps. Defaults to the wall clock. */
  readonly clock?: () => string;
}

export class ContractValidator {
  private readonly logger: ValidationLogger;
  private readonly clock: () => string;

  constructor(options: ContractValidatorOptions = {}) {
    this.logger = options.logger ?? new ValidationLogger();
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  /**
   * Validate every registered contract and every invocation of `unit`.
   *
   * @throws {RegistryNotSealedError} when `registry` still accepts registrations
   */
  validateUnit(unit: CompilationUnit, registry: ContractLookup): UnitReport {
    if (!registry.isSealed()) {
      throw new RegistryNotSealedError();
    }
    const registryHash = registry.hash();

    const contracts = registry.list().map((contract) => {
      const report = checkContract(contract);
      this.log(contract.name, 'contract', report.diagnostics, registryHash, report.hash);
      return report;
    });
    const byContract = new Map(contracts.map((r) => [r.contract, r]));

    const invocations = unit.invocations.map((invocation): InvocationReport => {
      const { result, bound } = this.resolve(invocation, registry, byContract);
      this.log(
        invocation.label,
        'invocation',
        result.ok ? [] : result.diagnostics,
        registryHash,
        bound?.hash ?? null,
      );
      return { invocation, result };
    });

    const diagnostics = [
      ...contracts.flatMap((r) => r.diagnostics),
      ...invocations.flatMap((r) => (r.result.ok ? [] : r.result.diagnostics)),
    ];

    return {
      unit: unit.name,
      registryHash,
      contracts,
      invocations,
      diagnostics,
      ok: diagnostics.length === 0,
    };
  }

  /**
   * Bind one invocation against the registry, refusing contracts that fail
   * their own checks.
   *
   * @throws {RegistryNotSealedError} when `registry` still accepts registrations
   */
  bindInvocation(invocation: Invocation, registry: ContractLookup): BindingResult {
    if (!registry.isSealed()) {
      throw new RegistryNotSealedError();
    }
    return this.resolve(invocation, registry, new Map()).result;
  }

  private resolve(
    invocation: Invocation,
    registry: ContractLookup,
    checked: Map<KernelContract, ContractReport>,
  ): Resolution {
    const site = invocation.label;
    const candidates = registry.lookup(invocation.kernelName);
    if (candidates.length === 0) {
      return {
        result: {
          ok: false,
          diagnostics: [
            createDiagnostic(site, {
              code: DiagnosticCode.UnknownKernel,
              kernelName: invocation.kernelName,
            }),
          ],
        },
        bound: null,
      };
    }

    const result = bind(invocation.arguments, candidates, site);
    if (!result.ok) {
      return { result, bound: null };
    }

    let report = checked.get(result.contract);
    if (report === undefined) {
      report = checkContract(result.contract);
      checked.set(result.contract, report);
    }
    if (report.ok) {
      return { result, bound: report };
    }
    return {
      result: {
        ok: false,
        diagnostics: [
          createDiagnostic(site, {
            code: DiagnosticCode.InvalidContractBound,
            kernelName: result.contract.name,
            contractCodes: [...new Set(report.diagnostics.map((d) => d.code))],
          }),
        ],
      },
      bound: report,
    };
  }

  private log(
    subject: string,
    subjectKind: SubjectKind,
    diagnostics: ReadonlyArray<Diagnostic>,
    registryHash: string,
    hash: string | null,
  ): void {
    if (!this.logger.enabled) {
      return;
    }
    this.logger.record({
      subject,
      subject_kind: subjectKind,
      outcome: diagnostics.length === 0 ? ValidationOutcome.Accepted : ValidationOutcome.Rejected,
      codes: diagnostics.map((d) => d.code),
      registry_hash: registryHash,
      contract_hash: hash,
      timestamp: this.clock(),
    });
  }
}
