/**
 * ContractCheck Validator — Access-Mode Rules
 *
 * Pure predicates deciding the legality of kind/access combinations for a
 * single argument, and the per-argument checks that apply uniformly to user
 * kernels and built-ins.
 *
 * The legal-access table is fixed:
 *
 *   | kind     | legal accesses                    |
 *   |----------|-----------------------------------|
 *   | field    | read, write, readwrite, inc       |
 *   | scalar   | read, sum                         |
 *   | operator | read                              |
 *
 * Every other combination is illegal.
 */

import type { AccessMode, ArgumentKind, KernelContract } from '@contractcheck/contract-model';
import { createDiagnostic } from '../diagnostics/messages.js';
import { DiagnosticCode, type Diagnostic } from '../types/diagnostic.js';
import { LEGAL_ACCESS, SPACE_COUNT } from './tables.js';

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

/**
 * Whether `access` is legal for an argument of `kind`.
 *
 * Total: returns a boolean for every pair, including values that are not
 * members of either enum.
 */
export function isLegalAccess(kind: ArgumentKind, access: AccessMode): boolean {
  return LEGAL_ACCESS.get(kind)?.has(access) ?? false;
}

/** Number of spaces an argument of `kind` must name, or null for an unknown kind. */
export function expectedSpaceCount(kind: ArgumentKind): number | null {
  return SPACE_COUNT.get(kind) ?? null;
}

// ---------------------------------------------------------------------------
// Contract check
// ---------------------------------------------------------------------------

/**
 * Check every argument of a contract against the access table.
 *
 * Order of the result:
 *   1. EmptyArgumentList, if the contract declares nothing
 *   2. IllegalAccessMode for each argument, ascending index
 *   3. InvalidSpaceCount for each argument, ascending index
 */
export function validateContract(contract: KernelContract): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const subject = contract.name;

  if (contract.arguments.length === 0) {
    diagnostics.push(createDiagnostic(subject, { code: DiagnosticCode.EmptyArgumentList }));
  }

  contract.arguments.forEach((arg, argumentIndex) => {
    if (!isLegalAccess(arg.kind, arg.access)) {
      diagnostics.push(
        createDiagnostic(subject, {
          code: DiagnosticCode.IllegalAccessMode,
          argumentIndex,
          kind: arg.kind,
          access: arg.access,
        }),
      );
    }
  });

  contract.arguments.forEach((arg, argumentIndex) => {
    const expected = expectedSpaceCount(arg.kind);
    if (expected !== null && arg.spaces.length !== expected) {
      diagnostics.push(
        createDiagnostic(subject, {
          code: DiagnosticCode.InvalidSpaceCount,
          argumentIndex,
          kind: arg.kind,
          expected,
          actual: arg.spaces.length,
        }),
      );
    }
  });

  return diagnostics;
}
