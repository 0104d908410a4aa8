/**
 * ContractCheck Validator — Invoke Call Binder
 *
 * Matches the actual arguments of one call site against the candidate
 * contracts registered under the invoked kernel's name.
 *
 *   1. Arity filter. No survivor → ArityMismatch.
 *   2. Positional kind / data type comparison per survivor. Unresolved
 *      (null) kind or type matches anything. Any mismatch rules the
 *      candidate out with a candidate-local TypeMismatch.
 *   3. One survivor → bound.
 *   4. No survivor → rejected with the merged candidate-local diagnostics,
 *      deduplicated by (code, argument index).
 *   5. Several survivors → AmbiguousInvocation. The binder never picks one.
 *
 * bind() keeps no state between calls.
 */

import {
  formatSignature,
  type ArgumentDescriptor,
  type InvocationArgument,
  type KernelContract,
} from '@contractcheck/contract-model';
import { createDiagnostic } from '../diagnostics/messages.js';
import type { BindingResult, BoundArgument } from '../types/binding.js';
import { DiagnosticCode, type Diagnostic } from '../types/diagnostic.js';

/** Subject used for diagnostics when the caller does not name the call site. */
export const DEFAULT_SITE = 'invoke';

/**
 * Bind an invocation to exactly one of `candidates`, or explain why not.
 *
 * @param args - Actual arguments, in call order
 * @param candidates - Contracts sharing the invoked kernel's name
 * @param site - Call-site label used as the diagnostic subject
 */
export function bind(
  args: ReadonlyArray<InvocationArgument>,
  candidates: Iterable<KernelContract>,
  site: string = DEFAULT_SITE,
): BindingResult {
  const all = [...candidates];

  // 1. Arity
  const sized = all.filter((c) => c.arguments.length === args.length);
  if (sized.length === 0) {
    const expected = [...new Set(all.map((c) => c.arguments.length))].sort((a, b) => a - b);
    return {
      ok: false,
      diagnostics: [
        createDiagnostic(site, { code: DiagnosticCode.ArityMismatch, expected, actual: args.length }),
      ],
    };
  }

  // 2. Kind / data type
  const survivors: KernelContract[] = [];
  const local: Diagnostic[] = [];
  for (const candidate of sized) {
    const mismatches = compareArguments(candidate, args, site);
    if (mismatches.length === 0) {
      survivors.push(candidate);
    } else {
      local.push(...mismatches);
    }
  }

  // 3. Unique match
  const [only, ...rest] = survivors;
  if (only !== undefined && rest.length === 0) {
    return { ok: true, contract: only, mapping: pairArguments(only.arguments, args) };
  }

  // 4. No match
  if (only === undefined) {
    return { ok: false, diagnostics: dedupe(local) };
  }

  // 5. Ambiguous
  return {
    ok: false,
    diagnostics: [
      createDiagnostic(site, {
        code: DiagnosticCode.AmbiguousInvocation,
        candidateNames: survivors.map((c) => c.name),
        signatures: survivors.map(formatSignature),
      }),
    ],
  };
}

/**
 * Candidate-local mismatches, at most one per argument. Kind is compared
 * first; data type only when the kind matches or is unresolved.
 */
function compareArguments(
  candidate: KernelContract,
  args: ReadonlyArray<InvocationArgument>,
  site: string,
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  candidate.arguments.forEach((formal, argumentIndex) => {
    const actual = args[argumentIndex];
    if (actual === undefined) {
      return;
    }
    if (actual.kind !== null && actual.kind !== formal.kind) {
      diagnostics.push(
        createDiagnostic(site, {
          code: DiagnosticCode.TypeMismatch,
          argumentIndex,
          aspect: 'kind',
          expected: formal.kind,
          actual: actual.kind,
          handle: actual.handle,
          candidate: candidate.name,
        }),
      );
    } else if (actual.dataType !== null && actual.dataType !== formal.dataType) {
      diagnostics.push(
        createDiagnostic(site, {
          code: DiagnosticCode.TypeMismatch,
          argumentIndex,
          aspect: 'dataType',
          expected: formal.dataType,
          actual: actual.dataType,
          handle: actual.handle,
          candidate: candidate.name,
        }),
      );
    }
  });
  return diagnostics;
}

function pairArguments(
  formals: ReadonlyArray<ArgumentDescriptor>,
  actuals: ReadonlyArray<InvocationArgument>,
): BoundArgument[] {
  return formals.flatMap((formal, index) => {
    const actual = actuals[index];
    return actual === undefined ? [] : [{ index, formal, actual }];
  });
}

/** First occurrence per (code, argument index) wins. */
function dedupe(diagnostics: ReadonlyArray<Diagnostic>): Diagnostic[] {
  const seen = new Set<string>();
  const result: Diagnostic[] = [];
  for (const d of diagnostics) {
    const key = `${d.code}:${'argumentIndex' in d ? d.argumentIndex : ''}`;
    if (!seen.has(key)) {
      seen.add(key);
      result.push(d);
    }
  }
  return result;
}
