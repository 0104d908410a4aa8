/**
 * ContractCheck Validator — Built-in Shape Checker
 *
 * Structural invariants for library built-ins, on top of the access-mode
 * rules. Built-in bodies are generated mechanically, so a contract that
 * breaks one of these rules has no well-defined generated body.
 *
 * Rules, evaluated in this order with every violation collected:
 *
 *   1. Single writer: exactly one writable field, checked only when the
 *      built-in has a field argument. A zero_output built-in with at least
 *      one reduction writes no field; the tag alone exempts nothing.
 *   2. No operator: built-ins take no operator arguments.
 *   3. Reduction isolation: reductions are scalars, and a reduction is not
 *      mixed with a read-write field plus a differently-permissioned
 *      writable field.
 *   4. Shared space: all fields on the first field's space, unless tagged
 *      cross_space.
 *   5. Non-trivial output: at least one field or one reduction.
 *
 * Within a rule, diagnostics are in ascending argument order.
 */

import {
  AccessMode,
  ArgumentKind,
  BuiltInTag,
  type ArgumentDescriptor,
  type KernelContract,
} from '@contractcheck/contract-model';
import { createDiagnostic } from '../diagnostics/messages.js';
import { DiagnosticCode, type Diagnostic } from '../types/diagnostic.js';
import { WRITABLE_FIELD_ACCESS } from './tables.js';

interface IndexedArgument {
  readonly index: number;
  readonly arg: ArgumentDescriptor;
}

/**
 * Run the five built-in shape rules against a contract.
 *
 * Does not consult `isBuiltIn`: callers decide which contracts are held to
 * built-in rules (see checkContract()).
 */
export function validateBuiltIn(contract: KernelContract): Diagnostic[] {
  const indexed: IndexedArgument[] = contract.arguments.map((arg, index) => ({ index, arg }));
  const fields = indexed.filter(({ arg }) => arg.kind === ArgumentKind.Field);
  const reductions = indexed.filter(({ arg }) => arg.access === AccessMode.Sum);

  return [
    ...checkSingleWriter(contract, fields, reductions),
    ...checkNoOperator(contract, indexed),
    ...checkReductionIsolation(contract, fields, reductions),
    ...checkSharedSpace(contract, fields),
    ...checkEffectiveOutput(contract, fields, reductions),
  ];
}

function isWritableField({ arg }: IndexedArgument): boolean {
  return arg.kind === ArgumentKind.Field && WRITABLE_FIELD_ACCESS.has(arg.access);
}

function hasTag(contract: KernelContract, tag: BuiltInTag): boolean {
  return contract.tags.includes(tag);
}

// Rule 1
function checkSingleWriter(
  contract: KernelContract,
  fields: ReadonlyArray<IndexedArgument>,
  reductions: ReadonlyArray<IndexedArgument>,
): Diagnostic[] {
  if (fields.length === 0) {
    return [];
  }
  const pureReduction = hasTag(contract, BuiltInTag.ZeroOutput) && reductions.length > 0;
  const expected = pureReduction ? 0 : 1;
  const actual = fields.filter(isWritableField).length;
  if (actual === expected) {
    return [];
  }
  return [createDiagnostic(contract.name, { code: DiagnosticCode.InvalidWriteCount, expected, actual })];
}

// Rule 2
function checkNoOperator(
  contract: KernelContract,
  indexed: ReadonlyArray<IndexedArgument>,
): Diagnostic[] {
  return indexed
    .filter(({ arg }) => arg.kind === ArgumentKind.Operator)
    .map(({ index }) =>
      createDiagnostic(contract.name, {
        code: DiagnosticCode.OperatorArgumentInBuiltIn,
        argumentIndex: index,
      }),
    );
}

// Rule 3
function checkReductionIsolation(
  contract: KernelContract,
  fields: ReadonlyArray<IndexedArgument>,
  reductions: ReadonlyArray<IndexedArgument>,
): Diagnostic[] {
  const first = reductions[0];
  if (first === undefined) {
    return [];
  }
  const diagnostics: Diagnostic[] = [];

  // (a) reductions are scalars
  for (const { index, arg } of reductions) {
    if (arg.kind !== ArgumentKind.Scalar) {
      diagnostics.push(
        createDiagnostic(contract.name, {
          code: DiagnosticCode.NonScalarReduction,
          argumentIndex: index,
          kind: arg.kind,
        }),
      );
    }
  }

  // (b) reduction + readwrite field + a writable field with another permission
  const readWrite = fields.find(({ arg }) => arg.access === AccessMode.ReadWrite);
  if (readWrite !== undefined) {
    for (const writer of fields.filter(isWritableField)) {
      if (writer.arg.access === AccessMode.ReadWrite) {
        continue;
      }
      diagnostics.push(
        createDiagnostic(contract.name, {
          code: DiagnosticCode.ConflictingReductionAndWrite,
          argumentIndex: writer.index,
          access: writer.arg.access,
          reductionIndex: first.index,
          readWriteIndex: readWrite.index,
        }),
      );
    }
  }

  return diagnostics;
}

// Rule 4
function checkSharedSpace(
  contract: KernelContract,
  fields: ReadonlyArray<IndexedArgument>,
): Diagnostic[] {
  if (hasTag(contract, BuiltInTag.CrossSpace)) {
    return [];
  }
  // Fields naming no space are already reported as InvalidSpaceCount.
  const placed = fields.flatMap(({ index, arg }) => {
    const space = arg.spaces[0];
    return space === undefined ? [] : [{ index, space }];
  });
  const anchor = placed[0];
  if (anchor === undefined) {
    return [];
  }
  return placed
    .filter(({ space }) => space !== anchor.space)
    .map(({ index, space }) =>
      createDiagnostic(contract.name, {
        code: DiagnosticCode.SpaceMismatch,
        argumentIndex: index,
        expected: anchor.space,
        actual: space,
      }),
    );
}

// Rule 5
function checkEffectiveOutput(
  contract: KernelContract,
  fields: ReadonlyArray<IndexedArgument>,
  reductions: ReadonlyArray<IndexedArgument>,
): Diagnostic[] {
  if (fields.length > 0 || reductions.length > 0) {
    return [];
  }
  return [createDiagnostic(contract.name, { code: DiagnosticCode.NoEffectiveOutput })];
}
