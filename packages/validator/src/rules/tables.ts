/**
 * ContractCheck Validator — Rule Tables
 *
 * The fixed legal-access table and the per-kind space counts. Shared by the
 * rules and by message rendering.
 */

import { AccessMode, ArgumentKind } from '@contractcheck/contract-model';

export const LEGAL_ACCESS: ReadonlyMap<ArgumentKind, ReadonlySet<AccessMode>> = new Map<ArgumentKind, ReadonlySet<AccessMode>>([
  [
    ArgumentKind.Field,
    new Set([AccessMode.Read, AccessMode.Write, AccessMode.ReadWrite, AccessMode.Increment]),
  ],
  [ArgumentKind.Scalar, new Set([AccessMode.Read, AccessMode.Sum])],
  [ArgumentKind.Operator, new Set([AccessMode.Read])],
]);

export const SPACE_COUNT: ReadonlyMap<ArgumentKind, number> = new Map([
  [ArgumentKind.Scalar, 0],
  [ArgumentKind.Field, 1],
  [ArgumentKind.Operator, 2],
]);

/** Field accesses that make a field an output of the kernel. */
export const WRITABLE_FIELD_ACCESS: ReadonlySet<AccessMode> = new Set([
  AccessMode.Write,
  AccessMode.ReadWrite,
  AccessMode.Increment,
]);

/** The legal accesses for `kind`, in table order. Empty for an unknown kind. */
export function legalAccesses(kind: ArgumentKind): ReadonlyArray<AccessMode> {
  return [...(LEGAL_ACCESS.get(kind) ?? [])];
}
