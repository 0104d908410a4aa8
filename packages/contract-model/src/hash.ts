/**
 * ContractCheck Contract Model — Canonical Hashing
 *
 * Identical contracts must hash identically regardless of property
 * insertion order. The registry hash and every validation log entry are
 * derived from these functions.
 */

import { createHash } from 'node:crypto';
import type { KernelContract } from './types.js';

/**
 * Canonical JSON with object keys sorted at every level.
 *
 * `undefined` and `null` both serialize as `null`; array order is kept.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map((v: unknown) => canonicalize(v)).join(',') + ']';
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return '{' + entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',') + '}';
  }
  return 'null';
}

/** SHA-256 hex digest of a string. */
export function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * SHA-256 of a contract's canonical form.
 *
 * Covers every field, including the name: two overloads with the same
 * name but different arguments hash differently.
 */
export function contractHash(contract: KernelContract): string {
  return sha256(canonicalize(contract));
}
