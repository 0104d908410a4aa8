/**
 * ContractCheck Contract Model — Signature Formatting
 *
 * Compact, stable text renderings used in diagnostic messages and CLI
 * listings:
 *
 *   field:real:write@any_space_1
 *   operator:real:read@w0->w1
 *   inc_aX_plus_Y(scalar:real:read, field:real:readwrite@any_space_1, ...)
 */

import type { ArgumentDescriptor, InvocationArgument, KernelContract } from './types.js';

export function formatArgument(arg: ArgumentDescriptor): string {
  const base = `${arg.kind}:${arg.dataType}:${arg.access}`;
  return arg.spaces.length === 0 ? base : `${base}@${arg.spaces.join('->')}`;
}

export function formatSignature(contract: KernelContract): string {
  return `${contract.name}(${contract.arguments.map(formatArgument).join(', ')})`;
}

/** Unresolved kind or data type renders as `?`. */
export function formatInvocationArgument(arg: InvocationArgument): string {
  return `${arg.handle}:${arg.kind ?? '?'}:${arg.dataType ?? '?'}`;
}
