/**
 * @contractcheck/contract-model
 *
 * Kernel contract model: argument kinds, access modes, descriptors,
 * contracts, invocation arguments, builders, the metadata-entry notation
 * parser and canonical hashing.
 *
 * All other ContractCheck packages depend on this package. It has no
 * internal dependencies.
 */

// Types
export type {
  ArgumentDescriptor,
  Invocation,
  InvocationArgument,
  KernelContract,
  NotationResult,
  ParseError,
  SpaceRef,
  ValidationError,
  ValidationResult,
} from './types.js';

export {
  AccessMode,
  ArgumentKind,
  BuiltInTag,
  DataType,
  OperatesOn,
} from './types.js';

// Builders
export type { ContractInit } from './builders.js';
export {
  argument,
  builtIn,
  createContract,
  field,
  invocation,
  invocationArg,
  operator,
  scalar,
  userKernel,
} from './builders.js';

// Notation, formatting, hashing
export { parseArgumentNotation } from './notation.js';
export { formatArgument, formatInvocationArgument, formatSignature } from './format.js';
export { canonicalize, contractHash, sha256 } from './hash.js';
