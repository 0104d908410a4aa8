/**
 * ContractCheck Contract Model — Builders
 *
 * Explicit constructors for descriptors, contracts and invocation
 * arguments. Every field is supplied at construction time; there is no
 * default inheritance chain. A built-in's `operatesOn` is fixed here rather
 * than baked into a type.
 *
 * All builders return frozen values. Arrays inside a contract are copied
 * before freezing so that a caller keeping a reference to its input array
 * cannot mutate the contract afterwards.
 */

import {
  AccessMode,
  ArgumentKind,
  OperatesOn,
  type ArgumentDescriptor,
  type BuiltInTag,
  type DataType,
  type InvocationArgument,
  type Invocation,
  type KernelContract,
  type SpaceRef,
} from './types.js';

// ---------------------------------------------------------------------------
// Argument descriptors
// ---------------------------------------------------------------------------

/**
 * Build an argument descriptor from its parts.
 *
 * No legality check is performed: illegal combinations must stay
 * representable so that the validator can report them.
 */
export function argument(
  kind: ArgumentKind,
  dataType: DataType,
  access: AccessMode,
  spaces: ReadonlyArray<SpaceRef> = [],
): ArgumentDescriptor {
  return Object.freeze({
    kind,
    dataType,
    access,
    spaces: Object.freeze([...spaces]),
  });
}

/** A field argument over one space. */
export function field(dataType: DataType, access: AccessMode, space: SpaceRef): ArgumentDescriptor {
  return argument(ArgumentKind.Field, dataType, access, [space]);
}

/** A scalar argument. Scalars carry no space. */
export function scalar(dataType: DataType, access: AccessMode = AccessMode.Read): ArgumentDescriptor {
  return argument(ArgumentKind.Scalar, dataType, access);
}

/** An operator argument mapping `fromSpace` to `toSpace`. */
export function operator(
  dataType: DataType,
  access: AccessMode,
  toSpace: SpaceRef,
  fromSpace: SpaceRef,
): ArgumentDescriptor {
  return argument(ArgumentKind.Operator, dataType, access, [toSpace, fromSpace]);
}

// ---------------------------------------------------------------------------
// Contracts
// ---------------------------------------------------------------------------

/**
 * Everything needed to construct a KernelContract. `tags` defaults to none.
 */
export interface ContractInit {
  readonly name: string;
  readonly arguments: ReadonlyArray<ArgumentDescriptor>;
  readonly operatesOn: OperatesOn;
  readonly isBuiltIn: boolean;
  readonly tags?: ReadonlyArray<BuiltInTag> | undefined;
}

/**
 * Construct a frozen KernelContract.
 *
 * Duplicate tags are collapsed and the tag list is sorted, so two contracts
 * declared with the same tags in a different order are structurally equal
 * (and hash identically).
 */
export function createContract(init: ContractInit): KernelContract {
  const tags = [...new Set(init.tags ?? [])].sort();
  return Object.freeze({
    name: init.name,
    arguments: Object.freeze(init.arguments.map((a) => argument(a.kind, a.dataType, a.access, a.spaces))),
    operatesOn: init.operatesOn,
    isBuiltIn: init.isBuiltIn,
    tags: Object.freeze(tags),
  });
}

/**
 * A user-written kernel. Defaults to column-wise iteration.
 */
export function userKernel(
  name: string,
  args: ReadonlyArray<ArgumentDescriptor>,
  operatesOn: OperatesOn = OperatesOn.CellColumn,
): KernelContract {
  return createContract({ name, arguments: args, operatesOn, isBuiltIn: false });
}

/**
 * A library built-in. Built-ins always iterate over degrees of freedom.
 */
export function builtIn(
  name: string,
  args: ReadonlyArray<ArgumentDescriptor>,
  tags: ReadonlyArray<BuiltInTag> = [],
): KernelContract {
  return createContract({
    name,
    arguments: args,
    operatesOn: OperatesOn.DegreeOfFreedom,
    isBuiltIn: true,
    tags,
  });
}

// ---------------------------------------------------------------------------
// Invocations
// ---------------------------------------------------------------------------

/**
 * An actual argument. Omitted kind or data type means "unresolved".
 */
export function invocationArg(
  handle: string,
  kind: ArgumentKind | null = null,
  dataType: DataType | null = null,
): InvocationArgument {
  return Object.freeze({ handle, kind, dataType });
}

/** A call site. */
export function invocation(
  label: string,
  kernelName: string,
  args: ReadonlyArray<InvocationArgument>,
): Invocation {
  return Object.freeze({
    label,
    kernelName,
    arguments: Object.freeze([...args]),
  });
}
