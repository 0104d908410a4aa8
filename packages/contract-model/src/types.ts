/**
 * ContractCheck Contract Model — Core Type Definitions
 *
 * The in-memory representation of a kernel's declared argument contract and
 * of the actual arguments supplied at an invocation site.
 *
 * These types are the base layer of ContractCheck. The validator, registry
 * and CLI packages depend on this package; this package has no internal
 * dependencies.
 *
 * Every value described here is immutable once constructed. Builders in
 * builders.ts freeze what they return; nothing downstream mutates a
 * contract after the registry is sealed.
 */

// ---------------------------------------------------------------------------
// Argument Kinds and Access Modes
// ---------------------------------------------------------------------------

/**
 * The closed set of argument kinds a kernel may declare.
 */
export enum ArgumentKind {
  /** A field defined over exactly one function space. */
  Field = 'field',
  /** A single value. Carries no function space. */
  Scalar = 'scalar',
  /** A linear-operator-like argument coupling a "to" and a "from" space. */
  Operator = 'operator',
}

/**
 * The closed set of access modes.
 *
 * Legality depends on the argument kind; see isLegalAccess() in
 * @contractcheck/validator for the fixed table.
 */
export enum AccessMode {
  Read = 'read',
  Write = 'write',
  ReadWrite = 'readwrite',
  /** Accumulate in place. */
  Increment = 'inc',
  /** Reduction across iteration instances into a single scalar result. */
  Sum = 'sum',
}

/** Element data type of an argument. */
export enum DataType {
  Real = 'real',
  Integer = 'integer',
  Logical = 'logical',
}

/** The iteration domain a kernel is written against. */
export enum OperatesOn {
  CellColumn = 'cell_column',
  DegreeOfFreedom = 'dof',
  Domain = 'domain',
}

/**
 * Explicit markers that relax a built-in shape rule.
 *
 * A built-in carries a tag only when the library defines the operation that
 * way. Tags are never inferred from the argument list.
 */
export enum BuiltInTag {
  /** Conversion between spaces (e.g. integer-to-real field cast). Exempt from the shared-space rule. */
  CrossSpace = 'cross_space',
  /** Pure reduction into a scalar. The single-writer rule then expects no writable field. */
  ZeroOutput = 'zero_output',
}

// ---------------------------------------------------------------------------
// Descriptors and Contracts
// ---------------------------------------------------------------------------

/**
 * Identifier of a function/iteration space.
 *
 * Two SpaceRefs are equal only if their identifiers are identical strings.
 * Placeholders such as `any_space_1` are ordinary identifiers: `any_space_1`
 * and `any_space_2` are different spaces.
 */
export type SpaceRef = string;

/**
 * One declared argument of a kernel.
 *
 * `spaces` holds 0 entries for scalars, 1 for fields and 2 (to, from) for
 * operators. A descriptor with the wrong count is representable so that the
 * validator can report it rather than fail.
 */
export interface ArgumentDescriptor {
  readonly kind: ArgumentKind;
  readonly dataType: DataType;
  readonly access: AccessMode;
  readonly spaces: ReadonlyArray<SpaceRef>;
}

/**
 * A kernel's declared contract.
 *
 * Built-ins are distinguished by the explicit `isBuiltIn` flag. The rule
 * engine branches on it; there is no type hierarchy.
 *
 * Invariant: `arguments` is non-empty. An empty list is still representable
 * and is reported as a diagnostic, never thrown.
 */
export interface KernelContract {
  readonly name: string;
  readonly arguments: ReadonlyArray<ArgumentDescriptor>;
  readonly operatesOn: OperatesOn;
  readonly isBuiltIn: boolean;
  /** Shape-rule relaxations. Only meaningful when `isBuiltIn` is true. */
  readonly tags: ReadonlyArray<BuiltInTag>;
}

// ---------------------------------------------------------------------------
// Invocations
// ---------------------------------------------------------------------------

/**
 * An actual argument supplied at a call site.
 *
 * `kind` and `dataType` are null when the call-site scanner could not
 * resolve them. The binder treats null as a wildcard.
 */
export interface InvocationArgument {
  /** Opaque handle naming the actual argument (usually its source identifier). */
  readonly handle: string;
  readonly kind: ArgumentKind | null;
  readonly dataType: DataType | null;
}

/**
 * One kernel call inside a compilation unit.
 */
export interface Invocation {
  /** Human-readable call-site label, used as the diagnostic subject. */
  readonly label: string;
  readonly kernelName: string;
  readonly arguments: ReadonlyArray<InvocationArgument>;
}

// ---------------------------------------------------------------------------
// Parse and Validation Result Types
// ---------------------------------------------------------------------------

/**
 * A parse error produced by the notation parser.
 *
 * `column` is 1-based and points at the offending token.
 */
export interface ParseError {
  readonly column: number;
  readonly message: string;
}

/**
 * Result of parsing one metadata-entry notation string.
 */
export type NotationResult =
  | { readonly ok: true; readonly descriptor: ArgumentDescriptor }
  | { readonly ok: false; readonly errors: ReadonlyArray<ParseError> };

/**
 * A structural error found while validating untyped input (manifests,
 * configuration).
 */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
