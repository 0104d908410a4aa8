/**
 * ContractCheck Registry — Manifest Validator
 *
 * Turns an unknown JSON value into a ContractManifest, or reports every
 * structural error with a context path (`contracts[2].args[0]`).
 *
 * Validation is structural only. A contract with an illegal access mode or
 * a broken built-in shape is a well-formed manifest entry; the rule engine
 * reports it later as a diagnostic.
 */

import {
  AccessMode,
  ArgumentKind,
  BuiltInTag,
  DataType,
  OperatesOn,
  argument,
  createContract,
  invocation,
  invocationArg,
  parseArgumentNotation,
  type ArgumentDescriptor,
  type Invocation,
  type InvocationArgument,
  type KernelContract,
  type ValidationError,
  type ValidationResult,
} from '@contractcheck/contract-model';
import type { ContractManifest } from './types.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(values: ReadonlyArray<T>, value: unknown): T | undefined {
  return values.find((v) => v === value);
}

function expected(values: ReadonlyArray<string>): string {
  return values.map((v) => `"${v}"`).join(', ');
}

const KINDS = Object.values(ArgumentKind);
const DATA_TYPES = Object.values(DataType);
const ACCESS_MODES = Object.values(AccessMode);
const OPERATES_ON = Object.values(OperatesOn);
const TAGS = Object.values(BuiltInTag);

/**
 * Validates manifest documents. Stateless; one instance may be reused.
 */
export class ManifestValidator {
  validateManifest(manifest: unknown): ValidationResult<ContractManifest> {
    const errors: ValidationError[] = [];

    if (!isObject(manifest)) {
      return { ok: false, errors: [{ message: 'Manifest must be a JSON object', context: '$' }] };
    }

    const contracts = this.section(manifest, 'contracts', errors).flatMap((entry, i) => {
      const contract = this.validateContract(entry, `contracts[${i}]`, errors);
      return contract === undefined ? [] : [contract];
    });

    const invocations = this.section(manifest, 'invocations', errors).flatMap((entry, i) => {
      const call = this.validateInvocation(entry, i, errors);
      return call === undefined ? [] : [call];
    });

    if (errors.length > 0) {
      return { ok: false, errors };
    }
    return { ok: true, value: { contracts, invocations } };
  }

  // ---------------------------------------------------------------------------
  // Sections
  // ---------------------------------------------------------------------------

  private section(manifest: JsonObject, key: string, errors: ValidationError[]): ReadonlyArray<unknown> {
    const value = manifest[key];
    if (value === undefined) {
      return [];
    }
    if (!Array.isArray(value)) {
      errors.push({ message: `"${key}" must be an array`, context: key });
      return [];
    }
    return value;
  }

  // ---------------------------------------------------------------------------
  // Contracts
  // ---------------------------------------------------------------------------

  private validateContract(
    entry: unknown,
    context: string,
    errors: ValidationError[],
  ): KernelContract | undefined {
    if (!isObject(entry)) {
      errors.push({ message: 'Contract entry must be an object', context });
      return undefined;
    }
    const before = errors.length;

    const name = entry['name'];
    if (typeof name !== 'string' || name.length === 0) {
      errors.push({ message: '"name" must be a non-empty string', context: `${context}.name` });
    }

    const builtin = entry['builtin'] ?? false;
    if (typeof builtin !== 'boolean') {
      errors.push({ message: '"builtin" must be a boolean', context: `${context}.builtin` });
    }
    const isBuiltIn = builtin === true;

    const rawOperatesOn = entry['operates_on'];
    const operatesOn =
      rawOperatesOn === undefined
        ? isBuiltIn
          ? OperatesOn.DegreeOfFreedom
          : OperatesOn.CellColumn
        : oneOf(OPERATES_ON, rawOperatesOn);
    if (operatesOn === undefined) {
      errors.push({
        message: `"operates_on" must be one of ${expected(OPERATES_ON)}`,
        context: `${context}.operates_on`,
      });
    }

    const tags = this.validateTags(entry['tags'], `${context}.tags`, errors);

    const rawArgs = entry['args'];
    let args: ArgumentDescriptor[] = [];
    if (!Array.isArray(rawArgs)) {
      errors.push({ message: '"args" must be an array', context: `${context}.args` });
    } else {
      args = rawArgs.flatMap((arg: unknown, j) => {
        const descriptor = this.validateArgument(arg, `${context}.args[${j}]`, errors);
        return descriptor === undefined ? [] : [descriptor];
      });
    }

    if (errors.length > before || typeof name !== 'string' || operatesOn === undefined) {
      return undefined;
    }
    return createContract({ name, arguments: args, operatesOn, isBuiltIn, tags });
  }

  private validateTags(raw: unknown, context: string, errors: ValidationError[]): BuiltInTag[] {
    if (raw === undefined) {
      return [];
    }
    if (!Array.isArray(raw)) {
      errors.push({ message: '"tags" must be an array', context });
      return [];
    }
    return raw.flatMap((value: unknown, k) => {
      const tag = oneOf(TAGS, value);
      if (tag === undefined) {
        errors.push({ message: `Unknown tag; expected one of ${expected(TAGS)}`, context: `${context}[${k}]` });
        return [];
      }
      return [tag];
    });
  }

  /** A notation string or an explicit `{ kind, data_type, access, spaces? }` object. */
  private validateArgument(
    raw: unknown,
    context: string,
    errors: ValidationError[],
  ): ArgumentDescriptor | undefined {
    if (typeof raw === 'string') {
      const parsed = parseArgumentNotation(raw);
      if (!parsed.ok) {
        for (const e of parsed.errors) {
          errors.push({ message: `${e.message} (column ${e.column})`, context });
        }
        return undefined;
      }
      return parsed.descriptor;
    }
    if (!isObject(raw)) {
      errors.push({ message: 'Argument must be a notation string or an object', context });
      return undefined;
    }

    const kind = oneOf(KINDS, raw['kind']);
    if (kind === undefined) {
      errors.push({ message: `"kind" must be one of ${expected(KINDS)}`, context: `${context}.kind` });
    }
    const dataType = oneOf(DATA_TYPES, raw['data_type']);
    if (dataType === undefined) {
      errors.push({
        message: `"data_type" must be one of ${expected(DATA_TYPES)}`,
        context: `${context}.data_type`,
      });
    }
    const access = oneOf(ACCESS_MODES, raw['access']);
    if (access === undefined) {
      errors.push({
        message: `"access" must be one of ${expected(ACCESS_MODES)}`,
        context: `${context}.access`,
      });
    }
    const spaces = this.validateSpaces(raw['spaces'], `${context}.spaces`, errors);

    if (kind === undefined || dataType === undefined || access === undefined || spaces === undefined) {
      return undefined;
    }
    return argument(kind, dataType, access, spaces);
  }

  private validateSpaces(raw: unknown, context: string, errors: ValidationError[]): string[] | undefined {
    if (raw === undefined) {
      return [];
    }
    if (!Array.isArray(raw)) {
      errors.push({ message: '"spaces" must be an array of strings', context });
      return undefined;
    }
    const spaces: string[] = [];
    raw.forEach((value: unknown, k) => {
      if (typeof value === 'string' && value.length > 0) {
        spaces.push(value.toLowerCase());
      } else {
        errors.push({ message: 'Space name must be a non-empty string', context: `${context}[${k}]` });
      }
    });
    return spaces.length === raw.length ? spaces : undefined;
  }

  // ---------------------------------------------------------------------------
  // Invocations
  // ---------------------------------------------------------------------------

  private validateInvocation(entry: unknown, index: number, errors: ValidationError[]): Invocation | undefined {
    const context = `invocations[${index}]`;
    if (!isObject(entry)) {
      errors.push({ message: 'Invocation entry must be an object', context });
      return undefined;
    }
    const before = errors.length;

    const kernel = entry['kernel'];
    if (typeof kernel !== 'string' || kernel.length === 0) {
      errors.push({ message: '"kernel" must be a non-empty string', context: `${context}.kernel` });
    }

    const label = entry['label'];
    if (label !== undefined && (typeof label !== 'string' || label.length === 0)) {
      errors.push({ message: '"label" must be a non-empty string', context: `${context}.label` });
    }

    const rawArgs = entry['args'];
    let args: InvocationArgument[] = [];
    if (!Array.isArray(rawArgs)) {
      errors.push({ message: '"args" must be an array', context: `${context}.args` });
    } else {
      args = rawArgs.flatMap((arg: unknown, j) => {
        const actual = this.validateActual(arg, `${context}.args[${j}]`, errors);
        return actual === undefined ? [] : [actual];
      });
    }

    if (errors.length > before || typeof kernel !== 'string') {
      return undefined;
    }
    return invocation(typeof label === 'string' ? label : `${kernel}#${index}`, kernel, args);
  }

  /** A bare handle, or `{ handle, kind?, data_type? }`. Omitted or null kind/type is unresolved. */
  private validateActual(
    raw: unknown,
    context: string,
    errors: ValidationError[],
  ): InvocationArgument | undefined {
    if (typeof raw === 'string' && raw.length > 0) {
      return invocationArg(raw);
    }
    if (!isObject(raw)) {
      errors.push({ message: 'Argument must be a handle string or an object', context });
      return undefined;
    }

    const handle = raw['handle'];
    if (typeof handle !== 'string' || handle.length === 0) {
      errors.push({ message: '"handle" must be a non-empty string', context: `${context}.handle` });
    }
    const rawKind = raw['kind'] ?? null;
    const kind = rawKind === null ? null : oneOf(KINDS, rawKind);
    if (kind === undefined) {
      errors.push({ message: `"kind" must be one of ${expected(KINDS)}`, context: `${context}.kind` });
    }
    const rawType = raw['data_type'] ?? null;
    const dataType = rawType === null ? null : oneOf(DATA_TYPES, rawType);
    if (dataType === undefined) {
      errors.push({
        message: `"data_type" must be one of ${expected(DATA_TYPES)}`,
        context: `${context}.data_type`,
      });
    }

    if (typeof handle !== 'string' || handle.length === 0 || kind === undefined || dataType === undefined) {
      return undefined;
    }
    return invocationArg(handle, kind, dataType);
  }
}
