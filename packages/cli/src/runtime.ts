/**
 * runtime.ts — command cores shared by the Commander actions and tests.
 *
 * Nothing here touches the process: no argv, no stdout, no exit codes.
 * File access goes through an injected reader and StateIO.
 */

import { readFileSync } from 'node:fs';
import type { KernelContract } from '@contractcheck/contract-model';
import {
  loadConfig,
  saveConfig,
  setConfigValue,
  type ContractCheckConfig,
  type StateIO,
} from '@contractcheck/host';
import {
  ContractRegistry,
  DuplicateContractError,
  ManifestError,
  formatValidationError,
  loadManifest,
  parseManifestText,
} from '@contractcheck/registry';
import {
  ContractValidator,
  ValidationLogger,
  ValidationOutcome,
  type CompilationUnit,
  type LogSink,
  type UnitReport,
} from '@contractcheck/validator';

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_OK = 0;
/** At least one contract or invocation was rejected. */
export const EXIT_REJECTED = 1;
/** The input could not be read: bad manifest, duplicate contract, unreadable file. */
export const EXIT_INPUT_ERROR = 2;

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

export interface ManifestSource {
  readonly source: string;
  readonly text: string;
}

/** A manifest that could not be read, parsed or registered. */
export interface InputError {
  readonly source: string;
  readonly message: string;
}

export interface CheckRunOptions {
  /** Contracts registered into every unit's registry before the manifest's own. */
  readonly builtIns: ReadonlyArray<KernelContract>;
  readonly sink?: LogSink | undefined;
  readonly clock?: (() => string) | undefined;
}

export interface CheckRun {
  /** One report per usable manifest, in input order. */
  readonly reports: ReadonlyArray<UnitReport>;
  readonly inputErrors: ReadonlyArray<InputError>;
}

interface PreparedUnit {
  readonly unit: CompilationUnit;
  readonly registry: ContractRegistry;
}

/**
 * Validate each manifest as its own compilation unit.
 *
 * Every manifest is parsed and registered before any unit is validated, so
 * a bad manifest is reported as an input error and nothing is logged for
 * it; the remaining manifests are still validated. Each unit gets a fresh
 * registry holding the built-ins plus that manifest's contracts, sealed
 * before validation.
 */
export function runCheck(
  manifests: ReadonlyArray<ManifestSource>,
  options: CheckRunOptions,
): CheckRun {
  const prepared: PreparedUnit[] = [];
  const inputErrors: InputError[] = [];

  for (const { source, text } of manifests) {
    try {
      const registry = new ContractRegistry();
      registry.registerAll(options.builtIns);
      const invocations = loadManifest(parseManifestText(text, source), registry, source);
      registry.seal();
      prepared.push({ unit: { name: source, invocations }, registry });
    } catch (err) {
      const inputError = toInputError(source, err);
      if (inputError === null) {
        throw err;
      }
      inputErrors.push(inputError);
    }
  }

  const validator = new ContractValidator({
    logger: new ValidationLogger(options.sink),
    ...(options.clock !== undefined ? { clock: options.clock } : {}),
  });
  const reports = prepared.map(({ unit, registry }) => validator.validateUnit(unit, registry));

  return { reports, inputErrors };
}

/** 2 when any manifest was unusable, else 1 when any unit was rejected, else 0. */
export function exitCodeFor(run: CheckRun): number {
  if (run.inputErrors.length > 0) {
    return EXIT_INPUT_ERROR;
  }
  return run.reports.every((r) => r.ok) ? EXIT_OK : EXIT_REJECTED;
}

export interface ManifestFiles {
  readonly manifests: ReadonlyArray<ManifestSource>;
  readonly errors: ReadonlyArray<InputError>;
}

/**
 * Read manifest files from disk. A file that cannot be read becomes an
 * input error; the others are still returned.
 */
export function readManifestFiles(
  paths: ReadonlyArray<string>,
  read: (path: string) => string = (path) => readFileSync(path, 'utf-8'),
): ManifestFiles {
  const manifests: ManifestSource[] = [];
  const errors: InputError[] = [];
  for (const source of paths) {
    try {
      manifests.push({ source, text: read(source) });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      errors.push({ source, message: `Cannot read ${source}: ${message}` });
    }
  }
  return { manifests, errors };
}

/**
 * The input error for a failure while loading `source`, or null if `err`
 * is not an input problem.
 */
export function toInputError(source: string, err: unknown): InputError | null {
  if (err instanceof ManifestError) {
    return { source, message: err.message };
  }
  if (err instanceof DuplicateContractError) {
    return { source, message: `${source}: ${err.message}` };
  }
  return null;
}

// ---------------------------------------------------------------------------
// log
// ---------------------------------------------------------------------------

export type OptionResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string };

/** `accepted` / `rejected`, case-insensitive. */
export function parseOutcome(raw: string): OptionResult<ValidationOutcome> {
  const outcome = Object.values(ValidationOutcome).find((o) => o.toLowerCase() === raw.toLowerCase());
  return outcome === undefined
    ? { ok: false, error: `Unknown outcome "${raw}". Expected accepted or rejected` }
    : { ok: true, value: outcome };
}

export function parseLimit(raw: string): OptionResult<number> {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0
    ? { ok: true, value: n }
    : { ok: false, error: `--limit must be a positive integer, got "${raw}"` };
}

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

/**
 * Apply and persist one config change.
 *
 * @returns the saved config, or the reason nothing was saved
 */
export function applyConfigChange(
  io: StateIO,
  key: string,
  value: string,
): OptionResult<ContractCheckConfig> {
  const result = setConfigValue(loadConfig(io), key, value);
  if (!result.ok) {
    return { ok: false, error: result.errors.map(formatValidationError).join('; ') };
  }
  saveConfig(io, result.value);
  return { ok: true, value: result.value };
}
