/**
 * ContractCheck Validator — Diagnostic Construction and Messages
 *
 * One message template per code. Argument positions are rendered 1-based.
 */

import type { Diagnostic, DiagnosticDetail } from '../types/diagnostic.js';
import { DiagnosticCode } from '../types/diagnostic.js';
import { legalAccesses } from '../rules/tables.js';

/**
 * Attach severity, subject and rendered message to a detail.
 */
export function createDiagnostic(subject: string, detail: DiagnosticDetail): Diagnostic {
  return { ...detail, severity: 'error', subject, message: renderMessage(detail) };
}

function position(argumentIndex: number): string {
  return `argument ${argumentIndex + 1}`;
}

function plural(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? '' : 's'}`;
}

/**
 * Render the message template for a diagnostic detail.
 */
export function renderMessage(detail: DiagnosticDetail): string {
  switch (detail.code) {
    case DiagnosticCode.EmptyArgumentList:
      return 'Contract declares no arguments; at least one is required.';

    case DiagnosticCode.IllegalAccessMode: {
      const legal = legalAccesses(detail.kind);
      const allowed = legal.length === 0 ? 'no access mode' : legal.map((a) => `'${a}'`).join(', ');
      return (
        `Access '${detail.access}' is not legal for ${detail.kind} ${position(detail.argumentIndex)}; ` +
        `${withArticle(detail.kind)} allows ${allowed}.`
      );
    }

    case DiagnosticCode.InvalidSpaceCount:
      return (
        `${capitalize(position(detail.argumentIndex))} is ${withArticle(detail.kind)} and must name ` +
        `${plural(detail.expected, 'function space')} but names ${detail.actual}.`
      );

    case DiagnosticCode.InvalidWriteCount:
      return detail.expected === 0
        ? `Zero-output built-in must not write to any field argument but writes to ${detail.actual}.`
        : `Built-in must write to exactly ${plural(detail.expected, 'field argument')} ` +
            `but writes to ${detail.actual}.`;

    case DiagnosticCode.OperatorArgumentInBuiltIn:
      return (
        `${capitalize(position(detail.argumentIndex))} is an operator; ` +
        'built-ins may not take operator arguments.'
      );

    case DiagnosticCode.NonScalarReduction:
      return (
        `${capitalize(position(detail.argumentIndex))} has 'sum' access but is ${withArticle(detail.kind)}; ` +
        'only scalars may be reductions.'
      );

    case DiagnosticCode.ConflictingReductionAndWrite:
      return (
        `Field ${position(detail.argumentIndex)} has '${detail.access}' access while ` +
        `${position(detail.reductionIndex)} is a reduction and ` +
        `${position(detail.readWriteIndex)} is a 'readwrite' field; ` +
        'a reduction may not be mixed with differently-permissioned writable fields.'
      );

    case DiagnosticCode.SpaceMismatch:
      return (
        `Field ${position(detail.argumentIndex)} is on space '${detail.actual}' ` +
        `but the built-in's fields are on '${detail.expected}'.`
      );

    case DiagnosticCode.NoEffectiveOutput:
      return 'Built-in has no field argument and no reduction, so it produces no output.';

    case DiagnosticCode.ArityMismatch:
      return detail.expected.length === 0
        ? `Invocation passes ${plural(detail.actual, 'argument')} but there is no candidate contract.`
        : `Invocation passes ${plural(detail.actual, 'argument')} ` +
            `but candidates take ${detail.expected.join(' or ')}.`;

    case DiagnosticCode.TypeMismatch: {
      const aspect = detail.aspect === 'kind' ? 'kind' : 'data type';
      return (
        `${capitalize(position(detail.argumentIndex))} ('${detail.handle}') has ${aspect} ` +
        `'${detail.actual}' but '${detail.candidate}' expects '${detail.expected}'.`
      );
    }

    case DiagnosticCode.AmbiguousInvocation:
      return (
        `Invocation matches ${detail.signatures.length} candidate contracts: ` +
        `${detail.signatures.join('; ')}.`
      );

    case DiagnosticCode.UnknownKernel:
      return `No kernel named '${detail.kernelName}' is registered.`;

    case DiagnosticCode.InvalidContractBound:
      return (
        `Invocation binds to '${detail.kernelName}', whose contract failed validation ` +
        `(${detail.contractCodes.join(', ')}).`
      );

    default: {
      const unreachable: never = detail;
      return String(unreachable);
    }
  }
}

function withArticle(noun: string): string {
  return `${/^[aeiou]/.test(noun) ? 'an' : 'a'} ${noun}`;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
