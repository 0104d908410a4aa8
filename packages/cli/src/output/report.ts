/**
 * output/report.ts — pure formatters for `contractcheck` output.
 *
 * Every function returns a string and writes nothing. Commands print the
 * result; tests compare it under plainTheme.
 */

import { formatSignature } from '@contractcheck/contract-model'
import type { ContractCheckConfig, LogEvent } from '@contractcheck/host'
import type { ContractReport, Diagnostic, InvocationReport, UnitReport } from '@contractcheck/validator'
import type { InputError } from '../runtime.js'
import { outcomeColor, type Theme } from './theme.js'

const HASH_PREFIX = 12

function plural(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? '' : 's'}`
}

export function formatDiagnostic(d: Diagnostic, t: Theme): string {
  return `${t.error('error')} ${t.accent(d.code)} ${t.text(d.subject)}: ${d.message}`
}

function formatInvocation(r: InvocationReport, t: Theme): string {
  const { label, kernelName } = r.invocation
  return r.result.ok
    ? `${t.ok('✓')} ${label} ${t.dim('→')} ${formatSignature(r.result.contract)}`
    : `${t.error('✗')} ${label} ${t.dim('→')} ${kernelName}`
}

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

export function formatUnitReport(report: UnitReport, t: Theme): string {
  const rejectedContracts = report.contracts.filter((c) => !c.ok).length
  const rejectedCalls = report.invocations.filter((i) => !i.result.ok).length

  const lines = [
    `${t.accent(report.unit)}  ${t.dim('registry')} ${t.muted(report.registryHash.slice(0, HASH_PREFIX))}`,
    `  ${t.dim('contracts')}    ${report.contracts.length} checked, ${rejectedContracts} rejected`,
    `  ${t.dim('invocations')}  ${report.invocations.length} checked, ${rejectedCalls} rejected`,
  ]
  for (const r of report.invocations) {
    lines.push('    ' + formatInvocation(r, t))
  }
  for (const d of report.diagnostics) {
    lines.push('  ' + formatDiagnostic(d, t))
  }
  lines.push(
    report.ok
      ? `  ${t.ok('✓ ok')}`
      : `  ${t.error('✗ ' + plural(report.diagnostics.length, 'diagnostic'))}`,
  )
  return lines.join('\n')
}

export function formatInputError(e: InputError, t: Theme): string {
  return `${t.error('Error:')} ${e.message}`
}

/** Machine-readable summary of a unit report. Contracts appear only when rejected. */
export function unitReportToJson(report: UnitReport): object {
  return {
    unit: report.unit,
    registry_hash: report.registryHash,
    ok: report.ok,
    rejected_contracts: report.contracts.filter((c) => !c.ok).map((c) => c.contract.name),
    invocations: report.invocations.map((r) => ({
      label: r.invocation.label,
      kernel: r.invocation.kernelName,
      bound: r.result.ok ? formatSignature(r.result.contract) : null,
    })),
    diagnostics: report.diagnostics,
  }
}

// ---------------------------------------------------------------------------
// builtins list
// ---------------------------------------------------------------------------

export function formatBuiltInList(reports: ReadonlyArray<ContractReport>, t: Theme): string {
  const lines: string[] = []
  for (const r of reports) {
    const tags = r.contract.tags.length === 0 ? '' : '  ' + t.muted(`[${r.contract.tags.join(', ')}]`)
    lines.push(`${r.ok ? t.ok('✓') : t.error('✗')} ${formatSignature(r.contract)}${tags}`)
    for (const d of r.diagnostics) {
      lines.push('    ' + formatDiagnostic(d, t))
    }
  }
  const rejected = reports.filter((r) => !r.ok).length
  lines.push(t.dim(`${plural(reports.length, 'built-in')}, ${rejected} rejected`))
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// log
// ---------------------------------------------------------------------------

export function formatLogEvent(e: LogEvent, t: Theme): string {
  const codes = e.codes.length === 0 ? '' : '  ' + t.muted(e.codes.join(', '))
  return (
    `${t.dim(e.timestamp)}  ${outcomeColor(t, e.outcome)(e.outcome)}  ` +
    `${e.subject_kind.padEnd(10)} ${t.text(e.subject)}${codes}`
  )
}

export function formatLogEvents(events: ReadonlyArray<LogEvent>, t: Theme): string {
  if (events.length === 0) {
    return t.dim('no entries')
  }
  return events.map((e) => formatLogEvent(e, t)).join('\n')
}

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

export function formatConfig(config: ContractCheckConfig, home: string, t: Theme): string {
  return [
    `${t.dim('home')}      ${home}`,
    `${t.dim('logging')}   ${String(config.logging)}`,
    `${t.dim('builtins')}  ${String(config.builtins)}`,
  ].join('\n')
}
