/**
 * ContractCheck Host — Validation Log Reader
 *
 * Pure functions over raw JSONL text; obtain it with StateIO.readLogRaw().
 *
 * readLog():
 *   - parses every well-formed entry; malformed lines are counted and dropped
 *   - deduplicates by event_id, first seen wins
 *   - drops and flags a trailing line with no newline (interrupted write)
 *   - returns entries sorted by (timestamp, event_id)
 *
 * Entries merged from several machines may interleave; readLog() does not
 * rely on file order.
 */

import { DiagnosticCode, ValidationOutcome, type ValidationLog } from '@contractcheck/validator';

export interface LogEvent extends ValidationLog {
  /** 26-character ULID. The deduplication key. */
  readonly event_id: string;
}

export interface LogReadStats {
  /** Non-empty complete lines seen. */
  readonly totalLines: number;
  /** Distinct entries returned. */
  readonly parsedEvents: number;
  readonly duplicates: number;
  /** Lines that were not JSON or lacked a required field. */
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly events: ReadonlyArray<LogEvent>;
  readonly stats: LogReadStats;
}

export function readLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  const seen = new Set<string>();
  const events: LogEvent[] = [];
  let duplicates = 0;
  let parseErrors = 0;

  for (const line of lines) {
    const event = parseEvent(line);
    if (event === null) {
      parseErrors++;
    } else if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.add(event.event_id);
      events.push(event);
    }
  }

  events.sort((a, b) => compare(a.timestamp, b.timestamp) || compare(a.event_id, b.event_id));

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

export interface LogQuery {
  readonly subject?: string | undefined;
  readonly outcome?: ValidationOutcome | undefined;
  /** Keep only the newest `limit` matches. */
  readonly limit?: number | undefined;
}

/** Filter sorted events; the result stays in time order. */
export function queryLog(events: ReadonlyArray<LogEvent>, query: LogQuery): ReadonlyArray<LogEvent> {
  const matches = events.filter(
    (e) =>
      (query.subject === undefined || e.subject === query.subject) &&
      (query.outcome === undefined || e.outcome === query.outcome),
  );
  return query.limit === undefined ? matches : matches.slice(Math.max(0, matches.length - query.limit));
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const OUTCOMES = Object.values(ValidationOutcome);
const CODES = Object.values(DiagnosticCode);

function parseEvent(line: string): LogEvent | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  const record: Record<string, unknown> = { ...value };

  const { event_id, subject, subject_kind, registry_hash, contract_hash, timestamp } = record;
  const outcome = OUTCOMES.find((o) => o === record['outcome']);
  const codes = parseCodes(record['codes']);

  if (
    typeof event_id !== 'string' ||
    typeof subject !== 'string' ||
    (subject_kind !== 'contract' && subject_kind !== 'invocation') ||
    outcome === undefined ||
    codes === null ||
    typeof registry_hash !== 'string' ||
    (contract_hash !== null && typeof contract_hash !== 'string') ||
    typeof timestamp !== 'string'
  ) {
    return null;
  }

  return { event_id, subject, subject_kind, outcome, codes, registry_hash, contract_hash, timestamp };
}

function parseCodes(raw: unknown): DiagnosticCode[] | null {
  if (!Array.isArray(raw)) {
    return null;
  }
  const codes = raw.flatMap((c: unknown) => CODES.filter((k) => k === c));
  return codes.length === raw.length ? codes : null;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
