/**
 * contractcheck log — Query the validation log
 *
 * Every contract check and every binding is logged regardless of outcome.
 * Entries are read from <home>/logs/validations.jsonl, deduplicated and
 * sorted by timestamp.
 */

import { Command } from 'commander';
import {
  FileStateIO,
  VALIDATION_LOG,
  queryLog,
  readLog,
  resolveHome,
} from '@contractcheck/host';
import type { ValidationOutcome } from '@contractcheck/validator';
import { chalkTheme } from '../output/theme.js';
import { formatLogEvents } from '../output/report.js';
import { EXIT_INPUT_ERROR, parseLimit, parseOutcome } from '../runtime.js';

function fail(message: string): never {
  process.stderr.write(`Error: ${message}\n`);
  process.exit(EXIT_INPUT_ERROR);
}

export const logCommand = new Command('log')
  .description('Query the validation log')
  .option('--subject <name>', 'Filter by contract name or call-site label')
  .option('--outcome <outcome>', 'Filter by outcome (accepted|rejected)')
  .option('--limit <n>', 'Show only the newest n matching entries')
  .option('--json', 'Output as JSON')
  .option('--home <dir>', 'State directory (default: $CONTRACTCHECK_HOME or ~/.contractcheck)')
  .action((options: {
    subject?: string;
    outcome?: string;
    limit?: string;
    json?: boolean;
    home?: string;
  }) => {
    let outcome: ValidationOutcome | undefined;
    if (options.outcome !== undefined) {
      const parsed = parseOutcome(options.outcome);
      outcome = parsed.ok ? parsed.value : fail(parsed.error);
    }
    let limit: number | undefined;
    if (options.limit !== undefined) {
      const parsed = parseLimit(options.limit);
      limit = parsed.ok ? parsed.value : fail(parsed.error);
    }

    const io = new FileStateIO(resolveHome({ home: options.home }));
    const { events, stats } = readLog(io.readLogRaw(VALIDATION_LOG));
    const matches = queryLog(events, { subject: options.subject, outcome, limit });

    if (options.json === true) {
      process.stdout.write(JSON.stringify(matches, null, 2) + '\n');
      return;
    }
    process.stdout.write(formatLogEvents(matches, chalkTheme) + '\n');
    if (stats.parseErrors > 0 || stats.partialTrailingLine) {
      process.stderr.write(
        chalkTheme.warn(
          `${stats.parseErrors} malformed line(s) skipped` +
            (stats.partialTrailingLine ? '; trailing partial line ignored' : ''),
        ) + '\n',
      );
    }
  });
