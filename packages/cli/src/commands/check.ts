/**
 * contractcheck check — Validate kernel contracts and bind invocations
 *
 * Each manifest is one compilation unit. Exit status:
 *   0  every contract and invocation accepted
 *   1  at least one diagnostic
 *   2  a manifest could not be read or registered
 *
 * An unusable manifest is reported on stderr; the others are still checked.
 */

import { Command } from 'commander';
import {
  FileLogSink,
  FileStateIO,
  loadBuiltInCatalog,
  loadConfig,
  resolveHome,
} from '@contractcheck/host';
import { chalkTheme } from '../output/theme.js';
import { formatInputError, formatUnitReport, unitReportToJson } from '../output/report.js';
import { exitCodeFor, readManifestFiles, runCheck } from '../runtime.js';

interface CheckOptions {
  json?: boolean;
  builtins: boolean;
  log: boolean;
  home?: string;
}

export const checkCommand = new Command('check')
  .description('Validate the contracts and invocations in one or more manifests')
  .argument('<manifest...>', 'Manifest files (JSON); each is one compilation unit')
  .option('--json', 'Output as JSON')
  .option('--no-builtins', 'Do not register the built-in catalog')
  .option('--no-log', 'Do not append to the validation log')
  .option('--home <dir>', 'State directory (default: $CONTRACTCHECK_HOME or ~/.contractcheck)')
  .action((paths: string[], options: CheckOptions) => {
    const io = new FileStateIO(resolveHome({ home: options.home }));
    const config = loadConfig(io);

    const files = readManifestFiles(paths);
    const run = runCheck(files.manifests, {
      builtIns: options.builtins && config.builtins ? loadBuiltInCatalog() : [],
      sink: options.log && config.logging ? new FileLogSink(io) : undefined,
    });
    const inputErrors = [...files.errors, ...run.inputErrors];

    for (const error of inputErrors) {
      process.stderr.write(formatInputError(error, chalkTheme) + '\n');
    }
    if (options.json === true) {
      const body = { units: run.reports.map(unitReportToJson), input_errors: inputErrors };
      process.stdout.write(JSON.stringify(body, null, 2) + '\n');
    } else if (run.reports.length > 0) {
      process.stdout.write(run.reports.map((r) => formatUnitReport(r, chalkTheme)).join('\n\n') + '\n');
    }
    process.exit(exitCodeFor({ reports: run.reports, inputErrors }));
  });
