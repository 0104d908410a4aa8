/**
 * contractcheck builtins — Inspect the built-in catalog
 *
 * Subcommands:
 *   contractcheck builtins list   — every built-in with its shape-check result
 */

import { Command } from 'commander';
import { loadBuiltInCatalog } from '@contractcheck/host';
import { checkContract } from '@contractcheck/validator';
import { formatSignature } from '@contractcheck/contract-model';
import { chalkTheme } from '../output/theme.js';
import { formatBuiltInList } from '../output/report.js';
import { EXIT_OK, EXIT_REJECTED } from '../runtime.js';

export const builtinsCommand = new Command('builtins')
  .description('Inspect the built-in kernel catalog');

builtinsCommand
  .command('list')
  .description('List the built-ins and check each against the built-in shape rules')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    const reports = loadBuiltInCatalog().map(checkContract);

    if (options.json === true) {
      const rows = reports.map((r) => ({
        name: r.contract.name,
        signature: formatSignature(r.contract),
        tags: r.contract.tags,
        hash: r.hash,
        diagnostics: r.diagnostics,
      }));
      process.stdout.write(JSON.stringify(rows, null, 2) + '\n');
    } else {
      process.stdout.write(formatBuiltInList(reports, chalkTheme) + '\n');
    }
    process.exit(reports.every((r) => r.ok) ? EXIT_OK : EXIT_REJECTED);
  });
