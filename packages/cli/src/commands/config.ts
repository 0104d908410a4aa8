/**
 * contractcheck config — Show and change settings
 *
 * Subcommands:
 *   contractcheck config show
 *   contractcheck config set <key> <value>
 */

import { Command } from 'commander';
import { CONFIG_KEYS, FileStateIO, loadConfig, resolveHome } from '@contractcheck/host';
import { chalkTheme } from '../output/theme.js';
import { formatConfig } from '../output/report.js';
import { EXIT_INPUT_ERROR, applyConfigChange } from '../runtime.js';

const HOME_HELP = 'State directory (default: $CONTRACTCHECK_HOME or ~/.contractcheck)';

export const configCommand = new Command('config')
  .description('Show and change contractcheck settings');

configCommand
  .command('show')
  .description('Print the effective configuration')
  .option('--json', 'Output as JSON')
  .option('--home <dir>', HOME_HELP)
  .action((options: { json?: boolean; home?: string }) => {
    const home = resolveHome({ home: options.home });
    const config = loadConfig(new FileStateIO(home));
    process.stdout.write(
      (options.json === true ? JSON.stringify(config, null, 2) : formatConfig(config, home, chalkTheme)) + '\n',
    );
  });

configCommand
  .command('set')
  .description(`Change a setting (keys: ${CONFIG_KEYS.join(', ')})`)
  .argument('<key>', 'Setting name')
  .argument('<value>', 'true|false, on|off or yes|no')
  .option('--home <dir>', HOME_HELP)
  .action((key: string, value: string, options: { home?: string }) => {
    const home = resolveHome({ home: options.home });
    const result = applyConfigChange(new FileStateIO(home), key, value);
    if (!result.ok) {
      process.stderr.write(`Error: ${result.error}\n`);
      process.exit(EXIT_INPUT_ERROR);
    }
    process.stdout.write(formatConfig(result.value, home, chalkTheme) + '\n');
  });
