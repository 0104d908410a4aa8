/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/contractcheck.ts
 *   src/index.ts
 */

import { program } from 'commander'
import { checkCommand } from './check.js'
import { builtinsCommand } from './builtins.js'
import { logCommand } from './log.js'
import { configCommand } from './config.js'

program
  .name('contractcheck')
  .description(
    'contractcheck — validate kernel argument contracts and bind invoke calls.\n' +
    'Each manifest is checked as one compilation unit against a sealed registry.',
  )
  .version('0.1.0')

program.addCommand(checkCommand)
program.addCommand(builtinsCommand)
program.addCommand(logCommand)
program.addCommand(configCommand)

export { program }
