#!/usr/bin/env node
/**
 * bin/contractcheck.ts — entry point for the `contractcheck` command.
 */

import { program } from '../commands/index.js'

program.parse()
