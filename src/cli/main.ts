#!/usr/bin/env node

/**
 * stepqa CLI entry point.
 * All logic is delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerInterpretCommand, registerListCommand, registerRunCommand } from './run.js';

const program = new Command();

program
  .name('stepqa')
  .description(
    'Natural-language browser test runner. Maps each step to a browser action with fixed rules and executes it with Playwright.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerInterpretCommand(program);
registerListCommand(program);

await program.parseAsync();
