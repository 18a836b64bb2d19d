/**
 * @module @deskmate/cli
 * Builds the `deskmate` command tree.
 */

import { Command } from 'commander';
import { registerAsk } from './commands/ask.js';
import { registerDetect } from './commands/detect.js';
import { registerKb } from './commands/kb.js';
import { registerMonitor } from './commands/monitor.js';
import { registerStats } from './commands/stats.js';
import { registerTeach } from './commands/teach.js';
import type { CliDependencies } from './context.js';

export type { CliDependencies } from './context.js';

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('deskmate')
    .description('Bilingual help-desk assistant: answers, web fallback and system health checks')
    .version('0.1.0')
    .option('-c, --config <path>', 'path to deskmate.yaml')
    .option('--verbose', 'print engine events');

  // Register sub-commands
  registerAsk(program, deps);
  registerTeach(program, deps);
  registerStats(program, deps);
  registerKb(program);
  registerDetect(program);
  registerMonitor(program, deps);

  return program;
}
