/**
 * @module commands/stats
 * `deskmate stats` — Show engine component state.
 */

import { Command } from 'commander';
import { BOLD, GRAY, GREEN, RESET, openBrain } from '../context.js';
import type { CliDependencies } from '../context.js';

function onOff(enabled: boolean): string {
  return enabled ? `${GREEN}on${RESET}` : `${GRAY}off${RESET}`;
}

export function registerStats(program: Command, deps: CliDependencies): void {
  program
    .command('stats')
    .description('Show knowledge base size and enabled capabilities')
    .option('--json', 'print machine-readable JSON')
    .action(async (opts: { json?: boolean }, command: Command) => {
      const brain = await openBrain(command, deps);
      const stats = brain.stats();
      brain.close();

      if (opts.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      console.log(`\n${BOLD}Deskmate${RESET}\n`);
      console.log(`  Problems:        ${stats.totalProblems}`);
      console.log(`  Semantic search: ${onOff(stats.semanticEnabled)}`);
      console.log(`  Internet search: ${onOff(stats.internetEnabled)}`);
      console.log('');
    });
}
