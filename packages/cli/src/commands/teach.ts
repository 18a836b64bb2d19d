/**
 * @module commands/teach
 * `deskmate teach <query> --en <answer>` — Add a learned answer.
 */

import { Command } from 'commander';
import { GREEN, RESET, fail, openBrain } from '../context.js';
import type { CliDependencies } from '../context.js';

interface TeachOptions {
  en: string;
  np?: string;
}

export function registerTeach(program: Command, deps: CliDependencies): void {
  program
    .command('teach')
    .description('Teach an answer for a problem description')
    .argument('<query>', 'problem description, stored as an alias')
    .requiredOption('--en <answer>', 'English answer')
    .option('--np <answer>', 'Nepali answer (defaults to the English one)')
    .action(async (query: string, opts: TeachOptions, command: Command) => {
      const brain = await openBrain(command, deps);
      try {
        const record = await brain.teach(query, opts.en, opts.np);
        console.log(`${GREEN}✓${RESET} Learned ${record.id}: "${query.trim()}"`);
      } catch (err) {
        fail(command, err);
      } finally {
        brain.close();
      }
    });
}
