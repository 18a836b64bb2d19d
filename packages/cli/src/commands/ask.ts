/**
 * @module commands/ask
 * `deskmate ask <query...>` — Resolve a problem description to an answer.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { isLang } from '@deskmate/core';
import type { Lang } from '@deskmate/core';
import { GRAY, RESET, loadCliConfig, openBrain } from '../context.js';
import type { CliDependencies } from '../context.js';

interface AskOptions {
  lang?: 'en' | 'np' | 'auto';
  minConfidence?: number;
  offline?: boolean;
}

export function parseConfidence(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new InvalidArgumentError('Expected a number between 0 and 100.');
  }
  return parsed;
}

export function registerAsk(program: Command, deps: CliDependencies): void {
  program
    .command('ask')
    .description('Find an answer for a problem description')
    .argument('<query...>', 'problem description')
    .addOption(new Option('-l, --lang <lang>', 'answer language (default: config language)').choices(['en', 'np', 'auto']))
    .option('--min-confidence <score>', 'fuzzy match threshold (0-100)', parseConfidence)
    .option('--offline', 'do not search the web')
    .action(async (words: string[], opts: AskOptions, command: Command) => {
      const query = words.join(' ');
      const config = await loadCliConfig(command);
      const brain = await openBrain(command, deps, config);
      try {
        if (opts.offline) brain.setInternetEnabled(false);
        const setting = opts.lang ?? config.language;
        const lang: Lang = isLang(setting) ? setting : brain.detectLanguage(query);
        const result = await brain.solve(query, lang, opts.minConfidence);

        console.log(result.answer);
        console.log(`${GRAY}source: ${result.source} · lang: ${lang}${RESET}`);
      } finally {
        brain.close();
      }
    });
}
