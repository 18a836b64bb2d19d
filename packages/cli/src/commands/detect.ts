/**
 * @module commands/detect
 * `deskmate detect <text...>` — Print the detected language (`en` or `np`).
 */

import { Command } from 'commander';
import { detectLanguage } from '@deskmate/core';

export function registerDetect(program: Command): void {
  program
    .command('detect')
    .description('Detect whether text is English or Nepali')
    .argument('<text...>', 'text to classify')
    .action((words: string[]) => {
      console.log(detectLanguage(words.join(' ')));
    });
}
