/**
 * @module commands/kb
 * `deskmate kb` — Inspect and edit the knowledge base.
 *
 * Sub-commands:
 * - list [--filter <text>]
 * - remove <id>
 * - import <source>  (replaces the configured knowledge base)
 */

import { Command } from 'commander';
import { importKnowledge, openRepository } from '@deskmate/core';
import type { KnowledgeRepository, ProblemRecord } from '@deskmate/core';
import { BOLD, GRAY, GREEN, RESET, YELLOW, fail, loadCliConfig, openStore } from '../context.js';

function describeRecord(record: ProblemRecord): string {
  const flags = [record.autoFix ? 'auto-fix' : '', record.learned ? 'learned' : ''].filter(Boolean);
  const suffix = flags.length > 0 ? ` ${GRAY}[${flags.join(', ')}]${RESET}` : '';
  return `${BOLD}${record.id}${RESET}  ${record.aliases.en.join(' | ') || record.aliases.np.join(' | ')}${suffix}`;
}

export function registerKb(program: Command): void {
  const kb = program
    .command('kb')
    .description('Manage the knowledge base');

  kb.command('list')
    .description('List records')
    .option('-f, --filter <text>', 'only records whose aliases or answers contain the text')
    .action(async (opts: { filter?: string }, command: Command) => {
      const store = await openStore(command);
      const records = opts.filter === undefined ? store.records() : store.search(opts.filter);
      store.close();

      for (const record of records) {
        console.log(describeRecord(record));
      }
      console.log(`${GRAY}${records.length} record(s)${RESET}`);
    });

  kb.command('remove')
    .description('Delete a record by id')
    .argument('<id>', 'record id')
    .action(async (id: string, _opts: unknown, command: Command) => {
      const store = await openStore(command);
      try {
        const removed = await store.remove(id);
        console.log(`${GREEN}✓${RESET} Removed ${removed.id}`);
      } catch (err) {
        fail(command, err);
      } finally {
        store.close();
      }
    });

  kb.command('import')
    .description('Replace the knowledge base with the records of another file (.json or .db)')
    .argument('<source>', 'file to import from')
    .action(async (source: string, _opts: unknown, command: Command) => {
      const config = await loadCliConfig(command);
      let from: KnowledgeRepository;
      let to: KnowledgeRepository;
      try {
        from = openRepository(source);
        to = openRepository(config.knowledge.path, { backend: config.knowledge.backend, create: true });
      } catch (err) {
        return fail(command, err);
      }

      try {
        const { imported, skipped } = await importKnowledge(from, to);
        console.log(`${GREEN}✓${RESET} Imported ${imported} record(s) into ${to.describe()}`);
        for (const skip of skipped) {
          console.log(`${YELLOW}  skipped #${skip.position}: ${skip.reason}${RESET}`);
        }
      } catch (err) {
        fail(command, err);
      } finally {
        from.close();
        to.close();
      }
    });
}
