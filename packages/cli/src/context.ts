/**
 * @module context
 * Shared plumbing for the sub-commands: global options, colours, engine
 * wiring and error exits.
 */

import { Command } from 'commander';
import {
  AutoHealer,
  DeskmateError,
  EventBus,
  KnowledgeStore,
  OsSystemSampler,
  createBrain,
  errorMessage,
  loadConfig,
  openRepository,
} from '@deskmate/core';
import type {
  Brain,
  CommandRunner,
  DeskmateConfig,
  Embedder,
  FetchLike,
  SystemSampler,
} from '@deskmate/core';

// ── ANSI colours ──────────────────────────────────────────────────────
export const GREEN = '\x1b[32m';
export const RED = '\x1b[31m';
export const YELLOW = '\x1b[33m';
export const GRAY = '\x1b[90m';
export const BOLD = '\x1b[1m';
export const RESET = '\x1b[0m';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

/** Replaceable collaborators; the real ones are used when absent. */
export interface CliDependencies {
  sampler?: SystemSampler;
  runner?: CommandRunner;
  fetch?: FetchLike;
  /** Null disables semantic search regardless of configuration. */
  embedder?: Embedder | null;
}

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/** Print the message in red and exit with status 1. */
export function fail(command: Command, err: unknown): never {
  const lines = [`${RED}${errorMessage(err)}${RESET}`];
  if (err instanceof DeskmateError) {
    for (const action of err.structuredError.suggestedActions) {
      lines.push(`${GRAY}  → ${action}${RESET}`);
    }
  }
  return command.error(lines.join('\n'), { exitCode: 1, code: 'deskmate.failed' });
}

export async function loadCliConfig(command: Command): Promise<DeskmateConfig> {
  try {
    return await loadConfig(globalOptions(command).config);
  } catch (err) {
    return fail(command, err);
  }
}

/** An event bus that echoes every engine event when `--verbose` is set. */
export function verboseBus(command: Command): EventBus | undefined {
  if (!globalOptions(command).verbose) return undefined;
  const bus = new EventBus();
  for (const channel of ['knowledge', 'resolution', 'semantic', 'web', 'monitor', 'healer']) {
    bus.subscribe(channel, (msg) => {
      console.log(`${GRAY}[${channel}] ${msg.event} ${JSON.stringify(msg.data)}${RESET}`);
    });
  }
  return bus;
}

export async function openBrain(
  command: Command,
  deps: CliDependencies,
  config?: DeskmateConfig,
): Promise<Brain> {
  const resolved = config ?? await loadCliConfig(command);
  try {
    return await createBrain(resolved, { embedder: deps.embedder, fetch: deps.fetch, eventBus: verboseBus(command) });
  } catch (err) {
    return fail(command, err);
  }
}

export async function openStore(command: Command): Promise<KnowledgeStore> {
  const config = await loadCliConfig(command);
  const repository = openRepository(config.knowledge.path, { backend: config.knowledge.backend });
  try {
    return await KnowledgeStore.load(repository, { eventBus: verboseBus(command) });
  } catch (err) {
    repository.close();
    return fail(command, err);
  }
}

export function createSampler(deps: CliDependencies): SystemSampler {
  return deps.sampler ?? new OsSystemSampler({ runner: deps.runner });
}

export function createHealer(deps: CliDependencies, sampler: SystemSampler, eventBus?: EventBus): AutoHealer {
  return new AutoHealer({ runner: deps.runner, sampler, eventBus });
}
