/**
 * @module monitor/command-runner
 * Run an OS command and collect its output.
 */

import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFileCb);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs `command` with `args` (no shell).
 * Rejects on a non-zero exit, a spawn failure or the timeout.
 */
export type CommandRunner = (command: string, args: string[], options?: { timeout?: number }) => Promise<CommandResult>;

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export const execFileRunner: CommandRunner = async (command, args, options = {}) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    encoding: 'utf-8',
    timeout: options.timeout ?? DEFAULT_COMMAND_TIMEOUT_MS,
    windowsHide: true,
  });
  return { stdout, stderr };
};
