/**
 * @module monitor/auto-healer
 * Remediation actions keyed by signal kind.
 *
 * `heal(code)` resolves to `true` when the action ran to completion and
 * `false` for an unknown code or a failed action. It never rejects, so a
 * failed remediation cannot take down the monitor loop that triggered it.
 */

import os from 'node:os';
import { createStructuredError, errorMessage } from '../errors.js';
import type { EventSink, SignalKind } from '../types.js';
import { execFileRunner } from './command-runner.js';
import type { CommandRunner } from './command-runner.js';
import { signalKindForCode } from './signals.js';
import type { SystemSampler } from './system-sampler.js';

export interface ProcessUsage {
  pid: number;
  cpuPercent: number;
  name: string;
}

export interface HealContext {
  platform: NodeJS.Platform;
  run: CommandRunner;
  sampler?: SystemSampler;
  /** Never terminated by a remediation. */
  selfPid: number;
  killProcess: (pid: number) => void;
}

/** Resolves true on success; may reject, `heal` turns that into false. */
export type HealAction = (ctx: HealContext) => Promise<boolean>;

export interface AutoHealerOptions {
  platform?: NodeJS.Platform;
  runner?: CommandRunner;
  sampler?: SystemSampler;
  killProcess?: (pid: number) => void;
  selfPid?: number;
  eventBus?: EventSink;
}

/** Processes above this CPU % are terminated by the CPU remediation. */
export const CPU_KILL_THRESHOLD = 50;
/** The POWER remediation reports failure below this battery %. */
export const CRITICAL_BATTERY_PERCENT = 10;

// =====================================================================
// Built-in actions
// =====================================================================

/** Parse `ps -eo pid=,pcpu=,comm=`. */
export function parsePsOutput(stdout: string): ProcessUsage[] {
  const processes: ProcessUsage[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\d+)\s+([\d.]+)\s+(.+)$/.exec(line);
    if (!match?.[1] || !match[2] || !match[3]) continue;
    processes.push({ pid: parseInt(match[1], 10), cpuPercent: parseFloat(match[2]), name: match[3].trim() });
  }
  return processes;
}

async function runAll(ctx: HealContext, commands: Array<[string, string[]]>): Promise<boolean> {
  for (const [command, args] of commands) {
    await ctx.run(command, args);
  }
  return true;
}

const healNetwork: HealAction = (ctx) => {
  switch (ctx.platform) {
    case 'win32':
      return runAll(ctx, [
        ['ipconfig', ['/release']],
        ['ipconfig', ['/renew']],
        ['ipconfig', ['/flushdns']],
        ['netsh', ['winsock', 'reset']],
      ]);
    case 'darwin':
      return runAll(ctx, [
        ['sudo', ['-n', 'dscacheutil', '-flushcache']],
        ['sudo', ['-n', 'killall', '-HUP', 'mDNSResponder']],
      ]);
    default:
      return runAll(ctx, [
        ['sudo', ['-n', 'systemctl', 'restart', 'NetworkManager']],
        ['resolvectl', ['flush-caches']],
      ]);
  }
};

const healCpu: HealAction = async (ctx) => {
  if (ctx.platform === 'win32') return false;
  const { stdout } = await ctx.run('ps', ['-eo', 'pid=,pcpu=,comm=']);
  const top = parsePsOutput(stdout)
    .sort((a, b) => b.cpuPercent - a.cpuPercent)
    .slice(0, 3);

  for (const proc of top) {
    if (proc.cpuPercent <= CPU_KILL_THRESHOLD || proc.pid === ctx.selfPid) continue;
    try {
      ctx.killProcess(proc.pid);
    } catch (err) {
      console.warn(`[healer] Could not terminate ${proc.name} (${proc.pid}): ${errorMessage(err)}`);
    }
  }
  return true;
};

const healMemory: HealAction = async (ctx) => {
  if (ctx.platform !== 'win32') {
    await ctx.run('sync', []);
  }
  return true;
};

const healStorage: HealAction = async (ctx) => {
  if (ctx.platform === 'win32') {
    await ctx.run('cleanmgr', ['/sagerun:1'], { timeout: 300_000 });
  }
  return true;
};

const healPower: HealAction = async (ctx) => {
  const battery = await ctx.sampler?.battery();
  return !(battery && battery.percent < CRITICAL_BATTERY_PERCENT);
};

// =====================================================================
// AutoHealer
// =====================================================================

export class AutoHealer {
  private readonly actions = new Map<SignalKind, HealAction>([
    ['NETWORK', healNetwork],
    ['CPU', healCpu],
    ['MEMORY', healMemory],
    ['STORAGE', healStorage],
    ['POWER', healPower],
  ]);
  private readonly context: HealContext;
  private readonly eventBus?: EventSink;

  constructor(options: AutoHealerOptions = {}) {
    this.context = {
      platform: options.platform ?? os.platform(),
      run: options.runner ?? execFileRunner,
      sampler: options.sampler,
      selfPid: options.selfPid ?? process.pid,
      killProcess: options.killProcess ?? ((pid) => {
        process.kill(pid, 'SIGTERM');
      }),
    };
    this.eventBus = options.eventBus;
  }

  /** Replace the action for `kind`. */
  register(kind: SignalKind, action: HealAction): void {
    this.actions.set(kind, action);
  }

  registeredKinds(): SignalKind[] {
    return [...this.actions.keys()];
  }

  async heal(code: number): Promise<boolean> {
    const kind = signalKindForCode(code);
    const action = kind ? this.actions.get(kind) : undefined;
    if (!kind || !action) {
      this.eventBus?.emit('healer', { event: 'unknown_code', data: { code } });
      return false;
    }

    try {
      const healed = await action(this.context);
      this.eventBus?.emit('healer', { event: healed ? 'healed' : 'not_healed', data: { kind, code } });
      return healed;
    } catch (err) {
      const failure = createStructuredError('HEAL_FAILED', `${kind} remediation failed: ${errorMessage(err)}`, { kind, code });
      console.warn(`[healer] ${failure.message}`);
      this.eventBus?.emit('healer', { event: 'heal_failed', data: failure });
      return false;
    }
  }
}
