/**
 * @module commands/monitor
 * `deskmate monitor` — Watch system health and run remediations.
 * `deskmate heal <code>` — Run one remediation by signal code.
 * `deskmate scan` — Print a hardware snapshot.
 */

import { Command, InvalidArgumentError } from 'commander';
import { HealthMonitor, SIGNAL_CODES, parseDuration, scanSystem } from '@deskmate/core';
import type { AutoHealer, HealthSignal } from '@deskmate/core';
import {
  BOLD,
  GRAY,
  GREEN,
  RED,
  RESET,
  YELLOW,
  createHealer,
  createSampler,
  fail,
  loadCliConfig,
  verboseBus,
} from '../context.js';
import type { CliDependencies } from '../context.js';

interface MonitorOptions {
  once?: boolean;
  heal: boolean;
  interval?: string;
}

function parseCode(value: string): number {
  const code = Number(value);
  if (!Number.isInteger(code)) {
    throw new InvalidArgumentError('Expected an integer signal code.');
  }
  return code;
}

function formatBytes(bytes: number): string {
  const gib = bytes / 1024 ** 3;
  return `${gib.toFixed(1)} GiB`;
}

async function remediate(healer: AutoHealer, message: string, code: number): Promise<void> {
  const healed = await healer.heal(code);
  const status = healed ? `${GREEN}remediated${RESET}` : `${RED}not remediated${RESET}`;
  console.log(`  ${GRAY}${code}${RESET} ${message}: ${status}`);
}

export function registerMonitor(program: Command, deps: CliDependencies): void {
  program
    .command('monitor')
    .description('Watch CPU, memory, disks, network and battery')
    .option('--once', 'run a single pass and exit')
    .option('--no-heal', 'report problems without remediating them')
    .option('--interval <duration>', 'pause between passes, e.g. 30s')
    .action(async (opts: MonitorOptions, command: Command) => {
      const config = await loadCliConfig(command);
      let interval: number;
      try {
        interval = parseDuration(opts.interval ?? config.monitor.interval);
      } catch (err) {
        return fail(command, err);
      }

      const eventBus = verboseBus(command);
      const sampler = createSampler(deps);
      const healer = createHealer(deps, sampler, eventBus);
      const autoHeal = opts.heal && config.monitor.autoHeal;
      const monitor = new HealthMonitor(sampler, {
        interval,
        thresholds: config.monitor.thresholds,
        checks: config.monitor.checks,
        eventBus,
      });

      if (opts.once) {
        const signals: HealthSignal[] = await monitor.check();
        if (signals.length === 0) {
          console.log(`${GREEN}✓${RESET} All checks passed`);
          return;
        }
        for (const signal of signals) {
          console.log(`${YELLOW}⚠${RESET} ${signal.message}`);
          if (autoHeal) await remediate(healer, signal.message, signal.code);
        }
        return;
      }

      console.log(`${BOLD}Monitoring${RESET} ${GRAY}every ${interval}ms, Ctrl+C to stop${RESET}`);
      let healing = Promise.resolve();
      monitor.start((message, code) => {
        console.log(`${YELLOW}⚠${RESET} ${message}`);
        if (autoHeal) {
          healing = healing.then(() => remediate(healer, message, code));
        }
      });

      await new Promise<void>((resolve) => {
        const shutdown = () => {
          console.log('\nStopping monitor...');
          monitor.stop().then(() => healing).then(() => resolve(), () => resolve());
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      });
    });

  program
    .command('heal')
    .description(`Run the remediation for a signal code (${Object.entries(SIGNAL_CODES).map(([k, v]) => `${v}=${k}`).join(', ')})`)
    .argument('<code>', 'signal code', parseCode)
    .action(async (code: number, _opts: unknown, command: Command) => {
      const sampler = createSampler(deps);
      const healer = createHealer(deps, sampler, verboseBus(command));
      if (await healer.heal(code)) {
        console.log(`${GREEN}✓${RESET} Remediation for ${code} completed`);
        return;
      }
      fail(command, `Remediation for ${code} failed or is not available`);
    });

  program
    .command('scan')
    .description('Print a hardware snapshot')
    .action(async () => {
      const scan = await scanSystem(createSampler(deps));
      const { info } = scan;

      console.log(`\n${BOLD}System${RESET}`);
      console.log(`  ${info.platform} ${info.release} (${info.arch})`);
      console.log(`  CPU:    ${info.cpuModel} × ${info.logicalCores}`);
      console.log(`  Memory: ${formatBytes(info.totalMemoryBytes)}`);

      console.log(`\n${BOLD}Disks${RESET}`);
      for (const disk of scan.disks) {
        console.log(`  ${disk.mountpoint}  ${formatBytes(disk.usedBytes)} / ${formatBytes(disk.totalBytes)} (${disk.percent}%)`);
      }

      console.log(`\n${BOLD}Battery${RESET}`);
      console.log(scan.battery
        ? `  ${scan.battery.percent}%${scan.battery.pluggedIn ? ' (plugged in)' : ''}`
        : `  ${GRAY}none${RESET}`);

      for (const [probe, message] of Object.entries(scan.errors)) {
        console.log(`${YELLOW}  ${probe} unavailable: ${message}${RESET}`);
      }
      console.log('');
    });
}
