/**
 * @module monitor/system-sampler
 * Point-in-time readings of CPU, memory, disks, network and battery.
 *
 * {@link OsSystemSampler} reads them from `node:os`, `df -kP`,
 * `/proc/net/dev` and `/sys/class/power_supply` (Linux), `pmset` (macOS)
 * and `wmic` (Windows). Each reading is independent, so one unsupported
 * probe does not stop the others.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DeskmateError } from '../errors.js';
import { execFileRunner } from './command-runner.js';
import type { CommandRunner } from './command-runner.js';

// =====================================================================
// Types
// =====================================================================

export interface DiskUsage {
  device: string;
  mountpoint: string;
  totalBytes: number;
  usedBytes: number;
  freeBytes: number;
  /** 0–100 */
  percent: number;
}

export interface Throughput {
  uploadKBps: number;
  downloadKBps: number;
}

export interface BatteryStatus {
  /** 0–100 */
  percent: number;
  pluggedIn: boolean;
}

export interface SystemInfo {
  platform: NodeJS.Platform;
  arch: string;
  release: string;
  cpuModel: string;
  logicalCores: number;
  totalMemoryBytes: number;
}

export interface SystemSampler {
  /** Busy share of all cores, 0–100. */
  cpuPercent(): Promise<number>;
  /** Used share of physical memory, 0–100. */
  memoryPercent(): Promise<number>;
  disks(): Promise<DiskUsage[]>;
  networkThroughput(): Promise<Throughput>;
  /** Null when the machine has no battery. */
  battery(): Promise<BatteryStatus | null>;
  systemInfo(): Promise<SystemInfo>;
}

export interface NetworkCounters {
  bytesReceived: number;
  bytesSent: number;
}

// =====================================================================
// Parsers
// =====================================================================

/**
 * Parse POSIX `df -kP` output. Only device-backed filesystems (device path
 * starting with `/`) are kept; mount points may contain spaces.
 */
export function parseDfOutput(stdout: string): DiskUsage[] {
  const disks: DiskUsage[] = [];
  for (const line of stdout.trim().split('\n').slice(1)) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 6) continue;
    const [device = '', blocks = '', used = '', available = ''] = parts;
    if (!device.startsWith('/')) continue;

    const totalBytes = parseInt(blocks, 10) * 1024;
    const usedBytes = parseInt(used, 10) * 1024;
    const freeBytes = parseInt(available, 10) * 1024;
    if ([totalBytes, usedBytes, freeBytes].some(Number.isNaN) || totalBytes === 0) continue;

    disks.push({
      device,
      mountpoint: parts.slice(5).join(' '),
      totalBytes,
      usedBytes,
      freeBytes,
      percent: roundPercent((usedBytes / (usedBytes + freeBytes)) * 100),
    });
  }
  return disks;
}

/** Parse `wmic logicaldisk get Caption,FreeSpace,Size /format:csv`. */
export function parseWmicDisks(stdout: string): DiskUsage[] {
  const disks: DiskUsage[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const [, caption = '', free = '', size = ''] = line.trim().split(',');
    const totalBytes = Number(size);
    const freeBytes = Number(free);
    if (!caption || caption === 'Caption' || !size || !Number.isFinite(totalBytes) || totalBytes === 0) continue;
    const usedBytes = totalBytes - freeBytes;
    disks.push({
      device: caption,
      mountpoint: `${caption}\\`,
      totalBytes,
      usedBytes,
      freeBytes,
      percent: roundPercent((usedBytes / totalBytes) * 100),
    });
  }
  return disks;
}

/** Sum receive/transmit byte counters of every interface except loopback. */
export function parseProcNetDev(text: string): NetworkCounters {
  let bytesReceived = 0;
  let bytesSent = 0;
  for (const line of text.split('\n')) {
    const colon = line.indexOf(':');
    if (colon < 0) continue;
    const iface = line.slice(0, colon).trim();
    if (iface === 'lo') continue;
    const fields = line.slice(colon + 1).trim().split(/\s+/).map((f) => parseInt(f, 10));
    bytesReceived += fields[0] ?? 0;
    bytesSent += fields[8] ?? 0;
  }
  return { bytesReceived, bytesSent };
}

/** Used memory percent from `/proc/meminfo`, based on MemAvailable. */
export function parseMeminfo(text: string): number | null {
  const read = (key: string): number | undefined => {
    const match = new RegExp(`^${key}:\\s+(\\d+)`, 'm').exec(text);
    return match?.[1] ? parseInt(match[1], 10) : undefined;
  };
  const total = read('MemTotal');
  const available = read('MemAvailable');
  if (!total || available === undefined) return null;
  return roundPercent(((total - available) / total) * 100);
}

/** Parse `pmset -g batt`, e.g. `... 85%; discharging; 3:12 remaining`. */
export function parsePmset(stdout: string): BatteryStatus | null {
  const match = /(\d+)%;\s*([\w ]+?);/.exec(stdout);
  if (!match?.[1] || !match[2]) return null;
  return {
    percent: parseInt(match[1], 10),
    pluggedIn: !/discharging/i.test(match[2]) || /AC Power/.test(stdout),
  };
}

export interface CpuTimes {
  idle: number;
  total: number;
}

export function totalCpuTimes(cpus: readonly os.CpuInfo[]): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus) {
    const { user, nice, sys, idle: idleTime, irq } = cpu.times;
    idle += idleTime;
    total += user + nice + sys + idleTime + irq;
  }
  return { idle, total };
}

/** Busy percent between two cumulative CPU time readings. */
export function cpuBusyPercent(before: CpuTimes, after: CpuTimes): number {
  const total = after.total - before.total;
  if (total <= 0) return 0;
  const idle = after.idle - before.idle;
  return roundPercent(((total - idle) / total) * 100);
}

function roundPercent(value: number): number {
  return Math.round(value * 10) / 10;
}

// =====================================================================
// OsSystemSampler
// =====================================================================

export interface OsSystemSamplerOptions {
  platform?: NodeJS.Platform;
  runner?: CommandRunner;
  /** Window over which CPU and network rates are measured, in ms. Default: 1000. */
  sampleWindow?: number;
  /** Root of the Linux pseudo filesystems. Default: `/`. */
  procRoot?: string;
}

export class OsSystemSampler implements SystemSampler {
  private readonly platform: NodeJS.Platform;
  private readonly runner: CommandRunner;
  private readonly sampleWindow: number;
  private readonly procRoot: string;

  constructor(options: OsSystemSamplerOptions = {}) {
    this.platform = options.platform ?? os.platform();
    this.runner = options.runner ?? execFileRunner;
    this.sampleWindow = options.sampleWindow ?? 1_000;
    this.procRoot = options.procRoot ?? '/';
  }

  async cpuPercent(): Promise<number> {
    const before = totalCpuTimes(os.cpus());
    await sleep(this.sampleWindow);
    return cpuBusyPercent(before, totalCpuTimes(os.cpus()));
  }

  async memoryPercent(): Promise<number> {
    if (this.platform === 'linux') {
      const fromProc = parseMeminfo(await fs.readFile(this.procPath('proc/meminfo'), 'utf-8'));
      if (fromProc !== null) return fromProc;
    }
    const total = os.totalmem();
    return roundPercent(((total - os.freemem()) / total) * 100);
  }

  async disks(): Promise<DiskUsage[]> {
    if (this.platform === 'win32') {
      const { stdout } = await this.runner('wmic', ['logicaldisk', 'get', 'Caption,FreeSpace,Size', '/format:csv'], { timeout: 10_000 });
      return parseWmicDisks(stdout);
    }
    const { stdout } = await this.runner('df', ['-kP'], { timeout: 10_000 });
    return parseDfOutput(stdout);
  }

  async networkThroughput(): Promise<Throughput> {
    if (this.platform !== 'linux') {
      throw new DeskmateError('CAPABILITY_UNAVAILABLE', `Network throughput sampling is not supported on ${this.platform}`);
    }
    const before = await this.readNetCounters();
    await sleep(this.sampleWindow);
    const after = await this.readNetCounters();
    const seconds = this.sampleWindow / 1000;
    return {
      uploadKBps: (after.bytesSent - before.bytesSent) / 1024 / seconds,
      downloadKBps: (after.bytesReceived - before.bytesReceived) / 1024 / seconds,
    };
  }

  async battery(): Promise<BatteryStatus | null> {
    if (this.platform === 'darwin') {
      const { stdout } = await this.runner('pmset', ['-g', 'batt'], { timeout: 5_000 });
      return parsePmset(stdout);
    }
    if (this.platform !== 'linux') return null;

    const supplyDir = this.procPath('sys/class/power_supply');
    let entries: string[];
    try {
      entries = await fs.readdir(supplyDir);
    } catch {
      return null;
    }

    for (const entry of entries) {
      const dir = path.join(supplyDir, entry);
      const type = await readTrimmed(path.join(dir, 'type'));
      if (type !== 'Battery') continue;
      const capacity = parseInt((await readTrimmed(path.join(dir, 'capacity'))) ?? '', 10);
      if (Number.isNaN(capacity)) continue;
      const status = await readTrimmed(path.join(dir, 'status'));
      return { percent: capacity, pluggedIn: status !== 'Discharging' };
    }
    return null;
  }

  async systemInfo(): Promise<SystemInfo> {
    const cpus = os.cpus();
    return {
      platform: this.platform,
      arch: os.arch(),
      release: os.release(),
      cpuModel: cpus[0]?.model.trim() ?? 'unknown',
      logicalCores: cpus.length,
      totalMemoryBytes: os.totalmem(),
    };
  }

  private async readNetCounters(): Promise<NetworkCounters> {
    return parseProcNetDev(await fs.readFile(this.procPath('proc/net/dev'), 'utf-8'));
  }

  private procPath(relative: string): string {
    return path.join(this.procRoot, relative);
  }
}

async function readTrimmed(file: string): Promise<string | undefined> {
  try {
    return (await fs.readFile(file, 'utf-8')).trim();
  } catch {
    return undefined;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =====================================================================
// One-shot scan
// =====================================================================

export interface SystemScan {
  info: SystemInfo;
  disks: DiskUsage[];
  battery: BatteryStatus | null;
  /** Probe name → failure message, for readings that could not be taken. */
  errors: Record<string, string>;
}

/** Collect a hardware snapshot. Failed probes are reported in `errors`. */
export async function scanSystem(sampler: SystemSampler): Promise<SystemScan> {
  const errors: Record<string, string> = {};
  const attempt = async <T>(probe: string, read: () => Promise<T>, fallback: T): Promise<T> => {
    try {
      return await read();
    } catch (err) {
      errors[probe] = err instanceof Error ? err.message : String(err);
      return fallback;
    }
  };

  const info = await sampler.systemInfo();
  const disks = await attempt('disks', () => sampler.disks(), []);
  const battery = await attempt('battery', () => sampler.battery(), null);
  return { info, disks, battery, errors };
}
