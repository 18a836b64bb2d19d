/**
 * Scriptable {@link SystemSampler} for monitor and healer tests.
 */

import type {
  BatteryStatus,
  DiskUsage,
  SystemInfo,
  SystemSampler,
  Throughput,
} from '../../src/monitor/system-sampler.js';

export function disk(mountpoint: string, percent: number): DiskUsage {
  return { device: `/dev/${mountpoint.replace(/\W/g, '') || 'root'}`, mountpoint, totalBytes: 1000, usedBytes: percent * 10, freeBytes: 1000 - percent * 10, percent };
}

export class FakeSampler implements SystemSampler {
  cpu: number | (() => Promise<number>) = 10;
  memory = 20;
  diskList: DiskUsage[] = [disk('/', 40)];
  throughput: Throughput | Error = { uploadKBps: 50, downloadKBps: 200 };
  batteryStatus: BatteryStatus | null = null;
  cpuCalls = 0;

  async cpuPercent(): Promise<number> {
    this.cpuCalls++;
    return typeof this.cpu === 'number' ? this.cpu : this.cpu();
  }

  async memoryPercent(): Promise<number> {
    return this.memory;
  }

  async disks(): Promise<DiskUsage[]> {
    return this.diskList;
  }

  async networkThroughput(): Promise<Throughput> {
    if (this.throughput instanceof Error) throw this.throughput;
    return this.throughput;
  }

  async battery(): Promise<BatteryStatus | null> {
    return this.batteryStatus;
  }

  async systemInfo(): Promise<SystemInfo> {
    return {
      platform: 'linux',
      arch: 'x64',
      release: '6.1.0',
      cpuModel: 'Test CPU',
      logicalCores: 4,
      totalMemoryBytes: 8 * 1024 ** 3,
    };
  }
}
