/**
 * @module monitor
 * System health monitoring and remediation.
 */

export { SIGNAL_CODES, SIGNAL_KINDS, signalKindForCode } from './signals.js';
export { execFileRunner, DEFAULT_COMMAND_TIMEOUT_MS } from './command-runner.js';
export type { CommandRunner, CommandResult } from './command-runner.js';
export {
  OsSystemSampler,
  scanSystem,
  parseDfOutput,
  parseWmicDisks,
  parseProcNetDev,
  parseMeminfo,
  parsePmset,
  totalCpuTimes,
  cpuBusyPercent,
} from './system-sampler.js';
export type {
  SystemSampler,
  DiskUsage,
  Throughput,
  BatteryStatus,
  SystemInfo,
  SystemScan,
  NetworkCounters,
  CpuTimes,
  OsSystemSamplerOptions,
} from './system-sampler.js';
export {
  HealthMonitor,
  DEFAULT_THRESHOLDS,
  DEFAULT_MONITOR_INTERVAL_MS,
} from './health-monitor.js';
export type { MonitorThresholds, MonitorChecks, HealthMonitorOptions, MonitorState } from './health-monitor.js';
export { AutoHealer, parsePsOutput, CPU_KILL_THRESHOLD, CRITICAL_BATTERY_PERCENT } from './auto-healer.js';
export type { HealAction, HealContext, AutoHealerOptions, ProcessUsage } from './auto-healer.js';
