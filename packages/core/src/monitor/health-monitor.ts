/**
 * @module monitor/health-monitor
 * Periodic resource checks that raise {@link HealthSignal}s.
 *
 * State machine: `stopped → running → stopped`. The first pass runs as soon
 * as `start` is called, the next one `interval` ms after the previous pass
 * finished. A breach fires the alert callback once per pass; the same breach
 * fires again on every following pass.
 */

import { errorMessage } from '../errors.js';
import type { AlertCallback, EventSink, HealthSignal, SignalKind } from '../types.js';
import { SIGNAL_CODES } from './signals.js';
import type { SystemSampler } from './system-sampler.js';

export interface MonitorThresholds {
  /** Alert when CPU busy % is above this. */
  cpu: number;
  /** Alert when used memory % is above this. */
  memory: number;
  /** Alert when a disk's used % is above this. */
  storage: number;
  /** Alert when upload AND download are both below their minimums (KB/s). */
  minUploadKBps: number;
  minDownloadKBps: number;
  /** Alert when the battery is below this % and unplugged. */
  battery: number;
}

export type MonitorChecks = Record<'cpu' | 'memory' | 'storage' | 'network' | 'power', boolean>;

export const DEFAULT_THRESHOLDS: Readonly<MonitorThresholds> = {
  cpu: 90,
  memory: 90,
  storage: 90,
  minUploadKBps: 10,
  minDownloadKBps: 10,
  battery: 20,
};

export const DEFAULT_MONITOR_INTERVAL_MS = 10_000;

export interface HealthMonitorOptions {
  /** Pause between passes in ms. Default: 10000. */
  interval?: number;
  thresholds?: Partial<MonitorThresholds>;
  checks?: Partial<MonitorChecks>;
  eventBus?: EventSink;
}

export type MonitorState = 'stopped' | 'running';

type Check = (emit: (signal: HealthSignal) => void) => Promise<void>;

export class HealthMonitor {
  private readonly interval: number;
  private readonly thresholds: MonitorThresholds;
  private readonly checks: MonitorChecks;
  private readonly eventBus?: EventSink;

  private currentState: MonitorState = 'stopped';
  /** Bumped on every start/stop; a pass only delivers for its own generation. */
  private generation = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private onAlert: AlertCallback | null = null;

  constructor(
    private readonly sampler: SystemSampler,
    options: HealthMonitorOptions = {},
  ) {
    this.interval = options.interval ?? DEFAULT_MONITOR_INTERVAL_MS;
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
    this.checks = { cpu: true, memory: true, storage: true, network: true, power: true, ...options.checks };
    this.eventBus = options.eventBus;
  }

  get state(): MonitorState {
    return this.currentState;
  }

  /** Begin sampling. Calling it while running has no effect. */
  start(onAlert: AlertCallback): void {
    if (this.currentState === 'running') return;
    this.currentState = 'running';
    this.onAlert = onAlert;
    this.generation++;
    this.eventBus?.emit('monitor', { event: 'started', data: { interval: this.interval } });
    this.tick(this.generation);
  }

  /**
   * Stop sampling and wait for an in-flight pass to finish.
   * No alert is delivered once this resolves. Safe to call repeatedly.
   */
  async stop(): Promise<void> {
    if (this.currentState === 'running') {
      this.eventBus?.emit('monitor', { event: 'stopped', data: {} });
    }
    this.currentState = 'stopped';
    this.generation++;
    this.onAlert = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
  }

  /** Run one pass of every enabled check and return the breaches found. */
  async check(): Promise<HealthSignal[]> {
    const signals: HealthSignal[] = [];
    await this.runChecks((signal) => signals.push(signal));
    return signals;
  }

  // =====================================================================
  // Loop
  // =====================================================================

  private tick(generation: number): void {
    this.inFlight = this.runChecks((signal) => this.deliver(generation, signal)).then(() => {
      this.inFlight = null;
      if (this.isCurrent(generation)) {
        this.timer = setTimeout(() => this.tick(generation), this.interval);
      }
    });
  }

  private isCurrent(generation: number): boolean {
    return this.currentState === 'running' && this.generation === generation;
  }

  private deliver(generation: number, signal: HealthSignal): void {
    const onAlert = this.onAlert;
    if (!onAlert || !this.isCurrent(generation)) return;
    this.eventBus?.emit('monitor', { event: 'signal', data: signal });
    try {
      onAlert(signal.message, signal.code);
    } catch (err) {
      console.warn(`[monitor] Alert callback failed for ${signal.kind}: ${errorMessage(err)}`);
    }
  }

  // =====================================================================
  // Checks
  // =====================================================================

  private async runChecks(emit: (signal: HealthSignal) => void): Promise<void> {
    const enabled: Array<[keyof MonitorChecks, Check]> = [
      ['cpu', (e) => this.checkCpu(e)],
      ['memory', (e) => this.checkMemory(e)],
      ['storage', (e) => this.checkStorage(e)],
      ['network', (e) => this.checkNetwork(e)],
      ['power', (e) => this.checkPower(e)],
    ];

    for (const [name, run] of enabled) {
      if (!this.checks[name]) continue;
      try {
        await run(emit);
      } catch (err) {
        console.warn(`[monitor] ${name} check skipped: ${errorMessage(err)}`);
        this.eventBus?.emit('monitor', { event: 'check_failed', data: { check: name, error: errorMessage(err) } });
      }
    }
  }

  private async checkCpu(emit: (signal: HealthSignal) => void): Promise<void> {
    const percent = await this.sampler.cpuPercent();
    if (percent > this.thresholds.cpu) {
      emit(signal('CPU', `High CPU usage: ${percent}%`));
    }
  }

  private async checkMemory(emit: (signal: HealthSignal) => void): Promise<void> {
    const percent = await this.sampler.memoryPercent();
    if (percent > this.thresholds.memory) {
      emit(signal('MEMORY', `High memory usage: ${percent}%`));
    }
  }

  private async checkStorage(emit: (signal: HealthSignal) => void): Promise<void> {
    for (const disk of await this.sampler.disks()) {
      if (disk.percent > this.thresholds.storage) {
        emit(signal('STORAGE', `Low disk space on ${disk.mountpoint}: ${disk.percent}%`));
      }
    }
  }

  private async checkNetwork(emit: (signal: HealthSignal) => void): Promise<void> {
    const { uploadKBps, downloadKBps } = await this.sampler.networkThroughput();
    if (uploadKBps < this.thresholds.minUploadKBps && downloadKBps < this.thresholds.minDownloadKBps) {
      emit(signal('NETWORK', 'Network connection unstable'));
    }
  }

  private async checkPower(emit: (signal: HealthSignal) => void): Promise<void> {
    const battery = await this.sampler.battery();
    if (battery && battery.percent < this.thresholds.battery && !battery.pluggedIn) {
      emit(signal('POWER', `Low battery: ${battery.percent}% remaining`));
    }
  }
}

function signal(kind: SignalKind, message: string): HealthSignal {
  return { kind, message, code: SIGNAL_CODES[kind] };
}
