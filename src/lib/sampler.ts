// src/lib/sampler.ts
import fsp from 'node:fs/promises';
import os from 'node:os';
import type { EventBus } from './bus.js';
import { errorMessage } from './errors.js';
import { LOG } from './logger.js';

const log = LOG.tag('sampler');

export type CpuTimes = { idle: number; total: number };

export function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.idle + t.irq;
  }
  return { idle, total };
}

/** Busy share between two snapshots, in percent. */
export function cpuUsage(prev: CpuTimes, next: CpuTimes): number {
  const total = next.total - prev.total;
  const idle = next.idle - prev.idle;
  if (total <= 0) return 0;
  return Math.min(100, Math.max(0, ((total - idle) / total) * 100));
}

export type MemoryReading = { used: number; total: number; percent: number };

/** MemTotal and MemAvailable from /proc/meminfo text, in bytes. */
export function parseMeminfo(text: string): MemoryReading | null {
  const kb = (key: string) => {
    const m = text.match(new RegExp(`^${key}:\\s+(\\d+)\\s*kB`, 'm'));
    return m?.[1] ? Number(m[1]) * 1024 : null;
  };
  const total = kb('MemTotal');
  const available = kb('MemAvailable') ?? kb('MemFree');
  if (total === null || available === null || total <= 0) return null;
  const used = total - available;
  return { used, total, percent: (used / total) * 100 };
}

export const THERMAL_ZONES = [
  '/sys/class/thermal/thermal_zone0/temp',
  '/sys/class/thermal/thermal_zone1/temp',
];

/** First readable zone, millidegrees to whole degrees. */
export async function readTemperature(paths: readonly string[] = THERMAL_ZONES): Promise<number> {
  for (const p of paths) {
    let raw: string;
    try {
      raw = await fsp.readFile(p, 'utf8');
    } catch {
      continue;
    }
    const milli = Number.parseInt(raw.trim(), 10);
    if (Number.isFinite(milli)) return Math.trunc(milli / 1000);
  }
  throw new Error('No thermal zone found');
}

export type SamplerOptions = {
  bus: EventBus;
  intervalMs?: number;
  temperatureIntervalMs?: number;
  meminfoPath?: string;
  thermalPaths?: readonly string[];
  cpuTimes?: () => CpuTimes;
};

/** Publishes CPU, memory and temperature readings on fixed intervals. */
export class SystemSampler {
  private readonly bus: EventBus;
  private readonly intervalMs: number;
  private readonly temperatureIntervalMs: number;
  private readonly meminfoPath: string;
  private readonly thermalPaths: readonly string[];
  private readonly cpuTimes: () => CpuTimes;
  private prevCpu: CpuTimes;
  private timers: NodeJS.Timeout[] = [];

  constructor(opts: SamplerOptions) {
    this.bus = opts.bus;
    this.intervalMs = opts.intervalMs ?? 2000;
    this.temperatureIntervalMs = opts.temperatureIntervalMs ?? 5000;
    this.meminfoPath = opts.meminfoPath ?? '/proc/meminfo';
    this.thermalPaths = opts.thermalPaths ?? THERMAL_ZONES;
    this.cpuTimes = opts.cpuTimes ?? readCpuTimes;
    this.prevCpu = this.cpuTimes();
  }

  start(): void {
    if (this.timers.length > 0) return;
    const usage = setInterval(() => {
      this.sampleUsage().catch(err => log.warn(`usage sample failed: ${errorMessage(err)}`));
    }, this.intervalMs);
    const temp = setInterval(() => {
      this.sampleTemperature().catch(err => log.warn(`temperature sample failed: ${errorMessage(err)}`));
    }, this.temperatureIntervalMs);
    usage.unref?.();
    temp.unref?.();
    this.timers = [usage, temp];
  }

  stop(): void {
    for (const t of this.timers) clearInterval(t);
    this.timers = [];
  }

  async sampleUsage(): Promise<void> {
    const next = this.cpuTimes();
    this.bus.publish({ type: 'system/cpu', usage: cpuUsage(this.prevCpu, next) });
    this.prevCpu = next;
    this.bus.publish({ type: 'system/memory', ...(await this.readMemory()) });
  }

  /** Missing sensors are common; those failures stay at debug level. */
  async sampleTemperature(): Promise<boolean> {
    try {
      const celsius = await readTemperature(this.thermalPaths);
      this.bus.publish({ type: 'system/temperature', celsius });
      return true;
    } catch (err) {
      log.debug(`temperature read failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private async readMemory(): Promise<MemoryReading> {
    try {
      const parsed = parseMeminfo(await fsp.readFile(this.meminfoPath, 'utf8'));
      if (parsed) return parsed;
    } catch (err) {
      log.debug(`${this.meminfoPath} unreadable: ${errorMessage(err)}`);
    }
    const total = os.totalmem();
    const used = total - os.freemem();
    return { used, total, percent: total > 0 ? (used / total) * 100 : 0 };
  }
}
