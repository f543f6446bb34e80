// src/lib/backend/battery.ts
import { z } from 'zod';
import { BackendError } from '../errors.js';
import { busInt, readPropertyOr, DbusControl, type BusConnection, type DbusControlOptions } from './dbus.js';

const UPOWER = 'org.freedesktop.UPower';
const UPOWER_PATH = '/org/freedesktop/UPower';
const DEVICE_IFACE = 'org.freedesktop.UPower.Device';
const TYPE_BATTERY = 2;

export type BatteryStatus = 'Charging' | 'Discharging' | 'Empty' | 'Fully Charged' | 'Unknown';

export function batteryStatus(code: number): BatteryStatus {
  switch (code) {
    case 1: return 'Charging';
    case 2: return 'Discharging';
    case 3: return 'Empty';
    case 4: return 'Fully Charged';
    default: return 'Unknown';
  }
}

export type BatteryState = {
  percentage: number;
  state: BatteryStatus;
  /** Seconds; null while charging or full. */
  timeToEmpty: number | null;
  /** Seconds; null while discharging. */
  timeToFull: number | null;
  present: boolean;
};

/** "2h 30m", "45m", or "Unknown" for non-positive input. */
export function formatDuration(seconds: number): string {
  if (!(seconds > 0)) return 'Unknown';
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

const objectPaths = z.array(z.string());

/** First UPower battery, polled through Device properties. */
export class BatteryControl extends DbusControl<BatteryState> {
  private devicePath: string | null = null;

  constructor(opts: DbusControlOptions) {
    super('battery', 'system', {
      percentage: 0,
      state: 'Unknown',
      timeToEmpty: null,
      timeToFull: null,
      present: false,
    }, opts);
  }

  get device(): string | null {
    return this.devicePath;
  }

  protected async afterConnect(conn: BusConnection, sync: boolean): Promise<void> {
    this.devicePath = await this.findBattery(conn);
    if (this.devicePath === null) {
      this.log.info('no battery device');
      return;
    }
    this.log.info(`battery device ${this.devicePath}`);
    if (sync) await this.refresh();
  }

  protected async release(conn: BusConnection): Promise<void> {
    this.devicePath = null;
    await super.release(conn);
  }

  /** Re-reads the device and publishes the reading when it changed. */
  async refresh(): Promise<Readonly<BatteryState>> {
    const reading = await this.withHandle('read battery', async conn => {
      const dev = this.devicePath ?? (this.devicePath = await this.findBattery(conn));
      if (dev === null) throw BackendError.unavailable(this.name, 'No battery device found');
      const p = await conn.proxy(UPOWER, dev);
      const [percentage, code, toEmpty, toFull, present] = await Promise.all([
        readPropertyOr(p, DEVICE_IFACE, 'Percentage', z.number(), 0),
        readPropertyOr(p, DEVICE_IFACE, 'State', busInt, 0),
        readPropertyOr(p, DEVICE_IFACE, 'TimeToEmpty', busInt, 0),
        readPropertyOr(p, DEVICE_IFACE, 'TimeToFull', busInt, 0),
        readPropertyOr(p, DEVICE_IFACE, 'IsPresent', z.boolean(), false),
      ]);
      const next: BatteryState = {
        percentage,
        state: batteryStatus(code),
        timeToEmpty: toEmpty > 0 ? toEmpty : null,
        timeToFull: toFull > 0 ? toFull : null,
        present,
      };
      return next;
    });
    const before = this.read();
    const after = await this.store(() => reading);
    if (before.percentage !== after.percentage || before.state !== after.state || before.present !== after.present) {
      this.log.debug(`battery ${after.percentage}% ${after.state}`);
      this.publish({ type: 'battery', percentage: after.percentage, state: after.state, charging: after.state === 'Charging' });
    }
    return after;
  }

  isCharging(): boolean {
    return this.read().state === 'Charging';
  }

  private async findBattery(conn: BusConnection): Promise<string | null> {
    const upower = await conn.proxy(UPOWER, UPOWER_PATH);
    const parsed = objectPaths.safeParse(await upower.call(UPOWER, 'EnumerateDevices'));
    if (!parsed.success) throw new Error('EnumerateDevices: unexpected reply');
    for (const path of parsed.data) {
      const dev = await conn.proxy(UPOWER, path);
      const kind = await readPropertyOr(dev, DEVICE_IFACE, 'Type', busInt, -1);
      if (kind === TYPE_BATTERY) return path;
    }
    return null;
  }
}
