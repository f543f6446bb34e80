// src/lib/backend/network.ts
import { z } from 'zod';
import type { WifiNetwork } from '../bus.js';
import { BackendError, errorMessage } from '../errors.js';
import {
  busBytes,
  busInt,
  readProperty,
  readPropertyOr,
  variant,
  DbusControl,
  type BusConnection,
  type DbusControlOptions,
} from './dbus.js';

const NM = 'org.freedesktop.NetworkManager';
const NM_PATH = '/org/freedesktop/NetworkManager';
const DEVICE_IFACE = 'org.freedesktop.NetworkManager.Device';
const WIRELESS_IFACE = 'org.freedesktop.NetworkManager.Device.Wireless';
const AP_IFACE = 'org.freedesktop.NetworkManager.AccessPoint';
const TYPE_WIFI = 2;
const NO_OBJECT = '/';

export type NetworkState = {
  enabled: boolean;
  activeSsid: string | null;
  networks: readonly WifiNetwork[];
};

const objectPaths = z.array(z.string());

export type AccessPoint = { path: string; ssid: string; signal: number; secured: boolean };

/** One entry per SSID, strongest first; hidden networks are skipped. */
export function mergeAccessPoints(aps: readonly AccessPoint[], activeSsid: string | null): WifiNetwork[] {
  const best = new Map<string, AccessPoint>();
  for (const ap of aps) {
    if (!ap.ssid) continue;
    const seen = best.get(ap.ssid);
    if (!seen || ap.signal > seen.signal) best.set(ap.ssid, ap);
  }
  return [...best.values()]
    .map(ap => ({ ssid: ap.ssid, signal: ap.signal, secured: ap.secured, connected: ap.ssid === activeSsid }))
    .sort((a, b) => b.signal - a.signal);
}

/** Wi-Fi through NetworkManager: radio switch, scanning, and joining networks. */
export class NetworkControl extends DbusControl<NetworkState> {
  private devicePath: string | null = null;

  constructor(opts: DbusControlOptions) {
    super('network', 'system', { enabled: false, activeSsid: null, networks: [] }, opts);
  }

  get device(): string | null {
    return this.devicePath;
  }

  protected async afterConnect(conn: BusConnection, sync: boolean): Promise<void> {
    this.devicePath = await this.findWifiDevice(conn);
    if (this.devicePath === null) this.log.warn('no Wi-Fi device');
    if (!sync) return;
    const nm = await conn.proxy(NM, NM_PATH);
    const enabled = await readProperty(nm, NM, 'WirelessEnabled', z.boolean());
    const activeSsid = this.devicePath ? await this.readActiveSsid(conn, this.devicePath) : null;
    const before = this.read();
    await this.store(s => ({ ...s, enabled, activeSsid }));
    if (before.enabled !== enabled) this.publish({ type: 'wifi/state', enabled });
  }

  protected async release(conn: BusConnection): Promise<void> {
    this.devicePath = null;
    await super.release(conn);
  }

  setWifiEnabled(enabled: boolean): Promise<Readonly<NetworkState>> {
    return this.switchRadio('set wifi', () => enabled);
  }

  toggleWifi(): Promise<Readonly<NetworkState>> {
    return this.switchRadio('toggle wifi', s => !s.enabled);
  }

  private switchRadio(label: string, target: (s: Readonly<NetworkState>) => boolean) {
    return this.commit(label, s => ({ ...s, enabled: target(s) }), {
      push: async (conn, s) => {
        const nm = await conn.proxy(NM, NM_PATH);
        await nm.setProperty(NM, 'WirelessEnabled', 'b', s.enabled);
      },
      event: s => ({ type: 'wifi/state', enabled: s.enabled }),
    });
  }

  /** Asks the device to rescan, then reports what it currently sees. */
  async scan(): Promise<readonly WifiNetwork[]> {
    await this.withHandle('request scan', async conn => {
      const wifi = await conn.proxy(NM, this.requireDevice());
      await wifi.call(WIRELESS_IFACE, 'RequestScan', {});
    });
    return this.refreshNetworks();
  }

  async refreshNetworks(): Promise<readonly WifiNetwork[]> {
    const { aps, activeSsid } = await this.withHandle('list networks', async conn => {
      const device = this.requireDevice();
      const wifi = await conn.proxy(NM, device);
      const parsed = objectPaths.safeParse(await wifi.call(WIRELESS_IFACE, 'GetAccessPoints'));
      if (!parsed.success) throw new Error('GetAccessPoints: unexpected reply');
      const found: AccessPoint[] = [];
      for (const path of parsed.data) {
        const ap = await this.tryReadAccessPoint(conn, path);
        if (ap) found.push(ap);
      }
      return { aps: found, activeSsid: await this.readActiveSsid(conn, device) };
    });
    const networks = mergeAccessPoints(aps, activeSsid);
    await this.store(s => ({ ...s, activeSsid, networks }));
    this.publish({ type: 'wifi/networks', networks });
    return networks;
  }

  /** Creates and activates a connection profile for `ssid`. */
  async connectNetwork(ssid: string, password?: string): Promise<void> {
    const name = ssid.trim();
    if (!name) throw BackendError.protocol(this.name, 'SSID must not be empty');
    this.log.info(`connecting to ${name}`);
    await this.withHandle('connect network', async conn => {
      const device = this.requireDevice();
      const ap = this.read().networks.find(n => n.ssid === name);
      const settings: Record<string, Record<string, unknown>> = {
        connection: { id: variant('s', name), type: variant('s', '802-11-wireless') },
        '802-11-wireless': { ssid: variant('ay', Buffer.from(name, 'utf8')) },
      };
      if (password) {
        settings['802-11-wireless-security'] = { 'key-mgmt': variant('s', 'wpa-psk'), psk: variant('s', password) };
      } else if (ap?.secured) {
        throw BackendError.protocol(this.name, `${name} requires a password`);
      }
      const nm = await conn.proxy(NM, NM_PATH);
      await nm.call(NM, 'AddAndActivateConnection', settings, device, NO_OBJECT);
    });
    await this.store(s => ({
      ...s,
      activeSsid: name,
      networks: s.networks.map(n => ({ ...n, connected: n.ssid === name })),
    }));
    this.publish({ type: 'wifi/connected', ssid: name });
  }

  async disconnectNetwork(): Promise<void> {
    await this.withHandle('disconnect network', async conn => {
      const dev = await conn.proxy(NM, this.requireDevice());
      await dev.call(DEVICE_IFACE, 'Disconnect');
    });
    await this.store(s => ({
      ...s,
      activeSsid: null,
      networks: s.networks.map(n => ({ ...n, connected: false })),
    }));
    this.publish({ type: 'wifi/disconnected' });
  }

  private requireDevice(): string {
    if (this.devicePath === null) throw BackendError.unavailable(this.name, 'No WiFi device available');
    return this.devicePath;
  }

  private async findWifiDevice(conn: BusConnection): Promise<string | null> {
    const nm = await conn.proxy(NM, NM_PATH);
    const parsed = objectPaths.safeParse(await nm.call(NM, 'GetDevices'));
    if (!parsed.success) throw new Error('GetDevices: unexpected reply');
    for (const path of parsed.data) {
      const dev = await conn.proxy(NM, path);
      if ((await readPropertyOr(dev, DEVICE_IFACE, 'DeviceType', busInt, -1)) === TYPE_WIFI) return path;
    }
    return null;
  }

  private async readActiveSsid(conn: BusConnection, device: string): Promise<string | null> {
    const wifi = await conn.proxy(NM, device);
    const ap = await readPropertyOr(wifi, WIRELESS_IFACE, 'ActiveAccessPoint', z.string(), NO_OBJECT);
    if (ap === NO_OBJECT) return null;
    return (await this.tryReadAccessPoint(conn, ap))?.ssid || null;
  }

  /** Null when the access point went away after it was listed. */
  private async tryReadAccessPoint(conn: BusConnection, path: string): Promise<AccessPoint | null> {
    try {
      return await this.readAccessPoint(conn, path);
    } catch (err) {
      if (this.isConnectionFailure(err)) throw err;
      this.log.debug(`skipping access point ${path}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async readAccessPoint(conn: BusConnection, path: string): Promise<AccessPoint> {
    const p = await conn.proxy(NM, path);
    const [ssid, signal, wpa, rsn] = await Promise.all([
      readPropertyOr(p, AP_IFACE, 'Ssid', busBytes, ''),
      readPropertyOr(p, AP_IFACE, 'Strength', busInt, 0),
      readPropertyOr(p, AP_IFACE, 'WpaFlags', busInt, 0),
      readPropertyOr(p, AP_IFACE, 'RsnFlags', busInt, 0),
    ]);
    return { path, ssid, signal, secured: wpa !== 0 || rsn !== 0 };
  }
}
