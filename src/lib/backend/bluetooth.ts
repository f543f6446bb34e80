// src/lib/backend/bluetooth.ts
import { z } from 'zod';
import type { BluetoothDevice } from '../bus.js';
import { BackendError } from '../errors.js';
import { OBJECT_MANAGER_IFACE, DbusControl, type BusConnection, type DbusControlOptions } from './dbus.js';

const BLUEZ = 'org.bluez';
const ADAPTER_IFACE = 'org.bluez.Adapter1';
const DEVICE_IFACE = 'org.bluez.Device1';
const DEFAULT_ADAPTER = '/org/bluez/hci0';

export type BluetoothState = {
  powered: boolean;
  discovering: boolean;
  devices: readonly BluetoothDevice[];
};

const managedObjects = z.record(z.string(), z.record(z.string(), z.record(z.string(), z.unknown())));
type ManagedObjects = z.infer<typeof managedObjects>;

const deviceProps = z.object({
  Address: z.string(),
  Name: z.string().optional(),
  Alias: z.string().optional(),
  Connected: z.boolean().default(false),
  Paired: z.boolean().default(false),
  Adapter: z.string().optional(),
});

const adapterProps = z.object({
  Powered: z.boolean().default(false),
  Discovering: z.boolean().default(false),
});

const ADDRESS = /^[0-9A-F]{2}(:[0-9A-F]{2}){5}$/;

/** `aa:bb:cc:dd:ee:ff` → `${adapter}/dev_AA_BB_CC_DD_EE_FF`. */
export function devicePath(adapter: string, address: string): string {
  const norm = address.trim().toUpperCase();
  if (!ADDRESS.test(norm)) throw BackendError.protocol('bluetooth', `invalid device address: ${address}`);
  return `${adapter}/dev_${norm.replace(/:/g, '_')}`;
}

/** Devices under `adapter`, connected first, then by name. */
export function listDevices(objects: ManagedObjects, adapter: string): BluetoothDevice[] {
  const out: BluetoothDevice[] = [];
  for (const [path, ifaces] of Object.entries(objects)) {
    const raw = ifaces[DEVICE_IFACE];
    if (!raw) continue;
    const parsed = deviceProps.safeParse(raw);
    if (!parsed.success) continue;
    const d = parsed.data;
    const owner = d.Adapter ?? path.slice(0, path.lastIndexOf('/'));
    if (owner !== adapter) continue;
    out.push({ address: d.Address, name: d.Alias ?? d.Name ?? d.Address, connected: d.Connected, paired: d.Paired });
  }
  return out.sort((a, b) => Number(b.connected) - Number(a.connected) || a.name.localeCompare(b.name));
}

/** BlueZ default adapter and the devices it knows. */
export class BluetoothControl extends DbusControl<BluetoothState> {
  private adapterPath = DEFAULT_ADAPTER;

  constructor(opts: DbusControlOptions) {
    super('bluetooth', 'system', { powered: false, discovering: false, devices: [] }, opts);
  }

  get adapter(): string {
    return this.adapterPath;
  }

  protected async afterConnect(conn: BusConnection, sync: boolean): Promise<void> {
    const objects = await this.managedObjects(conn);
    const adapters = Object.keys(objects).filter(p => objects[p]?.[ADAPTER_IFACE]).sort();
    const first = adapters[0];
    if (first) this.adapterPath = first;
    else this.log.warn(`no adapter reported, assuming ${DEFAULT_ADAPTER}`);
    if (sync) await this.apply(objects);
  }

  setPowered(powered: boolean): Promise<Readonly<BluetoothState>> {
    return this.switchPower('set powered', () => powered);
  }

  togglePowered(): Promise<Readonly<BluetoothState>> {
    return this.switchPower('toggle powered', s => !s.powered);
  }

  async startScan(): Promise<void> {
    await this.adapterCall('StartDiscovery');
    await this.store(s => ({ ...s, discovering: true }));
  }

  async stopScan(): Promise<void> {
    await this.adapterCall('StopDiscovery');
    await this.store(s => ({ ...s, discovering: false }));
  }

  /** Re-reads adapter and device state and publishes the device list. */
  async refreshDevices(): Promise<readonly BluetoothDevice[]> {
    const objects = await this.withHandle('list devices', conn => this.managedObjects(conn));
    return (await this.apply(objects)).devices;
  }

  async connectDevice(address: string): Promise<void> {
    const path = devicePath(this.adapterPath, address);
    await this.deviceCall(path, 'Connect');
    const dev = await this.markDevice(address, { connected: true });
    this.publish({ type: 'bluetooth/connected', address: dev?.address ?? address, name: dev?.name ?? address });
  }

  async disconnectDevice(address: string): Promise<void> {
    const path = devicePath(this.adapterPath, address);
    await this.deviceCall(path, 'Disconnect');
    const dev = await this.markDevice(address, { connected: false });
    this.publish({ type: 'bluetooth/disconnected', address: dev?.address ?? address });
  }

  async pairDevice(address: string): Promise<void> {
    const path = devicePath(this.adapterPath, address);
    await this.deviceCall(path, 'Pair');
    await this.markDevice(address, { paired: true });
    this.publishDevices();
  }

  async removeDevice(address: string): Promise<void> {
    const path = devicePath(this.adapterPath, address);
    await this.adapterCall('RemoveDevice', path);
    const target = address.toUpperCase();
    await this.store(s => ({ ...s, devices: s.devices.filter(d => d.address.toUpperCase() !== target) }));
    this.publishDevices();
  }

  private switchPower(label: string, target: (s: Readonly<BluetoothState>) => boolean) {
    return this.commit(label, s => ({ ...s, powered: target(s) }), {
      push: async (conn, s) => {
        const adapter = await conn.proxy(BLUEZ, this.adapterPath);
        await adapter.setProperty(ADAPTER_IFACE, 'Powered', 'b', s.powered);
      },
      event: s => ({ type: 'bluetooth/state', enabled: s.powered }),
    });
  }

  private async adapterCall(method: string, ...args: unknown[]): Promise<void> {
    await this.withHandle(method, async conn => {
      const adapter = await conn.proxy(BLUEZ, this.adapterPath);
      await adapter.call(ADAPTER_IFACE, method, ...args);
    });
  }

  private async deviceCall(path: string, method: string): Promise<void> {
    await this.withHandle(method, async conn => {
      const dev = await conn.proxy(BLUEZ, path);
      await dev.call(DEVICE_IFACE, method);
    });
  }

  private async managedObjects(conn: BusConnection): Promise<ManagedObjects> {
    const root = await conn.proxy(BLUEZ, '/');
    const parsed = managedObjects.safeParse(await root.call(OBJECT_MANAGER_IFACE, 'GetManagedObjects'));
    if (!parsed.success) throw new Error('GetManagedObjects: unexpected reply');
    return parsed.data;
  }

  private async apply(objects: ManagedObjects): Promise<Readonly<BluetoothState>> {
    const props = adapterProps.safeParse(objects[this.adapterPath]?.[ADAPTER_IFACE] ?? {});
    const adapter = props.success ? props.data : { Powered: false, Discovering: false };
    const devices = listDevices(objects, this.adapterPath);
    const before = this.read();
    const after = await this.store(() => ({ powered: adapter.Powered, discovering: adapter.Discovering, devices }));
    if (before.powered !== after.powered) this.publish({ type: 'bluetooth/state', enabled: after.powered });
    this.publishDevices();
    return after;
  }

  private async markDevice(address: string, patch: Partial<Pick<BluetoothDevice, 'connected' | 'paired'>>) {
    const target = address.toUpperCase();
    const after = await this.store(s => ({
      ...s,
      devices: s.devices.map(d => (d.address.toUpperCase() === target ? { ...d, ...patch } : d)),
    }));
    return after.devices.find(d => d.address.toUpperCase() === target);
  }

  private publishDevices(): void {
    this.publish({ type: 'bluetooth/devices', devices: [...this.read().devices] });
  }
}
