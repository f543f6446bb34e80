// src/lib/backend/dbus.ts
import dbus from 'dbus-next';
import type { MessageBus, ProxyObject } from 'dbus-next';
import { z } from 'zod';
import { LOG } from '../logger.js';
import { BackendControl, type ControlOptions } from './control.js';

const log = LOG.tag('dbus');

export const PROPERTIES_IFACE = 'org.freedesktop.DBus.Properties';
export const OBJECT_MANAGER_IFACE = 'org.freedesktop.DBus.ObjectManager';

export type BusKind = 'system' | 'session';

/** One remote object. Values come back with variants unwrapped. */
export interface BusProxy {
  call(iface: string, method: string, ...args: unknown[]): Promise<unknown>;
  getProperty(iface: string, name: string): Promise<unknown>;
  setProperty(iface: string, name: string, signature: string, value: unknown): Promise<void>;
}

export interface BusConnection {
  proxy(destination: string, path: string): Promise<BusProxy>;
  close(): void;
}

export type BusOpener = () => Promise<BusConnection>;

function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (typeof v !== 'object' || v === null) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

/** Strips variant wrappers, recursively through arrays and dicts. */
export function unwrap(v: unknown): unknown {
  if (v instanceof dbus.Variant) return unwrap(v.value);
  if (Buffer.isBuffer(v)) return v;
  if (Array.isArray(v)) return v.map(unwrap);
  if (isPlainObject(v)) {
    const out: Record<string, unknown> = {};
    for (const [k, val] of Object.entries(v)) out[k] = unwrap(val);
    return out;
  }
  return v;
}

/** Name of the remote error (`org.freedesktop.DBus.Error.*`), if `err` is one. */
export function remoteErrorName(err: unknown): string | null {
  if (!(err instanceof Error) || !('type' in err)) return null;
  return typeof err.type === 'string' ? err.type : null;
}

const LINK_ERRORS = new Set([
  'org.freedesktop.DBus.Error.ServiceUnknown',
  'org.freedesktop.DBus.Error.NameHasNoOwner',
  'org.freedesktop.DBus.Error.NoReply',
  'org.freedesktop.DBus.Error.Disconnected',
  'org.freedesktop.DBus.Error.NoServer',
]);

/** Typed value for a{sv} arguments and property writes. */
export function variant(signature: string, value: unknown): unknown {
  return new dbus.Variant(signature, value);
}

/** `ay` values, as NetworkManager uses for SSIDs. */
export const busBytes = z
  .union([z.instanceof(Buffer), z.array(z.number().int().min(0).max(255))])
  .transform(v => Buffer.from(v).toString('utf8'));

/** int64/uint64 arrive as bigint. */
export const busInt = z.union([z.number(), z.bigint()]).transform(Number);

/** Reads one property and checks its shape. */
export async function readProperty<T>(
  proxy: BusProxy,
  iface: string,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const raw = await proxy.getProperty(iface, name);
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new Error(`${iface}.${name}: unexpected value ${String(raw)}`);
  return parsed.data;
}

/** Like readProperty, but a missing or odd property yields `fallback`. */
export async function readPropertyOr<T>(
  proxy: BusProxy,
  iface: string,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
): Promise<T> {
  let raw: unknown;
  try {
    raw = await proxy.getProperty(iface, name);
  } catch (err) {
    if (remoteErrorName(err) === null) throw err;
    return fallback;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : fallback;
}

class NextProxy implements BusProxy {
  constructor(private readonly obj: ProxyObject, private readonly path: string) {}

  async call(iface: string, method: string, ...args: unknown[]): Promise<unknown> {
    const target: unknown = this.obj.getInterface(iface);
    if (typeof target !== 'object' || target === null) {
      throw new dbus.DBusError('org.freedesktop.DBus.Error.UnknownInterface', `${iface} is not exported at ${this.path}`);
    }
    const fn: unknown = Reflect.get(target, method);
    if (typeof fn !== 'function') {
      throw new dbus.DBusError('org.freedesktop.DBus.Error.UnknownMethod', `${iface}.${method} is not exported at ${this.path}`);
    }
    const out: unknown = await fn.apply(target, args);
    return unwrap(out);
  }

  getProperty(iface: string, name: string): Promise<unknown> {
    return this.call(PROPERTIES_IFACE, 'Get', iface, name);
  }

  async setProperty(iface: string, name: string, signature: string, value: unknown): Promise<void> {
    await this.call(PROPERTIES_IFACE, 'Set', iface, name, variant(signature, value));
  }
}

/**
 * Introspected proxies, least recently used evicted first. NetworkManager
 * hands out a new object path per access point sighting.
 */
export class ProxyCache<T> {
  private readonly entries = new Map<string, Promise<T>>();

  constructor(private readonly limit = 64) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: string, make: () => Promise<T>): Promise<T> {
    const hit = this.entries.get(key);
    if (hit) {
      this.entries.delete(key);
      this.entries.set(key, hit);
      return hit;
    }
    const made = make();
    // forget failed introspections so a later call can retry
    made.catch(() => {
      if (this.entries.get(key) === made) this.entries.delete(key);
    });
    this.entries.set(key, made);
    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.limit) break;
      this.entries.delete(oldest);
    }
    return made;
  }

  clear(): void {
    this.entries.clear();
  }
}

class NextConnection implements BusConnection {
  private readonly proxies = new ProxyCache<BusProxy>();

  constructor(private readonly bus: MessageBus, private readonly kind: BusKind) {}

  proxy(destination: string, path: string): Promise<BusProxy> {
    return this.proxies.get(`${destination}${path}`, () =>
      this.bus.getProxyObject(destination, path).then((obj): BusProxy => new NextProxy(obj, path)),
    );
  }

  close(): void {
    this.proxies.clear();
    this.bus.disconnect();
    log.debug(`${this.kind} bus closed`);
  }
}

/** Connects to the system or session bus and checks the daemon answers. */
export async function openBus(kind: BusKind): Promise<BusConnection> {
  const bus = kind === 'system' ? dbus.systemBus() : dbus.sessionBus();
  bus.on('error', (err: unknown) => log.warn(`${kind} bus error: ${String(err)}`));
  const conn = new NextConnection(bus, kind);
  try {
    await conn.proxy('org.freedesktop.DBus', '/org/freedesktop/DBus');
  } catch (err) {
    conn.close();
    throw err;
  }
  return conn;
}

export type DbusControlOptions = ControlOptions & {
  /** Replaces the real bus; tests pass an in-process fake. */
  openBus?: BusOpener;
};

/** Adapter whose connection is a D-Bus connection. */
export abstract class DbusControl<TState extends object> extends BackendControl<TState, BusConnection> {
  private readonly opener: BusOpener;

  protected constructor(name: string, kind: BusKind, initial: TState, opts: DbusControlOptions) {
    super(name, initial, opts);
    this.opener = opts.openBus ?? (() => openBus(kind));
  }

  protected open(): Promise<BusConnection> {
    return this.opener();
  }

  protected async release(conn: BusConnection): Promise<void> {
    conn.close();
  }

  /** Remote method errors leave the link up; transport errors do not. */
  protected isConnectionFailure(err: unknown): boolean {
    const remote = remoteErrorName(err);
    return remote === null || LINK_ERRORS.has(remote);
  }
}
