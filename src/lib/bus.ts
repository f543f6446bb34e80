// src/lib/bus.ts
import { LOG } from './logger.js';

const log = LOG.tag('bus');

export type WorkspaceInfo = {
  id: number;
  name: string | null;
  /** Connector the workspace lives on; ids repeat across outputs. */
  output: string | null;
  active: boolean;
  focused: boolean;
};

export type WifiNetwork = {
  ssid: string;
  signal: number;
  secured: boolean;
  connected: boolean;
};

export type BluetoothDevice = {
  address: string;
  name: string;
  connected: boolean;
  paired: boolean;
};

export type PopupKind = 'bluetooth' | 'wifi' | 'media-control' | 'power';

export type ShellEvent =
  // Compositor
  | { type: 'workspace/changed'; id: number }
  | { type: 'workspace/created'; id: number; name: string | null }
  | { type: 'workspace/removed'; id: number }
  | { type: 'workspaces/updated'; workspaces: WorkspaceInfo[] }
  // Levels
  | { type: 'audio/volume'; level: number; muted: boolean }
  | { type: 'backlight/brightness'; level: number }
  // Sampler
  | { type: 'system/cpu'; usage: number }
  | { type: 'system/memory'; used: number; total: number; percent: number }
  | { type: 'system/temperature'; celsius: number }
  // Network
  | { type: 'wifi/state'; enabled: boolean }
  | { type: 'wifi/networks'; networks: WifiNetwork[] }
  | { type: 'wifi/connected'; ssid: string }
  | { type: 'wifi/disconnected' }
  // Bluetooth
  | { type: 'bluetooth/state'; enabled: boolean }
  | { type: 'bluetooth/devices'; devices: BluetoothDevice[] }
  | { type: 'bluetooth/connected'; address: string; name: string }
  | { type: 'bluetooth/disconnected'; address: string }
  // Media
  | { type: 'media/player'; player: string | null }
  | { type: 'media/track'; title: string; artist: string; album: string | null }
  | { type: 'media/playback'; playing: boolean }
  | { type: 'media/volume'; volume: number }
  // Battery
  | { type: 'battery'; percentage: number; state: string; charging: boolean }
  // Popups
  | { type: 'popup/requested'; popup: PopupKind }
  | { type: 'popup/closed'; popup: PopupKind };

export type ShellEventType = ShellEvent['type'];

export const DEFAULT_BUS_CAPACITY = 1024;

type Waiter = (e: ShellEvent | null) => void;

/**
 * One subscriber's view of the bus. Holds at most `capacity` undelivered
 * events; when full, the oldest is dropped and counted in `lagged`.
 */
export class Receiver implements AsyncIterable<ShellEvent> {
  private readonly queue: ShellEvent[] = [];
  private waiter: Waiter | null = null;
  private closed = false;
  private droppedTotal = 0;

  constructor(
    private readonly capacity: number,
    private readonly onClose: (r: Receiver) => void,
  ) {}

  /** Events dropped so far because this receiver fell behind. */
  get lagged(): number {
    return this.droppedTotal;
  }

  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** @internal called by the bus */
  deliver(e: ShellEvent): void {
    if (this.closed) return;
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w(e);
      return;
    }
    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.droppedTotal++;
    }
    this.queue.push(e);
  }

  tryRecv(): ShellEvent | null {
    return this.queue.shift() ?? null;
  }

  /** Next event in publish order; `null` once the receiver is closed and drained. */
  recv(): Promise<ShellEvent | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) return Promise.reject(new Error('receiver already has a pending recv()'));
    return new Promise<ShellEvent | null>(resolve => { this.waiter = resolve; });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose(this);
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w(null);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<ShellEvent> {
    for (;;) {
      const e = await this.recv();
      if (e === null) return;
      yield e;
    }
  }
}

/**
 * Process-wide broadcast channel. Publishing never blocks and never throws;
 * with no subscribers it is a no-op.
 */
export class EventBus {
  private readonly receivers = new Set<Receiver>();

  constructor(private readonly capacity: number = DEFAULT_BUS_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`bus capacity must be a positive integer, got ${capacity}`);
    }
  }

  publish(e: ShellEvent): void {
    for (const r of this.receivers) r.deliver(e);
  }

  subscribe(): Receiver {
    const r = new Receiver(this.capacity, gone => { this.receivers.delete(gone); });
    this.receivers.add(r);
    return r;
  }

  subscriberCount(): number {
    return this.receivers.size;
  }

  /**
   * Runs `fn` for every event from now on, in its own task. Listener
   * exceptions are logged and do not stop delivery.
   */
  listen(fn: (e: ShellEvent) => void | Promise<void>): () => void {
    const rx = this.subscribe();
    const pump = async () => {
      for await (const e of rx) {
        try {
          await fn(e);
        } catch (err) {
          log.warn(`listener failed on ${e.type}: ${String(err)}`);
        }
      }
    };
    pump().catch(err => log.error(`listener pump stopped: ${String(err)}`));
    return () => rx.close();
  }
}
