// src/lib/appState.ts
import { EventBus } from './bus.js';
import type { Config, Subsystem } from './config.js';
import { errorMessage } from './errors.js';
import { LOG } from './logger.js';
import { PopupTracker } from './popups.js';
import { AudioControl } from './backend/audio.js';
import { BacklightControl, findBacklightDevice } from './backend/backlight.js';
import { BatteryControl } from './backend/battery.js';
import { BluetoothControl } from './backend/bluetooth.js';
import { MediaControl } from './backend/media.js';
import { NetworkControl } from './backend/network.js';
import { PowerControl } from './backend/power.js';
import { CompositorClient } from './compositor/client.js';
import type { ConnectionStatus } from './backend/control.js';

const log = LOG.tag('app-state');

export type Slot<T> =
  | { kind: 'present'; control: T }
  | { kind: 'absent'; reason: string };

export function present<T>(control: T): Slot<T> {
  return { kind: 'present', control };
}

export function absent<T>(reason: string): Slot<T> {
  return { kind: 'absent', reason };
}

export type Controls = {
  audio: Slot<AudioControl>;
  backlight: Slot<BacklightControl>;
  battery: Slot<BatteryControl>;
  bluetooth: Slot<BluetoothControl>;
  network: Slot<NetworkControl>;
  media: Slot<MediaControl>;
  power: Slot<PowerControl>;
  compositor: Slot<CompositorClient>;
};

type AnyControl = {
  status(): ConnectionStatus;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
};

/**
 * The one registry of adapters, built at startup and handed to every
 * component that needs a backend. Never fails and never waits on a backend.
 */
export class AppState {
  readonly startedAt = Date.now();
  readonly popups: PopupTracker;
  private readonly initial: Promise<void>;

  constructor(readonly bus: EventBus, readonly controls: Controls) {
    this.popups = new PopupTracker(bus);
    this.initial = this.connectAll();
  }

  static create(config: Config, bus: EventBus = new EventBus(config.eventBusCapacity)): AppState {
    const timeouts = { bus, connectTimeoutMs: config.connectTimeoutMs };
    const off = (name: Subsystem) => config.disabled.has(name);
    const build = <T>(name: Subsystem, make: () => T): Slot<T> =>
      off(name) ? absent(`${name} disabled in settings`) : present(make());

    const device = off('backlight') ? null : findBacklightDevice(config.backlightRoot);
    const backlight: Slot<BacklightControl> = off('backlight')
      ? absent('backlight disabled in settings')
      : device === null
        ? absent(`no backlight device under ${config.backlightRoot}`)
        : present(new BacklightControl({ ...timeouts, device }));

    return new AppState(bus, {
      audio: build('audio', () => new AudioControl(timeouts)),
      backlight,
      battery: build('battery', () => new BatteryControl(timeouts)),
      bluetooth: build('bluetooth', () => new BluetoothControl(timeouts)),
      network: build('network', () => new NetworkControl(timeouts)),
      media: build('media', () => new MediaControl(timeouts)),
      power: build('power', () => new PowerControl(timeouts)),
      compositor: build('compositor', () => new CompositorClient({ ...timeouts, socketPath: config.compositorSocket })),
    });
  }

  get audio() { return this.controls.audio; }
  get backlight() { return this.controls.backlight; }
  get battery() { return this.controls.battery; }
  get bluetooth() { return this.controls.bluetooth; }
  get network() { return this.controls.network; }
  get media() { return this.controls.media; }
  get power() { return this.controls.power; }
  get compositor() { return this.controls.compositor; }

  uptimeSeconds(now = Date.now()): number {
    return Math.floor((now - this.startedAt) / 1000);
  }

  /** Resolves once every initial connection attempt has settled either way. */
  ready(): Promise<void> {
    return this.initial;
  }

  /** Connection status of each present adapter; the reason for absent ones. */
  summary(): { name: Subsystem; status: string }[] {
    return this.entries().map(([name, slot]) => ({
      name,
      status: slot.kind === 'present' ? slot.control.status() : `absent (${slot.reason})`,
    }));
  }

  async shutdown(): Promise<void> {
    this.popups.dispose();
    await Promise.allSettled(this.presentControls().map(c => c.disconnect()));
  }

  private entries(): [Subsystem, Slot<AnyControl>][] {
    return [
      ['audio', this.controls.audio],
      ['backlight', this.controls.backlight],
      ['battery', this.controls.battery],
      ['bluetooth', this.controls.bluetooth],
      ['network', this.controls.network],
      ['media', this.controls.media],
      ['power', this.controls.power],
      ['compositor', this.controls.compositor],
    ];
  }

  private presentControls(): AnyControl[] {
    const out: AnyControl[] = [];
    for (const [, slot] of this.entries()) if (slot.kind === 'present') out.push(slot.control);
    return out;
  }

  private async connectAll(): Promise<void> {
    const attempts = this.entries().map(async ([name, slot]) => {
      if (slot.kind === 'absent') {
        log.info(`${name} unavailable: ${slot.reason}`);
        return;
      }
      try {
        await slot.control.connect();
      } catch (err) {
        log.warn(`${name} not connected: ${errorMessage(err)}`);
      }
    });
    await Promise.allSettled(attempts);
  }
}
