// src/lib/backend/backlight.ts
import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_STEP } from '../config.js';
import { errorCode } from '../errors.js';
import { BackendControl, clampPercent, type ControlOptions } from './control.js';

export type BacklightState = {
  level: number;
};

const PREFERRED = ['intel_backlight', 'amdgpu_bl0', 'radeon_bl0', 'acpi_video0'];

/** Picks the panel device under `root`, or null when the host has none. */
export function findBacklightDevice(root: string): string | null {
  let entries: string[];
  try {
    entries = fs.readdirSync(root).sort();
  } catch {
    return null;
  }
  const name = PREFERRED.find(p => entries.includes(p)) ?? entries[0];
  return name ? path.join(root, name) : null;
}

async function readInt(file: string): Promise<number> {
  const raw = (await fsp.readFile(file, 'utf8')).trim();
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n)) throw new Error(`${file}: not a number: ${raw}`);
  return n;
}

type Panel = { dir: string; max: number };

export type BacklightOptions = ControlOptions & { device: string };

export class BacklightControl extends BackendControl<BacklightState, Panel> {
  readonly device: string;

  constructor(opts: BacklightOptions) {
    super('backlight', { level: 50 }, opts);
    this.device = opts.device;
  }

  protected async open(): Promise<Panel> {
    const max = await readInt(path.join(this.device, 'max_brightness'));
    if (max <= 0) throw new Error(`${this.device}: max_brightness is ${max}`);
    return { dir: this.device, max };
  }

  protected async afterConnect(_panel: Panel, sync: boolean): Promise<void> {
    if (sync) await this.refresh();
  }

  /** Only a device that went away drops the panel; a refused write does not. */
  protected isConnectionFailure(err: unknown): boolean {
    const code = errorCode(err);
    return code === 'ENOENT' || code === 'ENODEV';
  }

  async refresh(): Promise<Readonly<BacklightState>> {
    const raw = await this.withHandle('read brightness', p => readInt(path.join(p.dir, 'brightness')).then(v => (v / p.max) * 100));
    const before = this.read();
    const after = await this.store(() => ({ level: clampPercent(raw) }));
    if (after.level !== before.level) this.publish({ type: 'backlight/brightness', level: after.level });
    return after;
  }

  setBrightness(level: number): Promise<Readonly<BacklightState>> {
    return this.change('set brightness', () => level);
  }

  increaseBrightness(step: number = DEFAULT_STEP): Promise<Readonly<BacklightState>> {
    return this.change('increase brightness', s => s.level + step);
  }

  decreaseBrightness(step: number = DEFAULT_STEP): Promise<Readonly<BacklightState>> {
    return this.change('decrease brightness', s => s.level - step);
  }

  private change(label: string, target: (s: Readonly<BacklightState>) => number) {
    return this.commit(label, s => ({ level: clampPercent(target(s)) }), {
      push: async (p, s) => {
        const raw = Math.round((s.level / 100) * p.max);
        await fsp.writeFile(path.join(p.dir, 'brightness'), String(raw));
      },
      event: s => ({ type: 'backlight/brightness', level: s.level }),
    });
  }
}
