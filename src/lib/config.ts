// src/lib/config.ts
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { LOG } from './logger.js';
import { DEFAULT_BUS_CAPACITY } from './bus.js';
import { configDir, defaultSocketPath, type Env } from './ipc/paths.js';

const log = LOG.tag('config');

export const SUBSYSTEMS = [
  'audio',
  'backlight',
  'battery',
  'bluetooth',
  'network',
  'media',
  'power',
  'compositor',
] as const;
export type Subsystem = (typeof SUBSYSTEMS)[number];

const SettingsSchema = z
  .object({
    socketPath: z.string().min(1),
    eventBusCapacity: z.number().int().positive(),
    connectTimeoutMs: z.number().int().positive(),
    volumeStep: z.number().positive().max(100),
    brightnessStep: z.number().positive().max(100),
    compositorPollMs: z.number().int().min(100),
    samplerIntervalMs: z.number().int().min(100),
    temperatureIntervalMs: z.number().int().min(100),
    batteryPollMs: z.number().int().min(1000),
    clientIdleTimeoutMs: z.number().int().positive(),
    disabled: z.array(z.enum(SUBSYSTEMS)),
    eventStreamPort: z.number().int().min(1).max(65535).nullable(),
    backlightRoot: z.string().min(1),
    compositorSocket: z.string().min(1).nullable(),
  })
  .partial()
  .strict();

export type Settings = z.infer<typeof SettingsSchema>;

export type Config = {
  socketPath: string;
  eventBusCapacity: number;
  connectTimeoutMs: number;
  volumeStep: number;
  brightnessStep: number;
  compositorPollMs: number;
  samplerIntervalMs: number;
  temperatureIntervalMs: number;
  batteryPollMs: number;
  clientIdleTimeoutMs: number;
  disabled: ReadonlySet<Subsystem>;
  eventStreamPort: number | null;
  backlightRoot: string;
  compositorSocket: string | null;
};

export const DEFAULT_STEP = 5.0;

export function defaultConfig(env: Env = process.env): Config {
  return {
    socketPath: defaultSocketPath(env),
    eventBusCapacity: DEFAULT_BUS_CAPACITY,
    connectTimeoutMs: 3000,
    volumeStep: DEFAULT_STEP,
    brightnessStep: DEFAULT_STEP,
    compositorPollMs: 2000,
    samplerIntervalMs: 2000,
    temperatureIntervalMs: 5000,
    batteryPollMs: 30000,
    clientIdleTimeoutMs: 30000,
    disabled: new Set(),
    eventStreamPort: null,
    backlightRoot: '/sys/class/backlight',
    compositorSocket: null,
  };
}

export function settingsPath(env: Env = process.env): string {
  return env.DESKBAR_SETTINGS || path.join(configDir(env), 'settings.json');
}

/**
 * Reads the settings file. A missing file is normal; an unreadable or
 * malformed one is logged and ignored.
 */
export function readSettings(file: string): Settings {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    log.warn(`cannot read ${file}, using defaults: ${String(err)}`);
    return {};
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    log.warn(`malformed settings in ${file}, using defaults: ${String(err)}`);
    return {};
  }
  const parsed = SettingsSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    log.warn(`invalid settings in ${file}, using defaults: ${issues}`);
    return {};
  }
  return parsed.data;
}

function envNum(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw == null || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    log.warn(`ignoring ${key}=${raw}: not a number`);
    return undefined;
  }
  return n;
}

function isSubsystem(v: string): v is Subsystem {
  return SUBSYSTEMS.some(s => s === v);
}

function envDisabled(env: Env): Subsystem[] | undefined {
  const raw = env.DESKBAR_DISABLE;
  if (raw == null) return undefined;
  const out: Subsystem[] = [];
  for (const part of raw.split(',')) {
    const name = part.trim().toLowerCase();
    if (!name) continue;
    if (isSubsystem(name)) out.push(name);
    else log.warn(`DESKBAR_DISABLE: unknown subsystem "${name}"`);
  }
  return out;
}

/** Defaults, then the settings file, then environment overrides. */
export function loadConfig(env: Env = process.env): Config {
  const base = defaultConfig(env);
  const s = readSettings(settingsPath(env));

  const port = envNum(env, 'DESKBAR_EVENT_PORT');
  const capacity = envNum(env, 'DESKBAR_BUS_CAPACITY');
  const timeout = envNum(env, 'DESKBAR_CONNECT_TIMEOUT_MS');
  const disabled = envDisabled(env) ?? s.disabled;

  return {
    socketPath: env.DESKBAR_SOCKET || s.socketPath || base.socketPath,
    eventBusCapacity: capacity !== undefined && capacity >= 1 ? Math.floor(capacity) : s.eventBusCapacity ?? base.eventBusCapacity,
    connectTimeoutMs: timeout !== undefined && timeout > 0 ? timeout : s.connectTimeoutMs ?? base.connectTimeoutMs,
    volumeStep: s.volumeStep ?? base.volumeStep,
    brightnessStep: s.brightnessStep ?? base.brightnessStep,
    compositorPollMs: s.compositorPollMs ?? base.compositorPollMs,
    samplerIntervalMs: s.samplerIntervalMs ?? base.samplerIntervalMs,
    temperatureIntervalMs: s.temperatureIntervalMs ?? base.temperatureIntervalMs,
    batteryPollMs: s.batteryPollMs ?? base.batteryPollMs,
    clientIdleTimeoutMs: s.clientIdleTimeoutMs ?? base.clientIdleTimeoutMs,
    disabled: disabled ? new Set(disabled) : base.disabled,
    eventStreamPort: port !== undefined && port >= 1 && port <= 65535 ? port : s.eventStreamPort ?? base.eventStreamPort,
    backlightRoot: env.DESKBAR_BACKLIGHT_ROOT || s.backlightRoot || base.backlightRoot,
    compositorSocket: env.DESKBAR_COMPOSITOR_SOCKET || s.compositorSocket || base.compositorSocket,
  };
}
