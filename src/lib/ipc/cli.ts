// src/lib/ipc/cli.ts
import type { PopupKind } from '../bus.js';
import { isPowerAction } from '../backend/power.js';
import type { BrightnessAction, Command, Response, VolumeAction } from './protocol.js';

export const USAGE = `Usage: deskctl <command>

Commands:
  popup show|hide|toggle <bluetooth|bt|wifi|network|media-control|media|power>
  volume up|down [--amount N] | set <N> | mute | unmute | toggle-mute
  brightness up|down [--amount N] | set <N>
  power shutdown|reboot|suspend|hibernate|lock
  status
  ping`;

export type CliParse =
  | { kind: 'command'; command: Command }
  | { kind: 'help' }
  | { kind: 'usage-error'; message: string };

const POPUP_ALIASES: Record<string, PopupKind> = {
  bluetooth: 'bluetooth',
  bt: 'bluetooth',
  wifi: 'wifi',
  network: 'wifi',
  'media-control': 'media-control',
  media: 'media-control',
  power: 'power',
};

class UsageError extends Error {}

function popupOf(raw: string | undefined): PopupKind {
  if (raw === undefined) throw new UsageError('missing popup type');
  const kind = POPUP_ALIASES[raw.toLowerCase()];
  if (!kind) throw new UsageError(`Invalid popup type: ${raw}. Valid types: bluetooth, wifi, media-control, power`);
  return kind;
}

function numberOf(raw: string | undefined, what: string): number {
  const n = raw === undefined || raw.trim() === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(n)) throw new UsageError(`${what} must be a number, got ${raw ?? 'nothing'}`);
  return n;
}

/** `--amount N`, `--amount=N` or `-a N` after an up/down step. */
function amountOf(rest: string[]): number | undefined {
  if (rest.length === 0) return undefined;
  const [flag, value] = rest;
  if (flag?.startsWith('--amount=')) return numberOf(flag.slice('--amount='.length), 'amount');
  if ((flag === '--amount' || flag === '-a') && rest.length === 2) return numberOf(value, 'amount');
  throw new UsageError(`unexpected arguments: ${rest.join(' ')}`);
}

function noMore(rest: string[]) {
  if (rest.length > 0) throw new UsageError(`unexpected arguments: ${rest.join(' ')}`);
}

function stepOf(verb: string | undefined, rest: string[]): BrightnessAction {
  switch (verb) {
    case 'up': return { action: 'up', amount: amountOf(rest) };
    case 'down': return { action: 'down', amount: amountOf(rest) };
    case 'set': {
      const [level, ...extra] = rest;
      noMore(extra);
      return { action: 'set', level: numberOf(level, 'level') };
    }
    default: throw new UsageError(`unknown action: ${verb ?? '(none)'}`);
  }
}

function volumeOf(verb: string | undefined, rest: string[]): VolumeAction {
  switch (verb) {
    case 'mute':
    case 'unmute':
    case 'toggle-mute':
      noMore(rest);
      return { action: verb };
    default:
      return stepOf(verb, rest);
  }
}

/** Maps `deskctl` arguments (without node and script) to a wire command. */
export function parseCliArgs(argv: readonly string[]): CliParse {
  const [group, verb, ...rest] = argv;
  if (group === undefined || group === '--help' || group === '-h' || group === 'help') return { kind: 'help' };
  try {
    switch (group) {
      case 'popup': {
        const [popup, ...extra] = rest;
        noMore(extra);
        const kind = popupOf(popup);
        if (verb === 'show') return { kind: 'command', command: { type: 'show-popup', popup: kind } };
        if (verb === 'hide') return { kind: 'command', command: { type: 'hide-popup', popup: kind } };
        if (verb === 'toggle') return { kind: 'command', command: { type: 'toggle-popup', popup: kind } };
        throw new UsageError(`unknown popup action: ${verb ?? '(none)'}`);
      }
      case 'volume':
        return { kind: 'command', command: { type: 'volume', action: volumeOf(verb, rest) } };
      case 'brightness':
        return { kind: 'command', command: { type: 'brightness', action: stepOf(verb, rest) } };
      case 'power':
        noMore(rest);
        if (verb === undefined || !isPowerAction(verb)) throw new UsageError(`unknown power action: ${verb ?? '(none)'}`);
        return { kind: 'command', command: { type: 'power', action: verb } };
      case 'status':
      case 'ping':
        noMore(verb === undefined ? rest : [verb, ...rest]);
        return { kind: 'command', command: { type: group } };
      default:
        throw new UsageError(`unknown command: ${group}`);
    }
  } catch (err) {
    if (err instanceof UsageError) return { kind: 'usage-error', message: err.message };
    throw err;
  }
}

export type CliOutput = { stdout: string[]; stderr: string[]; exitCode: 0 | 1 };

export function formatResponse(res: Response): CliOutput {
  switch (res.status) {
    case 'success':
      return { stdout: [`✓ ${res.message ?? 'Success'}`], stderr: [], exitCode: 0 };
    case 'error':
      return { stdout: [], stderr: [`✗ Error: ${res.message}`], exitCode: 1 };
    case 'status':
      return {
        stdout: ['Deskbar Desktop Shell', `Version: ${res.version}`, `Uptime: ${res.uptime} seconds`],
        stderr: [],
        exitCode: 0,
      };
    case 'pong':
      return { stdout: ['✓ Pong! Server is alive.'], stderr: [], exitCode: 0 };
  }
}
