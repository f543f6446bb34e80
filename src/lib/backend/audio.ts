// src/lib/backend/audio.ts
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { DEFAULT_STEP } from '../config.js';
import { errorCode, errorMessage } from '../errors.js';
import { BackendControl, clampPercent, type ControlOptions } from './control.js';

const execFileAsync = promisify(execFile);

export type AudioState = {
  level: number;
  muted: boolean;
};

/** Runs an external program and resolves with its stdout. */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<string>;

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, [...args], { timeout: 4000, encoding: 'utf8' });
  return stdout;
};

const SINK = '@DEFAULT_SINK@';

/** First percentage in `pactl get-sink-volume` output. */
export function parseSinkVolume(out: string): number | null {
  const m = out.match(/(\d+(?:\.\d+)?)%/);
  return m?.[1] ? Number(m[1]) : null;
}

export function parseSinkMute(out: string): boolean | null {
  const m = out.match(/Mute:\s*(yes|no)/i);
  if (!m?.[1]) return null;
  return m[1].toLowerCase() === 'yes';
}

type AudioLink = { sink: string };

export type AudioOptions = ControlOptions & { run?: CommandRunner };

/** Default sink of the PulseAudio or PipeWire server, driven through pactl. */
export class AudioControl extends BackendControl<AudioState, AudioLink> {
  private readonly run: CommandRunner;

  constructor(opts: AudioOptions) {
    super('audio', { level: 50, muted: false }, opts);
    this.run = opts.run ?? runCommand;
  }

  protected async open(): Promise<AudioLink> {
    const sink = (await this.run('pactl', ['get-default-sink'])).trim();
    if (!sink) throw new Error('no default sink');
    return { sink };
  }

  protected async afterConnect(link: AudioLink, sync: boolean): Promise<void> {
    this.log.info(`default sink ${link.sink}`);
    if (sync) await this.refresh();
  }

  /** pactl missing or the sound server gone; a rejected command is not. */
  protected isConnectionFailure(err: unknown): boolean {
    return errorCode(err) === 'ENOENT' || /connection (failure|refused)/i.test(errorMessage(err));
  }

  /** Reads volume and mute back from the server. */
  async refresh(): Promise<Readonly<AudioState>> {
    const [vol, mute] = await this.withHandle('read volume', () =>
      Promise.all([
        this.run('pactl', ['get-sink-volume', SINK]),
        this.run('pactl', ['get-sink-mute', SINK]),
      ]),
    );
    const level = parseSinkVolume(vol);
    const muted = parseSinkMute(mute);
    const before = this.read();
    const after = await this.store(s => ({
      level: level === null ? s.level : clampPercent(level),
      muted: muted ?? s.muted,
    }));
    if (after.level !== before.level || after.muted !== before.muted) {
      this.publish({ type: 'audio/volume', level: after.level, muted: after.muted });
    }
    return after;
  }

  setVolume(level: number): Promise<Readonly<AudioState>> {
    return this.changeVolume('set volume', () => level);
  }

  increaseVolume(step: number = DEFAULT_STEP): Promise<Readonly<AudioState>> {
    return this.changeVolume('increase volume', s => s.level + step);
  }

  decreaseVolume(step: number = DEFAULT_STEP): Promise<Readonly<AudioState>> {
    return this.changeVolume('decrease volume', s => s.level - step);
  }

  setMute(muted: boolean): Promise<Readonly<AudioState>> {
    return this.commit('set mute', s => ({ ...s, muted }), {
      push: async (_, s) => { await this.run('pactl', ['set-sink-mute', SINK, s.muted ? '1' : '0']); },
      event: s => ({ type: 'audio/volume', level: s.level, muted: s.muted }),
    });
  }

  toggleMute(): Promise<Readonly<AudioState>> {
    return this.commit('toggle mute', s => ({ ...s, muted: !s.muted }), {
      push: async (_, s) => { await this.run('pactl', ['set-sink-mute', SINK, s.muted ? '1' : '0']); },
      event: s => ({ type: 'audio/volume', level: s.level, muted: s.muted }),
    });
  }

  private changeVolume(label: string, target: (s: Readonly<AudioState>) => number) {
    return this.commit(label, s => ({ ...s, level: clampPercent(target(s)) }), {
      push: async (_, s) => { await this.run('pactl', ['set-sink-volume', SINK, `${Math.round(s.level)}%`]); },
      event: s => ({ type: 'audio/volume', level: s.level, muted: s.muted }),
    });
  }
}
