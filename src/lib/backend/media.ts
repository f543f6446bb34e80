// src/lib/backend/media.ts
import { z } from 'zod';
import { BackendError } from '../errors.js';
import { readPropertyOr, DbusControl, type BusConnection, type DbusControlOptions } from './dbus.js';

const DBUS = 'org.freedesktop.DBus';
const DBUS_PATH = '/org/freedesktop/DBus';
const MPRIS_PREFIX = 'org.mpris.MediaPlayer2.';
const MPRIS_PATH = '/org/mpris/MediaPlayer2';
const ROOT_IFACE = 'org.mpris.MediaPlayer2';
const PLAYER_IFACE = 'org.mpris.MediaPlayer2.Player';

export type PlaybackStatus = 'Playing' | 'Paused' | 'Stopped';

export type MediaPlayer = {
  /** Bus name without the MPRIS prefix, e.g. `spotify`. */
  name: string;
  busName: string;
  identity: string;
};

export type TrackMetadata = {
  title: string;
  artist: string;
  album: string | null;
  artUrl: string | null;
  trackId: string | null;
};

export type MediaState = {
  players: readonly MediaPlayer[];
  activePlayer: string | null;
  playback: PlaybackStatus;
  track: TrackMetadata | null;
  volume: number;
};

export type TransportAction = 'Play' | 'Pause' | 'PlayPause' | 'Stop' | 'Next' | 'Previous';

const metadataSchema = z.object({
  'xesam:title': z.string().optional(),
  'xesam:artist': z.union([z.string(), z.array(z.string())]).optional(),
  'xesam:album': z.string().optional(),
  'mpris:artUrl': z.string().optional(),
  'mpris:trackid': z.string().optional(),
});

export function parseMetadata(raw: unknown): TrackMetadata | null {
  const parsed = metadataSchema.safeParse(raw);
  if (!parsed.success) return null;
  const m = parsed.data;
  const artist = m['xesam:artist'];
  return {
    title: m['xesam:title'] || 'Unknown',
    artist: (Array.isArray(artist) ? artist[0] : artist) || 'Unknown',
    album: m['xesam:album'] || null,
    artUrl: m['mpris:artUrl'] || null,
    trackId: m['mpris:trackid'] || null,
  };
}

export function playbackStatus(raw: string): PlaybackStatus {
  return raw === 'Playing' || raw === 'Paused' ? raw : 'Stopped';
}

function clampUnit(v: number): number {
  if (Number.isNaN(v)) return 0;
  return Math.min(1, Math.max(0, v));
}

function sameTrack(a: TrackMetadata | null, b: TrackMetadata | null): boolean {
  if (a === null || b === null) return a === b;
  return a.title === b.title && a.artist === b.artist && a.album === b.album && a.trackId === b.trackId;
}

/** MPRIS players on the session bus; controls whichever one is active. */
export class MediaControl extends DbusControl<MediaState> {
  constructor(opts: DbusControlOptions) {
    super('media', 'session', {
      players: [],
      activePlayer: null,
      playback: 'Stopped',
      track: null,
      volume: 1.0,
    }, opts);
  }

  protected async afterConnect(_conn: BusConnection, sync: boolean): Promise<void> {
    if (sync) await this.discoverPlayers();
  }

  /** Lists MPRIS names; keeps the active player if it is still there, else picks the first. */
  async discoverPlayers(): Promise<readonly MediaPlayer[]> {
    const players = await this.withHandle('list players', async conn => {
      const dbus = await conn.proxy(DBUS, DBUS_PATH);
      const names = z.array(z.string()).safeParse(await dbus.call(DBUS, 'ListNames'));
      if (!names.success) throw new Error('ListNames: unexpected reply');
      const found: MediaPlayer[] = [];
      for (const busName of names.data.filter(n => n.startsWith(MPRIS_PREFIX)).sort()) {
        const root = await conn.proxy(busName, MPRIS_PATH);
        const name = busName.slice(MPRIS_PREFIX.length);
        const identity = await readPropertyOr(root, ROOT_IFACE, 'Identity', z.string(), name);
        found.push({ name, busName, identity });
      }
      return found;
    });
    this.log.info(`discovered ${players.length} media players`);
    const before = this.read().activePlayer;
    const active = players.some(p => p.busName === before) ? before : players[0]?.busName ?? null;
    await this.store(s => ({ ...s, players, activePlayer: active }));
    if (active !== before) this.publish({ type: 'media/player', player: active });
    if (active !== null) await this.refresh();
    return players;
  }

  async setActivePlayer(busName: string): Promise<void> {
    const known = this.read().players.find(p => p.busName === busName || p.name === busName);
    if (!known) throw BackendError.protocol(this.name, `unknown media player: ${busName}`);
    await this.store(s => ({ ...s, activePlayer: known.busName }));
    this.publish({ type: 'media/player', player: known.busName });
    await this.refresh();
  }

  /** Reads playback, metadata and volume of the active player. */
  async refresh(): Promise<Readonly<MediaState>> {
    const player = this.requirePlayer();
    const next = await this.withHandle('read player', async conn => {
      const p = await conn.proxy(player, MPRIS_PATH);
      const [status, metadata, volume] = await Promise.all([
        readPropertyOr(p, PLAYER_IFACE, 'PlaybackStatus', z.string(), 'Stopped'),
        readPropertyOr(p, PLAYER_IFACE, 'Metadata', z.unknown(), null),
        readPropertyOr(p, PLAYER_IFACE, 'Volume', z.number(), 1.0),
      ]);
      return { playback: playbackStatus(status), track: parseMetadata(metadata), volume: clampUnit(volume) };
    });
    const before = this.read();
    const after = await this.store(s => ({ ...s, ...next }));
    if (before.playback !== after.playback) this.publish({ type: 'media/playback', playing: after.playback === 'Playing' });
    if (after.track && !sameTrack(before.track, after.track)) {
      const { title, artist, album } = after.track;
      this.publish({ type: 'media/track', title, artist, album });
    }
    return after;
  }

  play() { return this.transport('Play'); }
  pause() { return this.transport('Pause'); }
  playPause() { return this.transport('PlayPause'); }
  stop() { return this.transport('Stop'); }
  next() { return this.transport('Next'); }
  previous() { return this.transport('Previous'); }

  /** Player volume in [0, 1]. */
  setVolume(volume: number): Promise<Readonly<MediaState>> {
    return this.commit('set player volume', s => ({ ...s, volume: clampUnit(volume) }), {
      push: async (conn, s) => {
        const p = await conn.proxy(this.requirePlayer(), MPRIS_PATH);
        await p.setProperty(PLAYER_IFACE, 'Volume', 'd', s.volume);
      },
      event: s => ({ type: 'media/volume', volume: s.volume }),
    });
  }

  private async transport(action: TransportAction): Promise<void> {
    const player = this.requirePlayer();
    await this.withHandle(action, async conn => {
      const p = await conn.proxy(player, MPRIS_PATH);
      await p.call(PLAYER_IFACE, action);
    });
    await this.refresh();
  }

  private requirePlayer(): string {
    const active = this.read().activePlayer;
    if (active === null) throw BackendError.unavailable(this.name, 'No active media player');
    return active;
  }
}
