// src/lib/ipc/server.ts
import fs from 'node:fs';
import net from 'node:net';
import path from 'node:path';
import type { AppState } from '../appState.js';
import { describeAction, type PowerAction } from '../backend/power.js';
import { DEFAULT_STEP } from '../config.js';
import { errorCode, errorMessage } from '../errors.js';
import { LOG } from '../logger.js';
import { VERSION } from '../version.js';
import { readLines } from './lines.js';
import {
  encode,
  parseCommand,
  Responses,
  type BrightnessAction,
  type Command,
  type Response,
  type VolumeAction,
} from './protocol.js';

const log = LOG.tag('ipc');

export const MAX_LINE_BYTES = 64 * 1024;

export type CommandServerOptions = {
  state: AppState;
  socketPath: string;
  /** Clients silent for this long are disconnected. */
  idleTimeoutMs?: number;
  volumeStep?: number;
  brightnessStep?: number;
  version?: string;
};

/**
 * Line-oriented command socket. Every line a client sends is one request and
 * gets exactly one response line, in order; clients never block each other.
 */
export class CommandServer {
  private readonly state: AppState;
  private readonly socketPath: string;
  private readonly idleTimeoutMs: number;
  private readonly volumeStep: number;
  private readonly brightnessStep: number;
  private readonly version: string;
  private server: net.Server | null = null;
  private readonly clients = new Set<net.Socket>();

  constructor(opts: CommandServerOptions) {
    this.state = opts.state;
    this.socketPath = opts.socketPath;
    this.idleTimeoutMs = opts.idleTimeoutMs ?? 30_000;
    this.volumeStep = opts.volumeStep ?? DEFAULT_STEP;
    this.brightnessStep = opts.brightnessStep ?? DEFAULT_STEP;
    this.version = opts.version ?? VERSION;
  }

  async listen(): Promise<void> {
    if (this.server) return;
    await fs.promises.mkdir(path.dirname(this.socketPath), { recursive: true });
    await removeStale(this.socketPath);

    const server = net.createServer({ allowHalfOpen: true }, socket => this.accept(socket));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.socketPath, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', err => log.error(`server error: ${errorMessage(err)}`));
    this.server = server;
    log.info(`listening on ${this.socketPath}`);
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    for (const c of this.clients) c.destroy();
    this.clients.clear();
    await new Promise<void>(resolve => server.close(() => resolve()));
    await removeStale(this.socketPath);
    log.info('closed');
  }

  /** Maps one command to its response. Never throws. */
  async dispatch(command: Command): Promise<Response> {
    try {
      return await this.route(command);
    } catch (err) {
      log.error(`${command.type} failed unexpectedly: ${errorMessage(err)}`);
      return Responses.error(errorMessage(err));
    }
  }

  /** Parses and dispatches one raw line. */
  async handleLine(line: string): Promise<Response> {
    const parsed = parseCommand(line);
    if (!parsed.ok) {
      log.debug(`rejected line: ${parsed.error}`);
      return Responses.error(`Invalid command: ${parsed.error}`);
    }
    log.debug(`command ${parsed.value.type}`);
    return this.dispatch(parsed.value);
  }

  private accept(socket: net.Socket) {
    this.clients.add(socket);
    socket.setTimeout(this.idleTimeoutMs);

    let chain: Promise<void> = Promise.resolve();
    const then = (step: () => void | Promise<void>) => {
      chain = chain.then(step).catch(err => log.warn(`client write failed: ${errorMessage(err)}`));
    };

    readLines(socket, {
      line: line => then(async () => {
        const res = await this.handleLine(line);
        if (!socket.destroyed && socket.writable) socket.write(encode(res));
      }),
      // The client may half-close right after its last line; answer it before ending.
      end: overflowed => {
        if (overflowed) log.warn(`client line over ${MAX_LINE_BYTES} bytes, disconnecting`);
        then(() => {
          if (socket.destroyed) return;
          if (overflowed) socket.end(encode(Responses.error(`Command exceeds ${MAX_LINE_BYTES} bytes`)));
          else socket.end();
        });
      },
    }, MAX_LINE_BYTES);

    socket.on('timeout', () => {
      log.debug('idle client disconnected');
      socket.destroy();
    });
    socket.on('error', err => log.debug(`client error: ${errorMessage(err)}`));
    socket.on('close', () => this.clients.delete(socket));
  }

  private async route(command: Command): Promise<Response> {
    switch (command.type) {
      case 'show-popup':
        log.info(`showing ${command.popup} popup`);
        this.state.popups.show(command.popup);
        return Responses.success(`Showing ${command.popup} popup`);
      case 'hide-popup':
        log.info(`hiding ${command.popup} popup`);
        this.state.popups.hide(command.popup);
        return Responses.success(`Hiding ${command.popup} popup`);
      case 'toggle-popup':
        log.info(`toggling ${command.popup} popup`);
        this.state.popups.toggle(command.popup);
        return Responses.success(`Toggling ${command.popup} popup`);
      case 'volume':
        return this.volume(command.action);
      case 'brightness':
        return this.brightness(command.action);
      case 'power':
        return this.power(command.action);
      case 'status':
        return Responses.status(this.version, this.state.uptimeSeconds());
      case 'ping':
        return Responses.pong();
    }
  }

  private async volume(action: VolumeAction): Promise<Response> {
    const slot = this.state.audio;
    if (slot.kind === 'absent') return Responses.error('Audio control not available');
    const audio = slot.control;
    try {
      switch (action.action) {
        case 'up': await audio.increaseVolume(action.amount ?? this.volumeStep); break;
        case 'down': await audio.decreaseVolume(action.amount ?? this.volumeStep); break;
        case 'set': await audio.setVolume(action.level); break;
        case 'mute': await audio.setMute(true); break;
        case 'unmute': await audio.setMute(false); break;
        case 'toggle-mute': await audio.toggleMute(); break;
      }
    } catch (err) {
      return Responses.error(`Failed to adjust volume: ${errorMessage(err)}`);
    }
    return Responses.success('Volume adjusted');
  }

  private async brightness(action: BrightnessAction): Promise<Response> {
    const slot = this.state.backlight;
    if (slot.kind === 'absent') return Responses.error('Backlight control not available');
    const backlight = slot.control;
    try {
      switch (action.action) {
        case 'up': await backlight.increaseBrightness(action.amount ?? this.brightnessStep); break;
        case 'down': await backlight.decreaseBrightness(action.amount ?? this.brightnessStep); break;
        case 'set': await backlight.setBrightness(action.level); break;
      }
    } catch (err) {
      return Responses.error(`Failed to adjust brightness: ${errorMessage(err)}`);
    }
    return Responses.success('Brightness adjusted');
  }

  private async power(action: PowerAction): Promise<Response> {
    const slot = this.state.power;
    if (slot.kind === 'absent') return Responses.error('Power control not available');
    try {
      await slot.control.execute(action);
    } catch (err) {
      return Responses.error(errorMessage(err));
    }
    return Responses.success(`${describeAction(action)} requested`);
  }
}

async function removeStale(file: string): Promise<void> {
  try {
    await fs.promises.unlink(file);
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') throw err;
  }
}
