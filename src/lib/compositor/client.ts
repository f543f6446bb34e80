// src/lib/compositor/client.ts
import fs from 'node:fs';
import net from 'node:net';
import path from 'node:path';
import { z } from 'zod';
import type { WorkspaceInfo } from '../bus.js';
import { BackendError, errorMessage } from '../errors.js';
import { readLines } from '../ipc/lines.js';
import { runtimeDir, type Env } from '../ipc/paths.js';
import { Mutex } from '../lock.js';
import type { Logger } from '../logger.js';
import { BackendControl, type ControlOptions } from '../backend/control.js';
import {
  byOutputAndIndex,
  Methods,
  RpcResponseSchema,
  WorkspacesResultSchema,
  focusWorkspace,
  request,
  toWorkspaceInfo,
  type CompositorWorkspace,
  type RpcRequest,
  type RpcResponse,
} from './protocol.js';

/**
 * `$XDG_RUNTIME_DIR/niri/niri-$WAYLAND_DISPLAY.sock`, else any `*.sock` in
 * that directory. Null when the compositor is not running.
 */
export function findCompositorSocket(env: Env = process.env): string | null {
  const dir = path.join(runtimeDir(env), 'niri');
  const display = env.WAYLAND_DISPLAY || 'wayland-0';
  const conventional = path.join(dir, `niri-${display}.sock`);
  if (fs.existsSync(conventional)) return conventional;
  let entries: string[];
  try {
    entries = fs.readdirSync(dir);
  } catch {
    return null;
  }
  const any = entries.filter(n => n.endsWith('.sock')).sort()[0];
  return any ? path.join(dir, any) : null;
}

type Pending = {
  id: number;
  resolve: (r: RpcResponse) => void;
  reject: (e: Error) => void;
};

const MAX_LINE = 4 * 1024 * 1024;

/** One socket, one request in flight, replies matched by id. */
class RpcLink {
  private pending: Pending | null = null;
  private closed = false;

  constructor(private readonly socket: net.Socket, private readonly log: Logger) {
    readLines(socket, {
      line: line => this.onLine(line),
      end: overflowed => {
        if (!overflowed) return;
        this.fail(new Error('compositor reply exceeds size limit'));
        this.close();
      },
    }, MAX_LINE);
    socket.on('error', err => this.fail(err));
    socket.on('close', () => this.fail(new Error('compositor socket closed')));
  }

  send(req: RpcRequest): Promise<RpcResponse> {
    if (this.closed) return Promise.reject(new Error('compositor socket closed'));
    if (this.pending) return Promise.reject(new Error(`request ${this.pending.id} still in flight`));
    return new Promise<RpcResponse>((resolve, reject) => {
      this.pending = { id: req.id, resolve, reject };
      this.socket.write(JSON.stringify(req) + '\n', err => {
        if (err) this.fail(err);
      });
    });
  }

  close(): void {
    this.closed = true;
    this.socket.destroy();
  }

  private onLine(line: string) {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      this.settle(p => p.reject(BackendError.protocol('compositor', `unparseable reply: ${errorMessage(err)}`)));
      return;
    }
    const parsed = RpcResponseSchema.safeParse(json);
    if (!parsed.success) {
      this.settle(p => p.reject(BackendError.protocol('compositor', 'reply is not a JSON-RPC response')));
      return;
    }
    const res = parsed.data;
    const p = this.pending;
    if (!p || res.id !== p.id) {
      // a reply to a request that already timed out
      this.log.debug(`discarding reply id=${res.id}${p ? ` (waiting for ${p.id})` : ''}`);
      return;
    }
    this.settle(q => q.resolve(res));
  }

  private settle(fn: (p: Pending) => void) {
    const p = this.pending;
    this.pending = null;
    if (p) fn(p);
  }

  private fail(err: Error) {
    this.closed = true;
    this.settle(p => p.reject(err));
  }
}

export type CompositorState = {
  workspaces: readonly WorkspaceInfo[];
  version: string | null;
};

export type CompositorOptions = ControlOptions & {
  /** Fixed socket path; otherwise discovered from the environment. */
  socketPath?: string | null;
  env?: Env;
};

/** JSON-RPC client for the compositor's IPC socket. */
export class CompositorClient extends BackendControl<CompositorState, RpcLink> {
  private nextId = 1;
  private readonly serial = new Mutex();
  private readonly socketPath: string | null;
  private readonly env: Env;

  constructor(opts: CompositorOptions) {
    super('compositor', { workspaces: [], version: null }, opts);
    this.socketPath = opts.socketPath ?? null;
    this.env = opts.env ?? process.env;
  }

  protected open(): Promise<RpcLink> {
    const target = this.socketPath ?? findCompositorSocket(this.env);
    if (target === null) return Promise.reject(new Error('Could not find compositor socket. Is niri running?'));
    return new Promise<RpcLink>((resolve, reject) => {
      const socket = net.createConnection(target);
      const onError = (err: Error) => reject(err);
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        this.log.info(`connected to ${target}`);
        resolve(new RpcLink(socket, this.log));
      });
    });
  }

  protected async release(link: RpcLink): Promise<void> {
    link.close();
  }

  /** Sends one request and returns its `result`; error replies become protocol errors. */
  async call(method: string, params?: unknown): Promise<unknown> {
    return this.serial.run(() =>
      this.withHandle(method, async link => {
        const id = this.nextId++;
        const res = await link.send(request(id, method, params));
        if (res.error) {
          throw BackendError.protocol(this.name, `compositor error: ${res.error.message} (code: ${res.error.code})`);
        }
        return res.result;
      }),
    );
  }

  async getWorkspaces(): Promise<CompositorWorkspace[]> {
    const result = WorkspacesResultSchema.safeParse(await this.call(Methods.workspaces));
    if (!result.success) throw BackendError.protocol(this.name, 'malformed workspaces result');
    const workspaces = [...result.data.workspaces].sort(byOutputAndIndex);
    await this.store(s => ({ ...s, workspaces: workspaces.map(toWorkspaceInfo) }));
    return workspaces;
  }

  /** Focus by index (number) or by name (string). */
  async focusWorkspace(target: number | string): Promise<void> {
    await this.call(Methods.action, focusWorkspace(target));
  }

  async getVersion(): Promise<string> {
    const result = z.string().safeParse(await this.call(Methods.version));
    if (!result.success) throw BackendError.protocol(this.name, 'version is not a string');
    await this.store(s => ({ ...s, version: result.data }));
    return result.data;
  }
}
