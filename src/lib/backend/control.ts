// src/lib/backend/control.ts
import type { EventBus, ShellEvent } from '../bus.js';
import { BackendError, errorMessage } from '../errors.js';
import { Mutex, RwLock } from '../lock.js';
import { LOG, type Logger } from '../logger.js';
import { TimeoutError, withTimeout } from '../timeout.js';

export type ConnectionStatus = 'unconnected' | 'connecting' | 'connected';

export type ControlOptions = {
  bus: EventBus;
  /** Bound on establishing the connection. */
  connectTimeoutMs?: number;
  /** Bound on each external call once connected. */
  callTimeoutMs?: number;
};

type Commit<TState, THandle> = {
  /** Best-effort write of the latest state to the external service; failures are logged only. */
  push?: (handle: THandle, state: Readonly<TState>) => Promise<void>;
  event?: (state: Readonly<TState>) => ShellEvent | null;
};

export function clampPercent(v: number): number {
  if (Number.isNaN(v)) return 0;
  return Math.min(100, Math.max(0, v));
}

/**
 * Shared shape of every subsystem adapter: a cached snapshot that is always
 * readable, an optional connection established lazily, and mutations that
 * land in the cache first and publish one event each.
 */
export abstract class BackendControl<TState extends object, THandle> {
  protected readonly log: Logger;
  protected readonly bus: EventBus;
  protected readonly connectTimeoutMs: number;
  protected readonly callTimeoutMs: number;

  private state: Readonly<TState>;
  private handle: THandle | null = null;
  private connecting: Promise<void> | null = null;
  private readonly connLock = new RwLock();
  private readonly cacheLock = new RwLock();
  private readonly pushes = new Mutex();

  protected constructor(readonly name: string, initial: TState, opts: ControlOptions) {
    this.log = LOG.tag(name);
    this.bus = opts.bus;
    this.connectTimeoutMs = opts.connectTimeoutMs ?? 3000;
    this.callTimeoutMs = opts.callTimeoutMs ?? 5000;
    this.state = Object.freeze({ ...initial });
  }

  /** Last known state. Never touches the external service. */
  read(): Readonly<TState> {
    return this.state;
  }

  isAvailable(): boolean {
    return this.handle !== null;
  }

  status(): ConnectionStatus {
    if (this.handle !== null) return 'connected';
    return this.connecting ? 'connecting' : 'unconnected';
  }

  /**
   * Establishes the connection. A no-op when connected; concurrent callers
   * share one attempt. Throws a connection BackendError on failure or timeout.
   */
  connect(): Promise<void> {
    return this.ensureConnected(true);
  }

  private async ensureConnected(sync: boolean): Promise<void> {
    if (this.handle !== null) return;
    if (this.connecting) return this.connecting;
    const attempt = this.establish(sync);
    this.connecting = attempt;
    try {
      await attempt;
    } finally {
      this.connecting = null;
    }
  }

  async disconnect(): Promise<void> {
    const h = await this.connLock.write(() => {
      const current = this.handle;
      this.handle = null;
      return current;
    });
    if (h !== null) await this.releaseQuietly(h);
  }

  /** Opens the external connection. */
  protected abstract open(): Promise<THandle>;

  /**
   * Runs once per new connection. With `sync` false the connection was opened
   * to push a local change, and the cache must be left alone.
   * Failures are logged, not fatal.
   */
  protected async afterConnect(_handle: THandle, _sync: boolean): Promise<void> {}

  protected async release(_handle: THandle): Promise<void> {}

  /** Whether a failed call means the connection itself is gone. */
  protected isConnectionFailure(_err: unknown): boolean {
    return true;
  }

  protected publish(e: ShellEvent): void {
    this.bus.publish(e);
  }

  /**
   * Runs `fn` against the live connection, connecting first if needed.
   * A connection-level failure drops the handle so the next call reconnects.
   */
  protected async withHandle<R>(label: string, fn: (handle: THandle) => Promise<R>, reconnect = true): Promise<R> {
    if (this.handle === null && reconnect) await this.connect();
    const failed: { handle: THandle | null } = { handle: null };
    try {
      return await this.connLock.read(async () => {
        const h = this.handle;
        if (h === null) throw BackendError.connection(this.name, `${this.name} is not connected`);
        try {
          return await withTimeout(fn(h), this.callTimeoutMs, `${this.name} ${label}`);
        } catch (err) {
          if (err instanceof BackendError) throw err;
          if (err instanceof TimeoutError || this.isConnectionFailure(err)) failed.handle = h;
          throw BackendError.execution(this.name, `${label} failed: ${errorMessage(err)}`, err);
        }
      });
    } finally {
      if (failed.handle !== null) await this.drop(failed.handle);
    }
  }

  /** Like withHandle, but never throws; returns whether the call went through. */
  protected async propagate(label: string, fn: (handle: THandle) => Promise<void>, reconnect = true): Promise<boolean> {
    try {
      await this.withHandle(label, fn, reconnect);
      return true;
    } catch (err) {
      this.log.warn(`${label} not applied: ${errorMessage(err)}`);
      return false;
    }
  }

  /**
   * Exclusive read-modify-write of the cache that publishes exactly one event,
   * then a best-effort push. Pushes run one at a time, outside the cache lock,
   * each with the state current when it starts.
   */
  protected async commit(
    label: string,
    next: (current: Readonly<TState>) => TState,
    how: Commit<TState, THandle> = {},
  ): Promise<Readonly<TState>> {
    const { push, event } = how;
    const state = await this.cacheLock.write(() => {
      const updated: Readonly<TState> = Object.freeze(next(this.state));
      this.state = updated;
      const e = event?.(updated);
      if (e) this.publish(e);
      return updated;
    });
    if (push) await this.pushes.run(() => this.pushLatest(label, push));
    return state;
  }

  private async pushLatest(label: string, push: (handle: THandle, state: Readonly<TState>) => Promise<void>) {
    const offline = await this.tryConnect();
    if (offline !== null) {
      this.log.warn(`${label} not applied: ${offline}`);
      return;
    }
    await this.propagate(label, h => push(h, this.state), false);
  }

  /** Replaces the cache with values read from the service. */
  protected store(next: (current: Readonly<TState>) => TState): Promise<Readonly<TState>> {
    return this.cacheLock.write(() => {
      const state: Readonly<TState> = Object.freeze(next(this.state));
      this.state = state;
      return state;
    });
  }

  private async establish(sync: boolean): Promise<void> {
    const opening = this.open();
    let handle: THandle;
    try {
      handle = await withTimeout(opening, this.connectTimeoutMs, `${this.name} connect`);
    } catch (err) {
      if (err instanceof TimeoutError) {
        // the attempt may still finish; close whatever it yields
        void opening.then(
          h => this.releaseQuietly(h),
          late => this.log.debug(`late connect failure: ${errorMessage(late)}`),
        );
      }
      throw BackendError.connection(this.name, `${this.name} connection failed: ${errorMessage(err)}`, err);
    }
    await this.connLock.write(() => { this.handle = handle; });
    this.log.info('connected');
    try {
      await withTimeout(this.afterConnect(handle, sync), this.callTimeoutMs, `${this.name} initial sync`);
    } catch (err) {
      this.log.warn(`initial state not read: ${errorMessage(err)}`);
    }
  }

  /** Null once connected, else why not. Does not start a cache sync. */
  private async tryConnect(): Promise<string | null> {
    if (this.handle !== null) return null;
    try {
      await this.ensureConnected(false);
      return null;
    } catch (err) {
      return errorMessage(err);
    }
  }

  private async drop(h: THandle): Promise<void> {
    const dropped = await this.connLock.write(() => {
      if (this.handle !== h) return false;
      this.handle = null;
      return true;
    });
    if (!dropped) return;
    this.log.warn('connection lost, will reconnect on next use');
    await this.releaseQuietly(h);
  }

  private async releaseQuietly(h: THandle): Promise<void> {
    try {
      await this.release(h);
    } catch (err) {
      this.log.debug(`release failed: ${errorMessage(err)}`);
    }
  }
}
