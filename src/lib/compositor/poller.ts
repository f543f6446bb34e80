// src/lib/compositor/poller.ts
import type { EventBus, ShellEvent } from '../bus.js';
import { errorMessage } from '../errors.js';
import { LOG } from '../logger.js';
import type { CompositorClient } from './client.js';
import { toWorkspaceInfo, type CompositorWorkspace } from './protocol.js';

const log = LOG.tag('compositor-poll');

/**
 * Events describing how `next` differs from `prev`. The first poll has no diff.
 * Workspaces are matched on the compositor's own id; events carry the index.
 */
export function diffWorkspaces(
  prev: readonly CompositorWorkspace[] | null,
  next: readonly CompositorWorkspace[],
): ShellEvent[] {
  const out: ShellEvent[] = [{ type: 'workspaces/updated', workspaces: next.map(toWorkspaceInfo) }];
  if (prev === null) return out;
  const before = new Set(prev.map(w => w.id));
  const after = new Set(next.map(w => w.id));
  for (const w of next) {
    if (!before.has(w.id)) out.push({ type: 'workspace/created', id: w.idx, name: w.name ?? null });
  }
  for (const w of prev) {
    if (!after.has(w.id)) out.push({ type: 'workspace/removed', id: w.idx });
  }
  const wasFocused = prev.find(w => w.is_focused);
  const nowFocused = next.find(w => w.is_focused);
  if (nowFocused && nowFocused.id !== wasFocused?.id) out.push({ type: 'workspace/changed', id: nowFocused.idx });
  return out;
}

export type WorkspacePollerOptions = {
  client: CompositorClient;
  bus: EventBus;
  intervalMs?: number;
};

/** Asks the compositor for workspaces on a fixed interval and republishes them. */
export class WorkspacePoller {
  private readonly client: CompositorClient;
  private readonly bus: EventBus;
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;
  private last: CompositorWorkspace[] | null = null;

  constructor(opts: WorkspacePollerOptions) {
    this.client = opts.client;
    this.bus = opts.bus;
    this.intervalMs = opts.intervalMs ?? 2000;
  }

  start(): void {
    if (this.timer) return;
    const tick = () => {
      if (this.inFlight) return;
      this.inFlight = true;
      this.pollOnce()
        .catch(err => log.error(`poll crashed: ${errorMessage(err)}`))
        .finally(() => {
          this.inFlight = false;
        });
    };
    this.timer = setInterval(tick, this.intervalMs);
    this.timer.unref?.();
    tick();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** One poll; returns whether it produced a workspace list. Failures are logged, never thrown. */
  async pollOnce(): Promise<boolean> {
    let workspaces: CompositorWorkspace[];
    try {
      workspaces = await this.client.getWorkspaces();
    } catch (err) {
      log.debug(`workspace poll failed: ${errorMessage(err)}`);
      return false;
    }
    for (const e of diffWorkspaces(this.last, workspaces)) this.bus.publish(e);
    this.last = workspaces;
    return true;
  }
}
