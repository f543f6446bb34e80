import fs from "node:fs";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EventBus, type ShellEvent } from "../lib/bus.js";
import { CompositorClient, findCompositorSocket } from "../lib/compositor/client.js";
import { diffWorkspaces, WorkspacePoller } from "../lib/compositor/poller.js";
import { focusWorkspace } from "../lib/compositor/protocol.js";
import { readLines } from "../lib/ipc/lines.js";
import { BackendError } from "../lib/errors.js";

type Ws = { id: number; idx: number; name: string | null; output?: string; is_active: boolean; is_focused: boolean };
type Req = { id: number; method: string; params?: unknown };

const ws = (idx: number, focused = false, name: string | null = null): Ws => ({
  id: 100 + idx,
  idx,
  name,
  is_active: focused,
  is_focused: focused,
});

/** Line-per-message JSON-RPC peer standing in for the compositor. */
class FakeCompositor {
  workspaces: Ws[] = [ws(1, true), ws(2)];
  readonly requests: Req[] = [];
  private readonly sockets = new Set<net.Socket>();
  private readonly server: net.Server;

  constructor(readonly socketPath: string, private readonly extra: (req: Req, send: (o: unknown) => void) => boolean = () => false) {
    this.server = net.createServer(socket => {
      this.sockets.add(socket);
      socket.on("close", () => this.sockets.delete(socket));
      readLines(socket, { line: line => this.reply(socket, JSON.parse(line)) });
    });
  }

  listen(): Promise<void> {
    return new Promise(resolve => this.server.listen(this.socketPath, () => resolve()));
  }

  dropClients() {
    for (const s of this.sockets) s.destroy();
  }

  close(): Promise<void> {
    this.dropClients();
    return new Promise(resolve => this.server.close(() => resolve()));
  }

  private reply(socket: net.Socket, req: Req) {
    this.requests.push(req);
    const send = (o: unknown) => socket.write(JSON.stringify(o) + "\n");
    if (this.extra(req, send)) return;
    const ok = (result: unknown) => send({ jsonrpc: "2.0", id: req.id, result });
    switch (req.method) {
      case "Workspaces": return ok({ workspaces: this.workspaces });
      case "Version": return ok("25.02");
      case "Action": return ok(null);
      default: return send({ jsonrpc: "2.0", id: req.id, error: { code: -32601, message: "Method not found" } });
    }
  }
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "deskbar-niri-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

async function setup(extra?: (req: Req, send: (o: unknown) => void) => boolean) {
  const fake = new FakeCompositor(path.join(dir, "niri.sock"), extra);
  await fake.listen();
  const bus = new EventBus(32);
  const client = new CompositorClient({ bus, socketPath: fake.socketPath });
  return { fake, bus, client };
}

describe("findCompositorSocket", () => {
  it("prefers the socket named after the Wayland display", () => {
    fs.mkdirSync(path.join(dir, "niri"));
    fs.writeFileSync(path.join(dir, "niri", "aaa.sock"), "");
    fs.writeFileSync(path.join(dir, "niri", "niri-wayland-1.sock"), "");
    expect(findCompositorSocket({ XDG_RUNTIME_DIR: dir, WAYLAND_DISPLAY: "wayland-1" })).toBe(
      path.join(dir, "niri", "niri-wayland-1.sock"),
    );
    expect(findCompositorSocket({ XDG_RUNTIME_DIR: dir, WAYLAND_DISPLAY: "wayland-9" })).toBe(
      path.join(dir, "niri", "aaa.sock"),
    );
  });

  it("returns null when the compositor is not running", () => {
    expect(findCompositorSocket({ XDG_RUNTIME_DIR: dir })).toBeNull();
  });
});

describe("CompositorClient", () => {
  it("stays unconnected when there is no socket", async () => {
    const client = new CompositorClient({ bus: new EventBus(4), env: { XDG_RUNTIME_DIR: dir } });
    await expect(client.connect()).rejects.toThrow("Could not find compositor socket. Is niri running?");
    expect(client.status()).toBe("unconnected");
  });

  it("lists workspaces with increasing request ids", async () => {
    const { fake, client } = await setup();
    const list = await client.getWorkspaces();
    expect(list.map(w => w.idx)).toEqual([1, 2]);
    expect(client.read().workspaces).toEqual([
      { id: 1, name: null, output: null, active: true, focused: true },
      { id: 2, name: null, output: null, active: false, focused: false },
    ]);
    expect(await client.getVersion()).toBe("25.02");
    expect(fake.requests.map(r => r.id)).toEqual([1, 2]);
    await client.disconnect();
    await fake.close();
  });

  it("focuses a workspace by index or name", async () => {
    const { fake, client } = await setup();
    await client.focusWorkspace(3);
    await client.focusWorkspace("mail");
    expect(fake.requests.map(r => r.params)).toEqual([focusWorkspace(3), focusWorkspace("mail")]);
    expect(focusWorkspace("mail")).toEqual({ action: { "focus-workspace": { reference: { name: "mail" } } } });
    await client.disconnect();
    await fake.close();
  });

  it("turns error replies into protocol errors", async () => {
    const { fake, client } = await setup();
    const err = await client.call("Nope").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendError);
    expect(err instanceof BackendError && err.kind).toBe("protocol");
    expect(err instanceof Error && err.message).toBe("compositor error: Method not found (code: -32601)");
    expect(client.isAvailable()).toBe(true);
    await client.disconnect();
    await fake.close();
  });

  it("skips replies whose id does not match the pending request", async () => {
    const { fake, client } = await setup((req, send) => {
      if (req.method !== "Version") return false;
      send({ jsonrpc: "2.0", id: req.id - 1, result: "stale" });
      send({ jsonrpc: "2.0", id: req.id, result: "fresh" });
      return true;
    });
    await client.getWorkspaces();
    expect(await client.getVersion()).toBe("fresh");
    await client.disconnect();
    await fake.close();
  });

  it("serialises concurrent callers on one connection", async () => {
    const { fake, client } = await setup();
    const [a, b, c] = await Promise.all([client.getVersion(), client.getVersion(), client.getVersion()]);
    expect([a, b, c]).toEqual(["25.02", "25.02", "25.02"]);
    expect(fake.requests.map(r => r.id)).toEqual([1, 2, 3]);
    await client.disconnect();
    await fake.close();
  });

  it("reconnects after the compositor drops the connection", async () => {
    const { fake, client } = await setup();
    await client.getVersion();
    fake.dropClients();
    await new Promise(r => setTimeout(r, 20));
    await expect(client.getVersion()).rejects.toThrow(BackendError);
    expect(client.isAvailable()).toBe(false);
    expect(await client.getVersion()).toBe("25.02");
    await client.disconnect();
    await fake.close();
  });
});

describe("diffWorkspaces", () => {
  const on = (output: string, id: number, idx: number, focused = false): Ws => ({
    id,
    idx,
    name: null,
    output,
    is_active: focused,
    is_focused: focused,
  });

  it("only reports the list on the first poll", () => {
    expect(diffWorkspaces(null, [ws(1, true)])).toEqual([
      { type: "workspaces/updated", workspaces: [{ id: 1, name: null, output: null, active: true, focused: true }] },
    ]);
  });

  it("reports created, removed and focus changes", () => {
    const events = diffWorkspaces([ws(1, true), ws(2)], [ws(2, true), ws(3, false, "mail")]);
    expect(events.slice(1)).toEqual([
      { type: "workspace/created", id: 3, name: "mail" },
      { type: "workspace/removed", id: 1 },
      { type: "workspace/changed", id: 2 },
    ]);
  });

  it("tells apart workspaces that share an index on different outputs", () => {
    const prev = [on("DP-1", 10, 1, true), on("DP-1", 11, 2), on("HDMI-1", 20, 1)];
    const next = [on("DP-1", 10, 1), on("HDMI-1", 20, 1, true), on("HDMI-1", 21, 2)];
    expect(diffWorkspaces(prev, next)).toEqual([
      {
        type: "workspaces/updated",
        workspaces: [
          { id: 1, name: null, output: "DP-1", active: false, focused: false },
          { id: 1, name: null, output: "HDMI-1", active: true, focused: true },
          { id: 2, name: null, output: "HDMI-1", active: false, focused: false },
        ],
      },
      { type: "workspace/created", id: 2, name: null },
      { type: "workspace/removed", id: 2 },
      { type: "workspace/changed", id: 1 },
    ]);
  });

  it("reports only the list when nothing changed", () => {
    const list = [on("DP-1", 10, 1, true), on("HDMI-1", 20, 1)];
    expect(diffWorkspaces(list, list)).toHaveLength(1);
  });
});

describe("WorkspacePoller", () => {
  it("publishes the workspaces and what changed between polls", async () => {
    const { fake, bus, client } = await setup();
    const rx = bus.subscribe();
    const poller = new WorkspacePoller({ client, bus, intervalMs: 60_000 });
    expect(await poller.pollOnce()).toBe(true);
    fake.workspaces = [ws(1), ws(2, true)];
    expect(await poller.pollOnce()).toBe(true);
    const seen: ShellEvent[] = [];
    for (let e = rx.tryRecv(); e; e = rx.tryRecv()) seen.push(e);
    expect(seen.map(e => e.type)).toEqual(["workspaces/updated", "workspaces/updated", "workspace/changed"]);
    expect(seen[2]).toEqual({ type: "workspace/changed", id: 2 });
    await client.disconnect();
    await fake.close();
  });

  it("lists workspaces by output, then index", async () => {
    const { fake, bus, client } = await setup();
    fake.workspaces = [
      { ...ws(2), id: 7, output: "HDMI-1" },
      { ...ws(1), id: 6, output: "HDMI-1" },
      { ...ws(1, true), id: 5, output: "DP-1" },
    ];
    const rx = bus.subscribe();
    const poller = new WorkspacePoller({ client, bus, intervalMs: 60_000 });
    await poller.pollOnce();
    const e = rx.tryRecv();
    expect(e?.type === "workspaces/updated" && e.workspaces.map(w => `${w.output}:${w.id}`)).toEqual([
      "DP-1:1",
      "HDMI-1:1",
      "HDMI-1:2",
    ]);
    await client.disconnect();
    await fake.close();
  });

  it("keeps polling after failures", async () => {
    const bus = new EventBus(8);
    const client = new CompositorClient({ bus, env: { XDG_RUNTIME_DIR: dir } });
    const poller = new WorkspacePoller({ client, bus, intervalMs: 60_000 });
    expect(await poller.pollOnce()).toBe(false);
    expect(await poller.pollOnce()).toBe(false);
    poller.start();
    expect(poller.running).toBe(true);
    poller.stop();
    expect(poller.running).toBe(false);
  });
});
