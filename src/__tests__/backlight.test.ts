import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EventBus } from "../lib/bus.js";
import { BacklightControl, findBacklightDevice } from "../lib/backend/backlight.js";

let root: string;

function panel(name: string, max: number, current: number): string {
  const dir = path.join(root, name);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, "max_brightness"), `${max}\n`);
  fs.writeFileSync(path.join(dir, "brightness"), `${current}\n`);
  return dir;
}

const raw = (dir: string) => fs.readFileSync(path.join(dir, "brightness"), "utf8").trim();

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "deskbar-backlight-"));
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe("findBacklightDevice", () => {
  it("prefers the well-known panel drivers", () => {
    panel("acpi_video0", 100, 50);
    panel("intel_backlight", 1000, 500);
    expect(findBacklightDevice(root)).toBe(path.join(root, "intel_backlight"));
  });

  it("falls back to the first device by name", () => {
    panel("zz_panel", 10, 5);
    panel("aa_panel", 10, 5);
    expect(findBacklightDevice(root)).toBe(path.join(root, "aa_panel"));
  });

  it("returns null when there is no device", () => {
    expect(findBacklightDevice(root)).toBeNull();
    expect(findBacklightDevice(path.join(root, "missing"))).toBeNull();
  });
});

describe("BacklightControl", () => {
  it("reads the level as a share of max_brightness", async () => {
    const dir = panel("intel_backlight", 1000, 250);
    const light = new BacklightControl({ bus: new EventBus(8), device: dir });
    await light.connect();
    expect(light.read().level).toBe(25);
  });

  it("writes set levels scaled to max_brightness, clamped", async () => {
    const dir = panel("intel_backlight", 1200, 600);
    const light = new BacklightControl({ bus: new EventBus(8), device: dir });
    await light.connect();
    await light.setBrightness(150);
    expect(light.read().level).toBe(100);
    expect(raw(dir)).toBe("1200");
    await light.setBrightness(-10);
    expect(light.read().level).toBe(0);
    expect(raw(dir)).toBe("0");
    await light.setBrightness(33);
    expect(raw(dir)).toBe("396");
  });

  it("steps up and down and publishes one event each", async () => {
    const dir = panel("intel_backlight", 100, 75);
    const bus = new EventBus(8);
    const light = new BacklightControl({ bus, device: dir });
    await light.connect();
    const rx = bus.subscribe();
    await light.increaseBrightness(10);
    await light.decreaseBrightness(20);
    expect(rx.tryRecv()).toEqual({ type: "backlight/brightness", level: 85 });
    expect(rx.tryRecv()).toEqual({ type: "backlight/brightness", level: 65 });
    expect(rx.tryRecv()).toBeNull();
    expect(raw(dir)).toBe("65");
  });

  it("keeps the panel after a refused write and steps from the cached level", async () => {
    const dir = panel("intel_backlight", 100, 75);
    const bus = new EventBus(8);
    const light = new BacklightControl({ bus, device: dir });
    await light.connect();
    fs.rmSync(path.join(dir, "brightness"));
    fs.mkdirSync(path.join(dir, "brightness"));
    const rx = bus.subscribe();
    await light.setBrightness(40);
    expect(light.status()).toBe("connected");
    await light.increaseBrightness(5);
    expect(light.read().level).toBe(45);
    expect(rx.tryRecv()).toEqual({ type: "backlight/brightness", level: 40 });
    expect(rx.tryRecv()).toEqual({ type: "backlight/brightness", level: 45 });
    expect(rx.tryRecv()).toBeNull();
  });

  it("drops the panel when the device disappears", async () => {
    const dir = panel("intel_backlight", 100, 75);
    const light = new BacklightControl({ bus: new EventBus(8), device: dir });
    await light.connect();
    fs.rmSync(dir, { recursive: true });
    await light.setBrightness(40);
    expect(light.read().level).toBe(40);
    expect(light.status()).toBe("unconnected");
  });

  it("refuses a device with no usable max_brightness", async () => {
    const dir = panel("broken", 0, 0);
    const light = new BacklightControl({ bus: new EventBus(8), device: dir });
    await expect(light.connect()).rejects.toThrow("backlight connection failed");
    await light.setBrightness(40);
    expect(light.read().level).toBe(40);
  });
});
