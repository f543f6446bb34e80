import { describe, expect, it } from "vitest";
import { EventBus } from "../lib/bus.js";
import { BluetoothControl, devicePath, listDevices } from "../lib/backend/bluetooth.js";
import { BackendError } from "../lib/errors.js";
import { FakeBus } from "./fakeBus.js";

const BLUEZ = "org.bluez";
const ADAPTER = "org.bluez.Adapter1";
const DEVICE = "org.bluez.Device1";
const HCI = "/org/bluez/hci0";
const HEADSET = `${HCI}/dev_AA_BB_CC_DD_EE_01`;
const MOUSE = `${HCI}/dev_AA_BB_CC_DD_EE_02`;

function bluez(): FakeBus {
  const objects = {
    [HCI]: { [ADAPTER]: { Powered: true, Discovering: false, Address: "00:11:22:33:44:55" } },
    [HEADSET]: { [DEVICE]: { Address: "AA:BB:CC:DD:EE:01", Name: "Headset", Connected: false, Paired: true, Adapter: HCI } },
    [MOUSE]: { [DEVICE]: { Address: "AA:BB:CC:DD:EE:02", Alias: "Mouse", Connected: true, Paired: true, Adapter: HCI } },
  };
  const fake = new FakeBus();
  fake
    .method(BLUEZ, "/", "org.freedesktop.DBus.ObjectManager.GetManagedObjects", () => objects)
    .method(BLUEZ, HCI, `${ADAPTER}.StartDiscovery`, () => undefined)
    .method(BLUEZ, HCI, `${ADAPTER}.StopDiscovery`, () => undefined)
    .method(BLUEZ, HCI, `${ADAPTER}.RemoveDevice`, () => undefined)
    .method(BLUEZ, HEADSET, `${DEVICE}.Connect`, () => undefined)
    .method(BLUEZ, HEADSET, `${DEVICE}.Pair`, () => undefined)
    .method(BLUEZ, MOUSE, `${DEVICE}.Disconnect`, () => undefined);
  return fake;
}

async function connected() {
  const bus = new EventBus(16);
  const fake = bluez();
  const bt = new BluetoothControl({ bus, openBus: async () => fake });
  await bt.connect();
  return { bus, fake, bt };
}

describe("bluetooth helpers", () => {
  it("builds device object paths from addresses", () => {
    expect(devicePath(HCI, "aa:bb:cc:dd:ee:01")).toBe(HEADSET);
    expect(() => devicePath(HCI, "not-an-address")).toThrow(BackendError);
  });

  it("lists connected devices first, then by name", () => {
    const devices = listDevices(
      {
        [`${HCI}/dev_1`]: { [DEVICE]: { Address: "01:00:00:00:00:01", Name: "Zeta" } },
        [`${HCI}/dev_2`]: { [DEVICE]: { Address: "01:00:00:00:00:02", Name: "Alpha" } },
        [`${HCI}/dev_3`]: { [DEVICE]: { Address: "01:00:00:00:00:03", Connected: true } },
        ["/org/bluez/hci1/dev_4"]: { [DEVICE]: { Address: "01:00:00:00:00:04", Name: "Elsewhere" } },
      },
      HCI,
    );
    expect(devices.map(d => d.name)).toEqual(["01:00:00:00:00:03", "Alpha", "Zeta"]);
  });
});

describe("BluetoothControl", () => {
  it("reads the adapter and its devices on connect", async () => {
    const { bt } = await connected();
    expect(bt.adapter).toBe(HCI);
    expect(bt.read().powered).toBe(true);
    expect(bt.read().devices).toEqual([
      { address: "AA:BB:CC:DD:EE:02", name: "Mouse", connected: true, paired: true },
      { address: "AA:BB:CC:DD:EE:01", name: "Headset", connected: false, paired: true },
    ]);
  });

  it("toggles power optimistically", async () => {
    const { bt, bus, fake } = await connected();
    const rx = bus.subscribe();
    await bt.togglePowered();
    expect(bt.read().powered).toBe(false);
    expect(fake.callsTo(`${ADAPTER}.Powered=`)[0]?.args).toEqual([false]);
    expect(rx.tryRecv()).toEqual({ type: "bluetooth/state", enabled: false });
    expect(rx.tryRecv()).toBeNull();
  });

  it("connects a device and publishes it by name", async () => {
    const { bt, bus, fake } = await connected();
    const rx = bus.subscribe();
    await bt.connectDevice("aa:bb:cc:dd:ee:01");
    expect(fake.callsTo(`${DEVICE}.Connect`)[0]?.path).toBe(HEADSET);
    expect(rx.tryRecv()).toEqual({ type: "bluetooth/connected", address: "AA:BB:CC:DD:EE:01", name: "Headset" });
    expect(bt.read().devices.find(d => d.name === "Headset")?.connected).toBe(true);
  });

  it("disconnects a device", async () => {
    const { bt, bus } = await connected();
    const rx = bus.subscribe();
    await bt.disconnectDevice("AA:BB:CC:DD:EE:02");
    expect(rx.tryRecv()).toEqual({ type: "bluetooth/disconnected", address: "AA:BB:CC:DD:EE:02" });
  });

  it("surfaces a failed device call", async () => {
    const { bt, fake } = await connected();
    await expect(bt.pairDevice("AA:BB:CC:DD:EE:02")).rejects.toThrow("Pair failed");
    expect(fake.callsTo(`${DEVICE}.Pair`)).toHaveLength(1);
    expect(bt.isAvailable()).toBe(true);
  });

  it("removes a device from the cache", async () => {
    const { bt, bus, fake } = await connected();
    const rx = bus.subscribe();
    await bt.removeDevice("AA:BB:CC:DD:EE:01");
    expect(fake.callsTo(`${ADAPTER}.RemoveDevice`)[0]?.args).toEqual([HEADSET]);
    expect(bt.read().devices.map(d => d.address)).toEqual(["AA:BB:CC:DD:EE:02"]);
    expect(rx.tryRecv()).toEqual({
      type: "bluetooth/devices",
      devices: [{ address: "AA:BB:CC:DD:EE:02", name: "Mouse", connected: true, paired: true }],
    });
  });

  it("tracks discovery", async () => {
    const { bt } = await connected();
    await bt.startScan();
    expect(bt.read().discovering).toBe(true);
    await bt.stopScan();
    expect(bt.read().discovering).toBe(false);
  });
});
