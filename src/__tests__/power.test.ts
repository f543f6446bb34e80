import { describe, expect, it } from "vitest";
import { EventBus } from "../lib/bus.js";
import { describeAction, isPowerAction, PowerControl } from "../lib/backend/power.js";
import { FakeBus, RemoteError } from "./fakeBus.js";

const LOGIN1 = "org.freedesktop.login1";
const PATH = "/org/freedesktop/login1";
const MANAGER = "org.freedesktop.login1.Manager";
const SESSION_PATH = "/org/freedesktop/login1/session/_32";

function logind(): FakeBus {
  const fake = new FakeBus();
  fake
    .method(LOGIN1, PATH, `${MANAGER}.CanPowerOff`, () => "yes")
    .method(LOGIN1, PATH, `${MANAGER}.CanReboot`, () => "challenge")
    .method(LOGIN1, PATH, `${MANAGER}.CanSuspend`, () => "yes")
    .method(LOGIN1, PATH, `${MANAGER}.CanHibernate`, () => "na")
    .method(LOGIN1, PATH, `${MANAGER}.PowerOff`, () => undefined)
    .method(LOGIN1, PATH, `${MANAGER}.Suspend`, () => undefined)
    .method(LOGIN1, PATH, `${MANAGER}.LockSessions`, () => undefined)
    .method(LOGIN1, PATH, `${MANAGER}.GetSessionByPID`, () => SESSION_PATH)
    .method(LOGIN1, SESSION_PATH, "org.freedesktop.login1.Session.Lock", () => undefined);
  return fake;
}

describe("power actions", () => {
  it("recognises the five actions", () => {
    expect(["shutdown", "reboot", "suspend", "hibernate", "lock"].every(isPowerAction)).toBe(true);
    expect(isPowerAction("explode")).toBe(false);
    expect(describeAction("shutdown")).toBe("Shutdown");
  });
});

describe("PowerControl", () => {
  it("reads what logind allows on connect", async () => {
    const power = new PowerControl({ bus: new EventBus(4), openBus: async () => logind() });
    await power.connect();
    expect(power.read().capabilities).toEqual({
      shutdown: true,
      reboot: true,
      suspend: true,
      hibernate: false,
      lock: true,
    });
  });

  it("asks the login manager to power off, interactively", async () => {
    const fake = logind();
    const power = new PowerControl({ bus: new EventBus(4), openBus: async () => fake });
    await power.execute("shutdown");
    expect(fake.callsTo(`${MANAGER}.PowerOff`)[0]?.args).toEqual([true]);
    expect(power.read().lastAction).toBe("shutdown");
  });

  it("locks the caller's session", async () => {
    const fake = logind();
    const power = new PowerControl({ bus: new EventBus(4), openBus: async () => fake, pid: 4242 });
    await power.execute("lock");
    expect(fake.callsTo(`${MANAGER}.GetSessionByPID`)[0]?.args).toEqual([4242]);
    expect(fake.callsTo("org.freedesktop.login1.Session.Lock")).toHaveLength(1);
  });

  it("locks every session when the daemon has none", async () => {
    const fake = logind();
    fake.method(LOGIN1, PATH, `${MANAGER}.GetSessionByPID`, () => {
      throw new RemoteError("org.freedesktop.login1.NoSessionForPID");
    });
    const power = new PowerControl({ bus: new EventBus(4), openBus: async () => fake });
    await power.execute("lock");
    expect(fake.callsTo(`${MANAGER}.LockSessions`)).toHaveLength(1);
  });

  it("surfaces a refused action", async () => {
    const fake = logind();
    fake.method(LOGIN1, PATH, `${MANAGER}.Hibernate`, () => {
      throw new RemoteError("org.freedesktop.login1.SleepVerbNotSupported", "Sleep verb not supported");
    });
    const power = new PowerControl({ bus: new EventBus(4), openBus: async () => fake });
    await expect(power.execute("hibernate")).rejects.toThrow("Hibernate failed: Sleep verb not supported");
    expect(power.read().lastAction).toBeNull();
    expect(power.isAvailable()).toBe(true);
  });
});
