// src/lib/backend/power.ts
import { z } from 'zod';
import { remoteErrorName, DbusControl, type BusConnection, type DbusControlOptions } from './dbus.js';

const LOGIN1 = 'org.freedesktop.login1';
const LOGIN1_PATH = '/org/freedesktop/login1';
const MANAGER_IFACE = 'org.freedesktop.login1.Manager';
const SESSION_IFACE = 'org.freedesktop.login1.Session';

export const POWER_ACTIONS = ['shutdown', 'reboot', 'suspend', 'hibernate', 'lock'] as const;
export type PowerAction = (typeof POWER_ACTIONS)[number];

const MANAGER_METHOD: Record<Exclude<PowerAction, 'lock'>, { run: string; check: string }> = {
  shutdown: { run: 'PowerOff', check: 'CanPowerOff' },
  reboot: { run: 'Reboot', check: 'CanReboot' },
  suspend: { run: 'Suspend', check: 'CanSuspend' },
  hibernate: { run: 'Hibernate', check: 'CanHibernate' },
};

export function describeAction(action: PowerAction): string {
  switch (action) {
    case 'shutdown': return 'Shutdown';
    case 'reboot': return 'Reboot';
    case 'suspend': return 'Suspend';
    case 'hibernate': return 'Hibernate';
    case 'lock': return 'Lock';
  }
}

export type PowerState = {
  capabilities: Readonly<Partial<Record<PowerAction, boolean>>>;
  lastAction: PowerAction | null;
};

/** logind session and system actions. No optimistic cache: failures surface. */
export class PowerControl extends DbusControl<PowerState> {
  private readonly pid: number;

  constructor(opts: DbusControlOptions & { pid?: number }) {
    super('power', 'system', { capabilities: {}, lastAction: null }, opts);
    this.pid = opts.pid ?? process.pid;
  }

  protected async afterConnect(_conn: BusConnection, sync: boolean): Promise<void> {
    if (!sync) return;
    const capabilities: Partial<Record<PowerAction, boolean>> = {};
    for (const action of POWER_ACTIONS) capabilities[action] = await this.canExecute(action);
    await this.store(s => ({ ...s, capabilities }));
  }

  async execute(action: PowerAction): Promise<void> {
    this.log.info(`${describeAction(action)} requested`);
    await this.withHandle(describeAction(action), async conn => {
      if (action === 'lock') return this.lock(conn);
      const manager = await conn.proxy(LOGIN1, LOGIN1_PATH);
      await manager.call(MANAGER_IFACE, MANAGER_METHOD[action].run, true);
    });
    await this.store(s => ({ ...s, lastAction: action }));
  }

  /** Whether logind allows `action` now ("yes" or "challenge"). Lock always is. */
  async canExecute(action: PowerAction): Promise<boolean> {
    if (action === 'lock') return true;
    const check = MANAGER_METHOD[action].check;
    const answer = await this.withHandle(check, async conn => {
      const manager = await conn.proxy(LOGIN1, LOGIN1_PATH);
      return z.string().parse(await manager.call(MANAGER_IFACE, check));
    });
    return answer === 'yes' || answer === 'challenge';
  }

  private async lock(conn: BusConnection): Promise<void> {
    const manager = await conn.proxy(LOGIN1, LOGIN1_PATH);
    let session: string;
    try {
      session = z.string().parse(await manager.call(MANAGER_IFACE, 'GetSessionByPID', this.pid));
    } catch (err) {
      // daemons started outside a session have none; lock every session instead
      if (remoteErrorName(err) === null) throw err;
      this.log.debug(`no session for pid ${this.pid}, locking all sessions`);
      await manager.call(MANAGER_IFACE, 'LockSessions');
      return;
    }
    const proxy = await conn.proxy(LOGIN1, session);
    await proxy.call(SESSION_IFACE, 'Lock');
  }
}

export function isPowerAction(v: string): v is PowerAction {
  return POWER_ACTIONS.some(a => a === v);
}
