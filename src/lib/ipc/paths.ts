// src/lib/ipc/paths.ts
import os from 'node:os';
import path from 'node:path';

export type Env = Readonly<Record<string, string | undefined>>;

/** `$XDG_RUNTIME_DIR`, else `$TMPDIR`, else the system temp dir. */
export function runtimeDir(env: Env = process.env): string {
  return env.XDG_RUNTIME_DIR || env.TMPDIR || os.tmpdir();
}

export function defaultSocketPath(env: Env = process.env): string {
  return path.join(runtimeDir(env), 'deskbar', 'deskbar.sock');
}

export function configDir(env: Env = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(env.HOME || os.homedir(), '.config');
  return path.join(base, 'deskbar');
}
