// src/lib/logger.ts
import fs from "node:fs";
import path from "node:path";

export type Level = "debug" | "info" | "warn" | "error";
const levels: readonly Level[] = ["debug", "info", "warn", "error"];

function isLevel(v: string): v is Level {
  return levels.some(l => l === v);
}

// File output is opt-in; console output always honors the level filters below
const ENABLED = (process.env.LOG_ENABLE ?? "0") === "1";
const DIR     = process.env.LOG_DIR || "./logs";
const BASE    = process.env.LOG_FILE_BASENAME || "deskbar";
const RAW_MIN = (process.env.LOG_LEVEL || "info").toLowerCase();
const MIN: Level = isLevel(RAW_MIN) ? RAW_MIN : "info";

// Per-tag minimum overrides: e.g. "compositor=warn,sampler=error"
const TAG_LEVELS_RAW = process.env.LOG_TAG_LEVELS || "";
const TAG_MIN: Record<string, Level> = {};
for (const pair of TAG_LEVELS_RAW.split(",")) {
  const [k, v] = pair.split("=").map(s => (s || "").trim());
  if (!k || !v) continue;
  const lv = v.toLowerCase();
  if (isLevel(lv)) TAG_MIN[k] = lv;
}

// The poller logs every failed poll at debug; keep it quiet unless asked
if ((process.env.DEBUG ?? "0") !== "1") {
  if (!("compositor-poll" in TAG_MIN)) TAG_MIN["compositor-poll"] = "info";
}

function levelIdx(l: Level) { return levels.indexOf(l); }
function minFor(tag?: string): Level {
  if (tag && TAG_MIN[tag]) return TAG_MIN[tag];
  return MIN;
}

let day = ""; let stream: fs.WriteStream | null = null;
let errorStream: fs.WriteStream | null = null;

function pruneOldLogs(dir: string, base: string, maxAgeDays = 31) {
  try {
    const files = fs.readdirSync(dir, { withFileTypes: true });
    const now = Date.now();
    const maxAgeMs = maxAgeDays * 24 * 60 * 60 * 1000;
    const pattern = new RegExp(`^${base}-\\d{4}-\\d{2}-\\d{2}\\.log$`);
    for (const ent of files) {
      if (!ent.isFile() || !pattern.test(ent.name)) continue;
      const p = path.join(dir, ent.name);
      const st = fs.statSync(p);
      const ts = st.mtimeMs || st.ctimeMs || 0;
      if (now - ts > maxAgeMs) fs.rmSync(p, { force: true });
    }
  } catch (err) {
    console.warn(`[logger] prune failed: ${String(err)}`);
  }
}

function ensureStream() {
  if (!ENABLED) return null;
  const d = new Date().toISOString().slice(0, 10);
  if (d !== day || !stream) {
    fs.mkdirSync(DIR, { recursive: true });
    stream?.end();
    stream = fs.createWriteStream(path.join(DIR, `${BASE}-${d}.log`), { flags: "a" });
    day = d;
    pruneOldLogs(DIR, BASE, 31);
  }
  return stream;
}

// Error sink sits next to the daily file, so it follows LOG_ENABLE too
function ensureErrorStream() {
  if (!ENABLED) return null;
  if (!errorStream) {
    fs.mkdirSync(DIR, { recursive: true });
    errorStream = fs.createWriteStream(path.join(DIR, "errors.log"), { flags: "a" });
  }
  return errorStream;
}

const CONSOLE: Record<Level, (line: string) => void> = {
  debug: line => console.log(line),
  info:  line => console.info(line),
  warn:  line => console.warn(line),
  error: line => console.error(line),
};

function write(level: Level, tag: string | undefined, msg: string, extra?: unknown) {
  if (levelIdx(level) < levelIdx(minFor(tag))) return;
  CONSOLE[level](`[${tag ?? "app"}] ${msg}`);
  if (!ENABLED) return;
  const line = JSON.stringify({ ts: new Date().toISOString(), level, tag, msg, ...(extra !== undefined ? { extra } : {}) });
  try {
    ensureStream()?.write(line + "\n");
    if (level === "error") ensureErrorStream()?.write(line + "\n");
  } catch (err) {
    console.error(`[logger] file write failed: ${String(err)}`);
  }
}

export type Logger = {
  debug: (m: string, e?: unknown) => void;
  info:  (m: string, e?: unknown) => void;
  warn:  (m: string, e?: unknown) => void;
  error: (m: string, e?: unknown) => void;
};

export const LOG = {
  tag(t: string): Logger {
    return {
      debug: (m, e) => write("debug", t, m, e),
      info:  (m, e) => write("info",  t, m, e),
      warn:  (m, e) => write("warn",  t, m, e),
      error: (m, e) => write("error", t, m, e),
    };
  },
  debug: (m: string, e?: unknown) => write("debug", undefined, m, e),
  info:  (m: string, e?: unknown) => write("info",  undefined, m, e),
  warn:  (m: string, e?: unknown) => write("warn",  undefined, m, e),
  error: (m: string, e?: unknown) => write("error", undefined, m, e),
};
