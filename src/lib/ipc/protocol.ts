// src/lib/ipc/protocol.ts
import { z } from 'zod';
import { POWER_ACTIONS } from '../backend/power.js';

/* Newline-delimited JSON: one Command per line in, one Response per line out. */

export const PopupSchema = z.enum(['bluetooth', 'wifi', 'media-control', 'power']);

const Amount = z.number().finite().nullish();
const Level = z.number().finite();

export const VolumeActionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('up'), amount: Amount }),
  z.object({ action: z.literal('down'), amount: Amount }),
  z.object({ action: z.literal('set'), level: Level }),
  z.object({ action: z.literal('mute') }),
  z.object({ action: z.literal('unmute') }),
  z.object({ action: z.literal('toggle-mute') }),
]);

export const BrightnessActionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('up'), amount: Amount }),
  z.object({ action: z.literal('down'), amount: Amount }),
  z.object({ action: z.literal('set'), level: Level }),
]);

export const CommandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('show-popup'), popup: PopupSchema }),
  z.object({ type: z.literal('hide-popup'), popup: PopupSchema }),
  z.object({ type: z.literal('toggle-popup'), popup: PopupSchema }),
  z.object({ type: z.literal('volume'), action: VolumeActionSchema }),
  z.object({ type: z.literal('brightness'), action: BrightnessActionSchema }),
  z.object({ type: z.literal('power'), action: z.enum(POWER_ACTIONS) }),
  z.object({ type: z.literal('status') }),
  z.object({ type: z.literal('ping') }),
]);

export type Command = z.infer<typeof CommandSchema>;
export type VolumeAction = z.infer<typeof VolumeActionSchema>;
export type BrightnessAction = z.infer<typeof BrightnessActionSchema>;

export const ResponseSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('success'), message: z.string().nullish() }),
  z.object({ status: z.literal('error'), message: z.string() }),
  z.object({ status: z.literal('status'), version: z.string(), uptime: z.number().int().nonnegative() }),
  z.object({ status: z.literal('pong') }),
]);

export type Response = z.infer<typeof ResponseSchema>;

export const Responses = {
  success(message?: string): Response {
    return message === undefined ? { status: 'success' } : { status: 'success', message };
  },
  error(message: string): Response {
    return { status: 'error', message };
  },
  status(version: string, uptime: number): Response {
    return { status: 'status', version, uptime };
  },
  pong(): Response {
    return { status: 'pong' };
  },
};

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

function parseLine<T>(line: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Parsed<T> {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
  const result = schema.safeParse(json);
  if (result.success) return { ok: true, value: result.data };
  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return { ok: false, error: issue ? `${where}${issue.message}` : 'invalid value' };
}

export function parseCommand(line: string): Parsed<Command> {
  return parseLine(line, CommandSchema);
}

export function parseResponse(line: string): Parsed<Response> {
  return parseLine(line, ResponseSchema);
}

/** One wire line, newline included. */
export function encode(value: Command | Response): string {
  return JSON.stringify(value) + '\n';
}
