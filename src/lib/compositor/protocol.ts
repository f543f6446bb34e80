// src/lib/compositor/protocol.ts
import { z } from 'zod';
import type { WorkspaceInfo } from '../bus.js';

export const Methods = {
  workspaces: 'Workspaces',
  action: 'Action',
  version: 'Version',
} as const;

export type RpcRequest = {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params?: unknown;
};

export const RpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const RpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.number().int().nonnegative(),
  result: z.unknown().optional(),
  error: RpcErrorSchema.optional(),
});
export type RpcResponse = z.infer<typeof RpcResponseSchema>;

export const WorkspaceSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string().nullish(),
  idx: z.number().int().nonnegative(),
  output: z.string().nullish(),
  is_active: z.boolean(),
  is_focused: z.boolean(),
});
export type CompositorWorkspace = z.infer<typeof WorkspaceSchema>;

export const WorkspacesResultSchema = z.object({
  workspaces: z.array(WorkspaceSchema),
});

export type WorkspaceReference = { index: number } | { name: string };

export type CompositorAction =
  | { 'focus-workspace': { reference: WorkspaceReference } }
  | { 'focus-workspace-down': Record<string, never> }
  | { 'focus-workspace-up': Record<string, never> };

export function request(id: number, method: string, params?: unknown): RpcRequest {
  return params === undefined ? { jsonrpc: '2.0', id, method } : { jsonrpc: '2.0', id, method, params };
}

export function focusWorkspace(target: number | string): { action: CompositorAction } {
  const reference: WorkspaceReference = typeof target === 'number' ? { index: target } : { name: target };
  return { action: { 'focus-workspace': { reference } } };
}

/** Workspaces as the bus carries them; the per-output index is the id users see. */
export function toWorkspaceInfo(ws: CompositorWorkspace): WorkspaceInfo {
  return { id: ws.idx, name: ws.name ?? null, output: ws.output ?? null, active: ws.is_active, focused: ws.is_focused };
}

/** Output first, then index, as a bar lays them out. */
export function byOutputAndIndex(a: CompositorWorkspace, b: CompositorWorkspace): number {
  return (a.output ?? '').localeCompare(b.output ?? '') || a.idx - b.idx;
}
