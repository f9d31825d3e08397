import type { JsonObject, JsonValue } from "../types";
import { COLLECTIONS, canonicalDocument, stableStringify, type StateDocument, type StateSnapshot } from "./snapshot";

export type EntityChange =
  | { id: string; changed: JsonObject; unset?: string[] }
  | { id: string; removed: true }
  | { id: string; added: JsonObject };

export type StateDelta = {
  baseRevision: number;
  newRevision: number;
  meta?: JsonObject;
  players: EntityChange[];
  entities: EntityChange[];
};

export type ApplyDeltaResult =
  | { ok: true; snapshot: StateSnapshot }
  | { ok: false; code: "STALE_BASE"; message: string };

function same(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return stableStringify(a) === stableStringify(b);
}

function diffFields(before: JsonObject, after: JsonObject): { changed: JsonObject; unset: string[] } {
  const changed: JsonObject = {};
  const unset: string[] = [];
  for (const [k, v] of Object.entries(after)) {
    if (!same(before[k], v)) changed[k] = v;
  }
  for (const k of Object.keys(before)) {
    if (!(k in after)) unset.push(k);
  }
  return { changed, unset: unset.sort() };
}

function diffCollection(before: Record<string, JsonObject>, after: Record<string, JsonObject>): EntityChange[] {
  const ids = new Set([...Object.keys(before), ...Object.keys(after)]);
  const out: EntityChange[] = [];
  for (const id of [...ids].sort()) {
    const a = before[id];
    const b = after[id];
    if (a && !b) {
      out.push({ id, removed: true });
    } else if (!a && b) {
      out.push({ id, added: b });
    } else if (a && b) {
      const { changed, unset } = diffFields(a, b);
      if (Object.keys(changed).length === 0 && unset.length === 0) continue;
      out.push(unset.length > 0 ? { id, changed, unset } : { id, changed });
    }
  }
  return out;
}

/**
 * Minimal diff from `before` to `after`. The result's `newRevision` is
 * `before.revision + 1`; callers that broadcast at another revision set it.
 */
export function computeDelta(before: StateSnapshot, after: StateDocument): StateDelta {
  const delta: StateDelta = {
    baseRevision: before.revision,
    newRevision: before.revision + 1,
    players: diffCollection(before.state.players, after.players),
    entities: diffCollection(before.state.entities, after.entities),
  };
  const { changed } = diffFields(before.state.meta, after.meta);
  if (Object.keys(changed).length > 0) delta.meta = changed;
  return delta;
}

export function isEmptyDelta(delta: StateDelta): boolean {
  return !delta.meta && delta.players.length === 0 && delta.entities.length === 0;
}

function applyChanges(target: Record<string, JsonObject>, changes: readonly EntityChange[]): void {
  for (const change of changes) {
    if ("removed" in change) {
      delete target[change.id];
    } else if ("added" in change) {
      target[change.id] = structuredClone(change.added);
    } else {
      const next: JsonObject = { ...(target[change.id] ?? {}), ...structuredClone(change.changed) };
      for (const k of change.unset ?? []) delete next[k];
      target[change.id] = next;
    }
  }
}

export function applyDelta(snapshot: StateSnapshot, delta: StateDelta): ApplyDeltaResult {
  if (snapshot.revision !== delta.baseRevision) {
    return {
      ok: false,
      code: "STALE_BASE",
      message: `Delta is based on revision ${delta.baseRevision}, snapshot is at ${snapshot.revision}.`,
    };
  }

  const state = structuredClone(snapshot.state);
  if (delta.meta) Object.assign(state.meta, structuredClone(delta.meta));
  for (const c of COLLECTIONS) applyChanges(state[c], delta[c]);

  return { ok: true, snapshot: { revision: delta.newRevision, state: canonicalDocument(state) } };
}
