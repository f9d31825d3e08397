import type { EntityRecord, JsonObject, JsonValue } from "../types";

/**
 * The canonical session document. `meta` carries status and round counters,
 * `players` and `entities` are keyed by id.
 */
export type StateDocument = {
  meta: JsonObject;
  players: Record<string, JsonObject>;
  entities: Record<string, JsonObject>;
};

export type StateSnapshot = {
  revision: number;
  state: StateDocument;
};

export type Collection = "players" | "entities";

export const COLLECTIONS: readonly Collection[] = ["players", "entities"];

function sortedKeys(obj: object): string[] {
  return Object.keys(obj).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

function canonicalObject(obj: JsonObject): JsonObject {
  const out: JsonObject = {};
  for (const k of sortedKeys(obj)) {
    const v = obj[k];
    if (v !== undefined) out[k] = canonicalize(v);
  }
  return out;
}

/** Deep copy with object keys in sorted order. */
export function canonicalize(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === "object") return canonicalObject(value);
  return value;
}

export function stableStringify(value: JsonValue): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalCollection(c: Record<string, JsonObject>): Record<string, JsonObject> {
  const out: Record<string, JsonObject> = {};
  for (const id of sortedKeys(c)) {
    const doc = c[id];
    if (doc) out[id] = canonicalObject(doc);
  }
  return out;
}

export function canonicalDocument(doc: StateDocument): StateDocument {
  return {
    meta: canonicalObject(doc.meta),
    players: canonicalCollection(doc.players),
    entities: canonicalCollection(doc.entities),
  };
}

export function documentToJson(doc: StateDocument): JsonObject {
  return { entities: doc.entities, meta: doc.meta, players: doc.players };
}

/** Entity records keyed by id; display hints are left out. */
export function entityDocuments(records: readonly EntityRecord[]): Record<string, JsonObject> {
  const out: Record<string, JsonObject> = {};
  for (const r of records) {
    out[r.id] = canonicalObject({ ...r.fields, kind: r.kind, alive: r.alive });
  }
  return out;
}

export function snapshotsEqual(a: StateSnapshot, b: StateSnapshot): boolean {
  return a.revision === b.revision && stableStringify(documentToJson(a.state)) === stableStringify(documentToJson(b.state));
}
