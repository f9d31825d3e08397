import WebSocket from "ws";
import { z } from "zod";
import type { GameRules, MapGenerator, PlayerId, TurnSystem } from "../src/types";
import {
  DungeonWorld,
  MonsterTurnSystem,
  findSpawnPositions,
  mapFromAscii,
  registerDungeonActions,
  type DungeonMap,
} from "../src/engine";
import { ActionCodec } from "../src/server/actionCodec";
import type { PlayerSession } from "../src/server/auth";
import type { SessionSink } from "../src/server/gameSession";
import type { ServerMessage } from "../src/server/protocol";

/**
 * Spawn points at (1,1) and (3,1), a potion at (2,2), one rat at (6,3),
 * exit at (7,4).
 */
export const TEST_MAP = [
  "#########",
  "#@.@....#",
  "#.!.....#",
  "#.....m.#",
  "#......>#",
  "#########",
];

/** One spawn point right next to the exit. */
export const EXIT_MAP = ["#####", "#@>.#", "#####"];

export class FixedMapGenerator implements MapGenerator<DungeonMap> {
  constructor(private readonly rows: readonly string[]) {}

  generate(seed: number): DungeonMap {
    return mapFromAscii(this.rows, seed);
  }

  findSpawnPositions(map: DungeonMap, count: number) {
    return findSpawnPositions(map, count);
  }
}

export function makeTestRules(
  rows: readonly string[] = TEST_MAP,
  overrides: Partial<GameRules<DungeonWorld, DungeonMap>> = {}
): GameRules<DungeonWorld, DungeonMap> {
  return {
    mapGenerator: new FixedMapGenerator(rows),
    createWorld: (map, seed) => new DungeonWorld(map, seed),
    turnSystem: new MonsterTurnSystem(),
    codec: registerDungeonActions(new ActionCodec<DungeonWorld>()),
    ...overrides,
  };
}

export const throwingTurnSystem: TurnSystem<DungeonWorld> = {
  processRound() {
    throw new Error("turn system exploded");
  },
};

export function makePlayer(playerId: PlayerId, displayName = playerId.toUpperCase()): PlayerSession {
  return {
    token: `token-${playerId}`,
    playerId,
    displayName,
    gameSessionId: null,
    connected: true,
    disconnectDeadline: null,
    createdAt: 0,
    lastSeen: 0,
  };
}

/* =========================
 * Recording sink
 * ========================= */

export type Sent = { to: PlayerId; msg: ServerMessage };

export class RecordingSink implements SessionSink {
  readonly sent: Sent[] = [];

  send(to: PlayerId, msg: ServerMessage): void {
    this.sent.push({ to, msg });
  }

  for(playerId: PlayerId): ServerMessage[] {
    return this.sent.filter((s) => s.to === playerId).map((s) => s.msg);
  }

  typesFor(playerId: PlayerId): string[] {
    return this.for(playerId).map((m) => m.type);
  }

  clear(): void {
    this.sent.length = 0;
  }
}

export function ofType<T extends ServerMessage["type"]>(
  msgs: readonly ServerMessage[],
  type: T
): Extract<ServerMessage, { type: T }>[] {
  return msgs.filter((m): m is Extract<ServerMessage, { type: T }> => m.type === type);
}

export function lastOfType<T extends ServerMessage["type"]>(
  msgs: readonly ServerMessage[],
  type: T
): Extract<ServerMessage, { type: T }> {
  const all = ofType(msgs, type);
  const last = all[all.length - 1];
  if (!last) throw new Error(`No ${type} message`);
  return last;
}

/* =========================
 * WebSocket clients
 * ========================= */

const FrameSchema = z.object({
  type: z.string(),
  payload: z.record(z.unknown()),
  request_id: z.string().optional(),
});

export type Frame = z.infer<typeof FrameSchema>;

export function makeQueue(ws: WebSocket) {
  const q: Frame[] = [];
  let resolve: ((f: Frame) => void) | null = null;

  ws.on("message", (d) => {
    const f = FrameSchema.parse(JSON.parse(d.toString()));
    if (resolve) {
      const r = resolve;
      resolve = null;
      r(f);
    } else {
      q.push(f);
    }
  });

  return async (): Promise<Frame> => {
    const head = q.shift();
    if (head) return head;
    return await new Promise<Frame>((r) => (resolve = r));
  };
}

export async function nextWithTimeout(next: () => Promise<Frame>, label: string, ms = 2000): Promise<Frame> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      next(),
      new Promise<Frame>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Timeout waiting for message (${label}) after ${ms}ms`)), ms);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export type TestClient = {
  ws: WebSocket;
  next(label?: string): Promise<Frame>;
  waitFor(type: string): Promise<Frame>;
  send(type: string, payload?: unknown, requestId?: string): void;
  sendRaw(text: string): void;
  closed: Promise<number>;
};

export async function connect(port: number, options?: WebSocket.ClientOptions): Promise<TestClient> {
  const ws = new WebSocket(`ws://127.0.0.1:${port}`, options);
  const next = makeQueue(ws);
  const closed = new Promise<number>((resolve) => ws.on("close", (code) => resolve(code)));

  await new Promise<void>((resolve, reject) => {
    ws.on("open", () => resolve());
    ws.on("error", (e) => reject(e));
  });

  const client: TestClient = {
    ws,
    closed,
    next: (label = "next") => nextWithTimeout(next, label),
    waitFor: async (type) => {
      for (;;) {
        const f = await nextWithTimeout(next, type);
        if (f.type === type) return f;
      }
    },
    send: (type, payload = {}, requestId) =>
      ws.send(JSON.stringify(requestId ? { type, payload, request_id: requestId } : { type, payload })),
    sendRaw: (text) => ws.send(text),
  };
  return client;
}

export function str(frame: Frame, key: string): string {
  const v = frame.payload[key];
  if (typeof v !== "string") throw new Error(`${frame.type}.${key} is not a string`);
  return v;
}

export function num(frame: Frame, key: string): number {
  const v = frame.payload[key];
  if (typeof v !== "number") throw new Error(`${frame.type}.${key} is not a number`);
  return v;
}

export async function closeClient(c: TestClient): Promise<void> {
  if (c.ws.readyState === WebSocket.CLOSED) return;
  c.ws.close();
  await c.closed;
}
