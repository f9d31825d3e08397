import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { DungeonMap, DungeonWorld } from "../src/engine";
import type { ServerConfig } from "../src/server/config";
import { silentLogger } from "../src/server/log";
import { CLIENT_MESSAGE_TYPES } from "../src/server/protocol";
import type WebSocket from "ws";
import { startWsServer, type WsServerHandle } from "../src/server/wsServer";
import { closeClient, connect, makeTestRules, num, str, type Frame, type TestClient } from "./helpers";

type Server = WsServerHandle<DungeonWorld, DungeonMap>;

async function boot(overrides: Partial<ServerConfig> = {}): Promise<Server> {
  return await startWsServer({
    rules: makeTestRules(),
    config: { host: "127.0.0.1", port: 0, heartbeatIntervalSeconds: 0, authTimeoutSeconds: 5, ...overrides },
    logger: silentLogger,
    seedSource: () => 5,
  });
}

let server: Server;
let clients: TestClient[] = [];

beforeEach(async () => {
  server = await boot();
  clients = [];
});

afterEach(async () => {
  for (const c of clients) await closeClient(c);
  await server.close();
});

async function open(target: Server = server, options?: WebSocket.ClientOptions): Promise<TestClient> {
  const c = await connect(target.port, options);
  clients.push(c);
  return c;
}

async function login(c: TestClient, name: string): Promise<{ playerId: string; token: string }> {
  c.send("AUTH", { display_name: name });
  const ok = await c.waitFor("AUTH_SUCCESS");
  return { playerId: str(ok, "player_id"), token: str(ok, "token") };
}

/** Two authenticated clients in an ACTIVE game, both past their start STATE. */
async function startGame() {
  const a = await open();
  const b = await open();
  const ann = await login(a, "Ann");
  const bob = await login(b, "Bob");

  a.send("CREATE_GAME", { name: "Run" });
  const joined = await a.waitFor("GAME_JOINED");
  const sessionId = str(joined, "session_id");
  await a.waitFor("STATE");

  b.send("JOIN_GAME", { session_id: sessionId });
  await b.waitFor("STATE");

  a.send("READY", {});
  b.send("READY", {});
  for (const c of [a, b]) {
    await c.waitFor("GAME_START");
    await c.waitFor("STATE");
  }
  return { a, b, ann, bob, sessionId };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Two authenticated clients in one LOBBY game on `target`. */
async function lobbyPair(target: Server, aOptions?: WebSocket.ClientOptions) {
  const a = await open(target, aOptions);
  const b = await open(target);
  const ann = await login(a, "Ann");
  await login(b, "Bob");
  a.send("CREATE_GAME", { name: "Run" });
  const sessionId = str(await a.waitFor("GAME_JOINED"), "session_id");
  b.send("JOIN_GAME", { session_id: sessionId });
  await b.waitFor("STATE");
  await a.waitFor("PLAYER_JOINED");
  return { a, b, ann, sessionId };
}

function errorReason(f: Frame): unknown {
  return f.payload["reason"];
}

describe("ws server: framing and auth", () => {
  it("routes every client message type", () => {
    expect([...server.router.types()].sort()).toEqual([...CLIENT_MESSAGE_TYPES].sort());
  });

  it("answers malformed frames without closing the connection", async () => {
    const c = await open();
    c.sendRaw("{nope");
    const bad = await c.next();
    expect(bad.type).toBe("ERROR");
    expect(bad.payload).toEqual({ reason: "malformed_frame", message: "Frame is not valid JSON." });

    c.sendRaw(JSON.stringify({ payload: {}, request_id: "x1" }));
    const noType = await c.next();
    expect(errorReason(noType)).toBe("malformed_frame");
    expect(noType.request_id).toBe("x1");

    await login(c, "Still Here");
  });

  it("reports unknown types, missing auth and bad payloads with the request id", async () => {
    const c = await open();
    c.send("DANCE", {}, "r1");
    c.send("READY", {}, "r2");
    c.send("AUTH", { display_name: 5 }, "r3");
    c.send("AUTH", { display_name: "<b>" }, "r4");

    const replies = [await c.next(), await c.next(), await c.next(), await c.next()];
    expect(replies.map((f) => [f.type, errorReason(f), f.request_id])).toEqual([
      ["ERROR", "unknown_message", "r1"],
      ["ERROR", "not_authenticated", "r2"],
      ["ERROR", "invalid_payload", "r3"],
      ["AUTH_FAILURE", "invalid_name", "r4"],
    ]);
  });

  it("refuses a second AUTH on the same connection", async () => {
    const c = await open();
    await login(c, "Ann");
    c.send("AUTH", { display_name: "Ann" }, "again");
    const f = await c.next();
    expect([f.type, errorReason(f), f.request_id]).toEqual(["ERROR", "invalid_state", "again"]);
  });

  it("rejects an unknown reconnect token", async () => {
    const c = await open();
    c.send("RECONNECT", { token: "test-token-unknown", session_id: "ABCDEF" });
    const f = await c.next();
    expect(f.type).toBe("AUTH_FAILURE");
    expect(f.payload).toEqual({ reason: "invalid_token", message: "Unknown token." });
  });

  it("closes connections that never authenticate", async () => {
    const slow = await boot({ authTimeoutSeconds: 1 });
    try {
      const c = await open(slow);
      const f = await c.next("auth timeout");
      expect(f.type).toBe("AUTH_FAILURE");
      expect(errorReason(f)).toBe("timeout");
      expect(await c.closed).toBe(1008);
    } finally {
      await slow.close();
    }
  });
});

describe("ws server: token expiry", () => {
  it("unbinds an expired player and lets the socket authenticate again", async () => {
    const short = await boot({ tokenTtlSeconds: 1 });
    try {
      const { a, b, ann, sessionId } = await lobbyPair(short);
      await sleep(1100);

      a.send("CHAT", { text: "hi" }, "c1");
      const expired = await a.next();
      expect([expired.type, errorReason(expired), expired.request_id]).toEqual(["AUTH_FAILURE", "expired", "c1"]);
      const left = await b.waitFor("PLAYER_LEFT");
      expect(left.payload).toMatchObject({ player_id: ann.playerId, reason: "disconnected" });
      expect(short.manager.get(sessionId)?.slot(ann.playerId)?.connected).toBe(false);

      a.send("AUTH", { display_name: "Ann" }, "r0");
      const fresh = await a.next();
      expect([fresh.type, fresh.request_id]).toEqual(["AUTH_SUCCESS", "r0"]);
      expect(str(fresh, "player_id")).not.toBe(ann.playerId);

      // An AUTH as the first frame after expiry is served, not refused.
      b.send("AUTH", { display_name: "Bob" }, "r1");
      const seen: string[] = [];
      for (;;) {
        const f = await b.next("re-auth");
        if (f.type === "AUTH_SUCCESS") {
          expect(f.request_id).toBe("r1");
          break;
        }
        seen.push(f.type);
      }
      expect(seen.filter((t) => t === "AUTH_FAILURE")).toEqual([]);
    } finally {
      await short.close();
    }
  });
});

describe("ws server: heartbeat", () => {
  it("terminates a socket that misses a pong and disconnects its slot", async () => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    const beating = await boot({ heartbeatIntervalSeconds: 1 });
    try {
      const { a, b, ann, sessionId } = await lobbyPair(beating, { autoPong: false });

      const pinged = new Promise<void>((resolve) => b.ws.once("ping", () => resolve()));
      vi.advanceTimersByTime(1000);
      await pinged;
      await sleep(50);

      vi.advanceTimersByTime(1000);
      expect(await a.closed).toBe(1006);
      const left = await b.waitFor("PLAYER_LEFT");
      expect(left.payload).toMatchObject({ player_id: ann.playerId, reason: "disconnected" });
      expect(beating.manager.get(sessionId)?.slot(ann.playerId)?.connected).toBe(false);
    } finally {
      vi.useRealTimers();
      await beating.close();
    }
  });
});

describe("ws server: lobby", () => {
  it("creates, lists and joins a game", async () => {
    const a = await open();
    const b = await open();
    await login(a, "Ann");
    await login(b, "Bob");

    a.send("CREATE_GAME", { name: "Run", max_players: 3 }, "c1");
    const joined = await a.next();
    expect(joined.type).toBe("GAME_JOINED");
    expect(joined.request_id).toBe("c1");
    expect(joined.payload).toMatchObject({ name: "Run", status: "LOBBY", players: 1, max_players: 3 });
    const sessionId = str(joined, "session_id");
    const state = await a.next();
    expect(state.type).toBe("STATE");
    expect(state.request_id).toBe("c1");

    b.send("LIST_GAMES", {});
    const list = await b.next();
    expect(list.payload["games"]).toEqual([
      { session_id: sessionId, name: "Run", status: "LOBBY", players: 1, max_players: 3 },
    ]);

    b.send("JOIN_GAME", { session_id: sessionId.toLowerCase() });
    expect((await b.next()).type).toBe("GAME_JOINED");
    expect((await b.next()).type).toBe("STATE");
    const hello = await a.next();
    expect(hello.type).toBe("PLAYER_JOINED");
    expect(hello.payload).toMatchObject({ display_name: "Bob" });
  });

  it("reports missing sessions and actions outside a game", async () => {
    const c = await open();
    await login(c, "Ann");
    c.send("JOIN_GAME", { session_id: "NOPE22" }, "j1");
    const missing = await c.next();
    expect([errorReason(missing), missing.request_id]).toEqual(["session_not_found", "j1"]);

    c.send("ACTION", { action_type: "wait" }, "a1");
    const outside = await c.next();
    expect([errorReason(outside), outside.request_id]).toEqual(["not_in_game", "a1"]);
  });
});

describe("ws server: play", () => {
  it("broadcasts an accepted action as a DELTA and echoes the request id to its sender", async () => {
    const { a, b, ann } = await startGame();

    a.send("ACTION", { action_type: "move", params: { dx: 1, dy: 0 } }, "m1");
    const mine = await a.next();
    const theirs = await b.next();
    expect(mine.type).toBe("DELTA");
    expect(mine.request_id).toBe("m1");
    expect(mine.payload["entities"]).toEqual([{ id: `player:${ann.playerId}`, changed: { x: 2 } }]);
    expect(theirs.type).toBe("DELTA");
    expect(theirs.request_id).toBeUndefined();
    expect(num(theirs, "new_revision")).toBe(num(mine, "new_revision"));

    a.send("RESYNC", {}, "s1");
    const resync = await a.next();
    expect(resync.type).toBe("STATE");
    expect(resync.request_id).toBe("s1");
    expect(num(resync, "revision")).toBe(num(mine, "new_revision"));
  });

  it("rejects bad actions with an ERROR only to the sender", async () => {
    const { a } = await startGame();
    a.send("ACTION", { action_type: "move", params: { dx: 5, dy: 0 } }, "bad");
    const f = await a.next();
    expect([f.type, errorReason(f), f.request_id]).toEqual(["ERROR", "invalid_params", "bad"]);

    a.send("ACTION", { action_type: "fly" }, "fly");
    expect(errorReason(await a.next())).toBe("unknown_action");
  });

  it("relays chat to everyone in the game", async () => {
    const { a, b } = await startGame();
    b.send("CHAT", { text: "  hello  " }, "t1");
    const mine = await b.next();
    const theirs = await a.next();
    expect(mine.request_id).toBe("t1");
    expect(theirs.payload).toMatchObject({ display_name: "Bob", text: "hello" });
  });

  it("lets a dropped player reconnect on a new socket", async () => {
    const { a, b, ann, sessionId } = await startGame();
    await closeClient(a);

    const left = await b.waitFor("PLAYER_LEFT");
    expect(left.payload).toMatchObject({ player_id: ann.playerId, reason: "disconnected" });

    const again = await open();
    again.send("RECONNECT", { token: ann.token, session_id: sessionId }, "rc");
    const auth = await again.next();
    expect(auth.type).toBe("AUTH_SUCCESS");
    expect(str(auth, "player_id")).toBe(ann.playerId);
    expect((await again.next()).type).toBe("GAME_JOINED");
    const state = await again.next();
    expect(state.type).toBe("STATE");
    expect(state.request_id).toBe("rc");
    expect(state.payload["state"]).toMatchObject({
      entities: { [`player:${ann.playerId}`]: { x: 1, y: 1 } },
      players: { [ann.playerId]: { connected: true } },
    });

    const back = await b.waitFor("PLAYER_JOINED");
    expect(back.payload).toMatchObject({ player_id: ann.playerId });
  });

  it("closes the older socket when a player reconnects twice", async () => {
    const { a, ann, sessionId } = await startGame();
    const again = await open();
    again.send("RECONNECT", { token: ann.token, session_id: sessionId });
    expect((await again.waitFor("STATE")).type).toBe("STATE");
    expect(await a.closed).toBe(4001);
  });

  it("sends GAME_LEFT on leave", async () => {
    const { a, sessionId } = await startGame();
    a.send("LEAVE_GAME", {}, "bye");
    const f = await a.waitFor("GAME_LEFT");
    expect(f.payload).toEqual({ session_id: sessionId });
    expect(f.request_id).toBe("bye");
  });
});
