import { randomUUID } from "node:crypto";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import type { GameRules, GameWorld, SessionId } from "../types";
import { AuthRegistry, type PlayerSession } from "./auth";
import { DEFAULT_CONFIG, type ServerConfig } from "./config";
import type { GameSession } from "./gameSession";
import { createLogger, type Logger } from "./log";
import { OutboundQueue } from "./outboundQueue";
import { fail, makeAuthFailure, makeError, withRequestId, type Result, type ServerMessage } from "./protocol";
import { MessageRouter, type RouteContext } from "./router";
import {
  ActionPayload,
  AuthPayload,
  ChatPayload,
  CreateGamePayload,
  EnvelopeSchema,
  JoinGamePayload,
  LeaveGamePayload,
  ListGamesPayload,
  PassPayload,
  ReadyPayload,
  ReconnectPayload,
  ResyncPayload,
} from "./schemas";
import { SerialQueue } from "./serialQueue";
import { SessionManager } from "./sessionManager";

export type Connection = {
  id: string;
  ws: WebSocket;
  player: PlayerSession | null;
  outbound: OutboundQueue;
  inbound: SerialQueue;
  authTimer: NodeJS.Timeout | null;
  alive: boolean;
};

export type WsServerOptions<W extends GameWorld<W>, M> = {
  rules: GameRules<W, M>;
  config?: Partial<ServerConfig>;
  logger?: Logger;
  seedSource?: () => number;
};

export type WsServerHandle<W extends GameWorld<W>, M> = {
  port: number;
  router: MessageRouter<Connection>;
  manager: SessionManager<W, M>;
  auth: AuthRegistry;
  close(): Promise<void>;
};

function safeParseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function getRequestId(x: unknown): string | undefined {
  if (!x || typeof x !== "object" || !("request_id" in x)) return undefined;
  return typeof x.request_id === "string" ? x.request_id : undefined;
}

export async function startWsServer<W extends GameWorld<W>, M>(
  opts: WsServerOptions<W, M>
): Promise<WsServerHandle<W, M>> {
  const config: ServerConfig = { ...DEFAULT_CONFIG, ...opts.config };
  const log = opts.logger ?? createLogger(config.logLevel);

  const connections = new Set<Connection>();
  const byPlayer = new Map<string, Connection>();
  let closing = false;

  const auth = new AuthRegistry({ tokenTtlSeconds: config.tokenTtlSeconds });
  const manager = new SessionManager<W, M>({
    config,
    rules: opts.rules,
    logger: log,
    seedSource: opts.seedSource,
    sink: {
      send: (playerId, msg) => byPlayer.get(playerId)?.outbound.push(msg),
    },
  });
  const router = new MessageRouter<Connection>();

  function bind(conn: Connection, player: PlayerSession) {
    if (conn.authTimer) clearTimeout(conn.authTimer);
    conn.authTimer = null;
    conn.player = player;
    player.connected = true;
    auth.touch(player);
    byPlayer.set(player.playerId, conn);
  }

  /** Detach the player from this socket and start their disconnect deadline. */
  async function unbind(conn: Connection): Promise<void> {
    const player = conn.player;
    if (!player) return;
    conn.player = null;
    if (byPlayer.get(player.playerId) !== conn) return;

    byPlayer.delete(player.playerId);
    player.connected = false;
    const sessionId = player.gameSessionId;
    if (sessionId && !closing) await manager.run(sessionId, () => manager.disconnect(player));
  }

  function requirePlayer(ctx: RouteContext<Connection>): PlayerSession | null {
    const player = ctx.conn.player;
    if (!player) ctx.reply(makeError("not_authenticated", "Authenticate first.", ctx.requestId));
    return player;
  }

  /** Run `fn` in the player's current session queue and report a failed result. */
  async function inSession(
    ctx: RouteContext<Connection>,
    fn: (session: GameSession<W, M>, player: PlayerSession) => Result
  ): Promise<void> {
    const player = requirePlayer(ctx);
    if (!player) return;
    const sessionId = player.gameSessionId;
    if (!sessionId) {
      ctx.reply(makeError("not_in_game", "You are not in a game.", ctx.requestId));
      return;
    }
    await manager.run(sessionId, () => {
      const session = manager.get(sessionId);
      const res =
        session && player.gameSessionId === sessionId ? fn(session, player) : fail("not_in_game", "You are not in a game.");
      if (!res.ok) ctx.reply(makeError(res.error.code, res.error.message, ctx.requestId));
    });
  }

  function sendJoined(ctx: RouteContext<Connection>, session: GameSession<W, M>, player: PlayerSession) {
    ctx.reply(withRequestId<ServerMessage>({ type: "GAME_JOINED", payload: session.summary() }, ctx.requestId));
    session.sendSnapshot(player.playerId, ctx.requestId);
  }

  /* =========================
   * Routes
   * ========================= */

  router.register(
    "AUTH",
    AuthPayload,
    (payload, ctx) => {
      if (ctx.conn.player) {
        ctx.reply(makeError("invalid_state", "Already authenticated.", ctx.requestId));
        return;
      }
      const res = auth.authenticate(payload.display_name);
      if (!res.ok) {
        ctx.reply(makeAuthFailure(res.reason, res.message, ctx.requestId));
        return;
      }
      bind(ctx.conn, res.session);
      log.info("ws:auth", { connId: ctx.conn.id, playerId: res.session.playerId });
      ctx.reply(
        withRequestId<ServerMessage>(
          {
            type: "AUTH_SUCCESS",
            payload: {
              player_id: res.session.playerId,
              token: res.session.token,
              display_name: res.session.displayName,
            },
          },
          ctx.requestId
        )
      );
    },
    { requiresAuth: false }
  );

  router.register(
    "RECONNECT",
    ReconnectPayload,
    async (payload, ctx) => {
      const res = auth.resolve(payload.token);
      if (!res.ok) {
        ctx.reply(makeAuthFailure(res.reason, res.message, ctx.requestId));
        return;
      }
      const player = res.session;
      if (ctx.conn.player && ctx.conn.player !== player) {
        ctx.reply(makeError("invalid_state", "This connection belongs to another player.", ctx.requestId));
        return;
      }

      const previous = byPlayer.get(player.playerId);
      if (previous && previous !== ctx.conn) {
        log.info("ws:takeover", { connId: ctx.conn.id, previous: previous.id, playerId: player.playerId });
        await unbind(previous);
        previous.outbound.close();
        previous.ws.close(4001, "Replaced by a newer connection");
      }

      if (!ctx.conn.player) {
        bind(ctx.conn, player);
        ctx.reply(
          withRequestId<ServerMessage>(
            {
              type: "AUTH_SUCCESS",
              payload: { player_id: player.playerId, token: player.token, display_name: player.displayName },
            },
            ctx.requestId
          )
        );
      }

      const sessionId: SessionId = payload.session_id.trim().toUpperCase();
      await manager.run(sessionId, () => {
        const r = manager.reconnect(player, sessionId);
        if (!r.ok) {
          ctx.reply(makeError(r.error.code, r.error.message, ctx.requestId));
          return;
        }
        log.info("ws:reconnect", { connId: ctx.conn.id, playerId: player.playerId, sessionId });
        sendJoined(ctx, r.session, player);
      });
    },
    { requiresAuth: false }
  );

  router.register("CREATE_GAME", CreateGamePayload, async (payload, ctx) => {
    const player = requirePlayer(ctx);
    if (!player) return;
    const sessionId = manager.newSessionId();
    await manager.run(sessionId, () => {
      const r = manager.createGame(player, sessionId, { name: payload.name, maxPlayers: payload.max_players });
      if (!r.ok) {
        ctx.reply(makeError(r.error.code, r.error.message, ctx.requestId));
        return;
      }
      sendJoined(ctx, r.session, player);
    });
  });

  router.register("JOIN_GAME", JoinGamePayload, async (payload, ctx) => {
    const player = requirePlayer(ctx);
    if (!player) return;
    const sessionId = payload.session_id.trim().toUpperCase();
    await manager.run(sessionId, () => {
      const r = manager.joinGame(sessionId, player);
      if (!r.ok) {
        ctx.reply(makeError(r.error.code, r.error.message, ctx.requestId));
        return;
      }
      sendJoined(ctx, r.session, player);
    });
  });

  router.register("LEAVE_GAME", LeaveGamePayload, async (_payload, ctx) => {
    const player = requirePlayer(ctx);
    if (!player) return;
    const sessionId = player.gameSessionId;
    if (!sessionId) {
      ctx.reply(makeError("not_in_game", "You are not in a game.", ctx.requestId));
      return;
    }
    await manager.run(sessionId, () => {
      const r = manager.leaveGame(player);
      if (!r.ok) {
        ctx.reply(makeError(r.error.code, r.error.message, ctx.requestId));
        return;
      }
      ctx.reply(withRequestId<ServerMessage>({ type: "GAME_LEFT", payload: { session_id: r.sessionId } }, ctx.requestId));
    });
  });

  router.register("READY", ReadyPayload, (payload, ctx) =>
    inSession(ctx, (s, p) => s.setReady(p.playerId, payload.ready, ctx.requestId))
  );

  router.register("ACTION", ActionPayload, (payload, ctx) =>
    inSession(ctx, (s, p) =>
      s.submitAction({
        playerId: p.playerId,
        actionType: payload.action_type,
        params: payload.params,
        requestId: ctx.requestId,
      })
    )
  );

  router.register("PASS", PassPayload, (_payload, ctx) =>
    inSession(ctx, (s, p) => s.pass(p.playerId, ctx.requestId))
  );

  router.register("CHAT", ChatPayload, (payload, ctx) =>
    inSession(ctx, (s, p) => s.postChat(p.playerId, payload.text, ctx.requestId))
  );

  router.register("RESYNC", ResyncPayload, (_payload, ctx) =>
    inSession(ctx, (s, p) => {
      s.sendSnapshot(p.playerId, ctx.requestId);
      return { ok: true };
    })
  );

  router.register("LIST_GAMES", ListGamesPayload, (_payload, ctx) => {
    ctx.reply(withRequestId<ServerMessage>({ type: "GAME_LIST", payload: { games: manager.listGames() } }, ctx.requestId));
  });

  /* =========================
   * Connections
   * ========================= */

  async function handleFrame(conn: Connection, data: RawData): Promise<void> {
    const reply = (msg: ServerMessage) => conn.outbound.push(msg);

    const parsedJson = safeParseJson(rawDataToString(data));
    if (!parsedJson.ok) {
      reply(makeError("malformed_frame", "Frame is not valid JSON."));
      return;
    }
    const requestId = getRequestId(parsedJson.value);
    const envelope = EnvelopeSchema.safeParse(parsedJson.value);
    if (!envelope.success) {
      reply(makeError("malformed_frame", "Frame must be an object with a string type.", requestId));
      return;
    }

    const player = conn.player;
    const type = envelope.data.type;
    if (player && !auth.isValid(player)) {
      log.info("ws:token_expired", { connId: conn.id, playerId: player.playerId });
      await unbind(conn);
      // AUTH and RECONNECT start over on the same socket.
      if (type !== "AUTH" && type !== "RECONNECT") {
        reply(makeAuthFailure("expired", "Session token expired; authenticate again.", requestId));
        return;
      }
    } else if (player) {
      auth.touch(player);
    }

    const ctx: RouteContext<Connection> = { conn, requestId, reply };
    try {
      await router.dispatch(
        { type, payload: envelope.data.payload, authenticated: conn.player !== null },
        ctx
      );
    } catch (err) {
      log.error("ws:handler_error", { connId: conn.id, type, err });
      reply(makeError("internal_error", "Failed to process message.", requestId));
    }
  }

  const wss = new WebSocketServer({ host: config.host, port: config.port, maxPayload: config.maxMessageBytes });

  wss.on("connection", (ws) => {
    const conn: Connection = {
      id: randomUUID(),
      ws,
      player: null,
      outbound: new OutboundQueue(ws, {
        limit: config.outboundQueueLimit,
        onOverflow: (pending) => log.warn("ws:overflow", { connId: conn.id, pending }),
      }),
      inbound: new SerialQueue(),
      authTimer: null,
      alive: true,
    };
    connections.add(conn);
    log.info("ws:connect", { connId: conn.id });

    conn.authTimer = setTimeout(() => {
      conn.authTimer = null;
      if (conn.player) return;
      log.info("ws:auth_timeout", { connId: conn.id });
      conn.outbound.push(makeAuthFailure("timeout", "Authentication timed out."));
      ws.close(1008, "Authentication timeout");
    }, config.authTimeoutSeconds * 1000);

    ws.on("pong", () => {
      conn.alive = true;
    });

    ws.on("message", (data) => {
      conn.inbound
        .run(() => handleFrame(conn, data))
        .catch((err: unknown) => log.error("ws:frame_error", { connId: conn.id, err }));
    });

    ws.on("close", (code) => {
      connections.delete(conn);
      if (conn.authTimer) clearTimeout(conn.authTimer);
      conn.authTimer = null;
      conn.outbound.close();
      log.info("ws:close", { connId: conn.id, code, playerId: conn.player?.playerId });
      conn.inbound
        .run(() => unbind(conn))
        .catch((err: unknown) => log.error("ws:disconnect_error", { connId: conn.id, err }));
    });

    ws.on("error", (err) => {
      log.warn("ws:error", { connId: conn.id, err });
    });
  });

  const heartbeat =
    config.heartbeatIntervalSeconds > 0
      ? setInterval(() => {
          for (const conn of connections) {
            if (!conn.alive) {
              log.info("ws:heartbeat_timeout", { connId: conn.id });
              conn.ws.terminate();
              continue;
            }
            conn.alive = false;
            conn.ws.ping();
          }
          auth.cleanupExpired();
        }, config.heartbeatIntervalSeconds * 1000)
      : null;

  await new Promise<void>((resolve, reject) => {
    wss.once("listening", () => resolve());
    wss.once("error", reject);
  });

  const address = wss.address();
  const port = address && typeof address === "object" ? address.port : config.port;
  log.info("ws:listening", { host: config.host, port });

  return {
    port,
    router,
    manager,
    auth,
    close: async () => {
      closing = true;
      if (heartbeat) clearInterval(heartbeat);
      manager.shutdown();
      for (const conn of connections) {
        if (conn.authTimer) clearTimeout(conn.authTimer);
        conn.ws.terminate();
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    },
  };
}
