import type { GameRules, GameWorld, PlayerId, SessionId } from "../types";
import type { PlayerSession } from "./auth";
import type { ServerConfig } from "./config";
import { GameSession, type SessionSink } from "./gameSession";
import type { Logger } from "./log";
import { fail, makeSystem, type GameSummary, type Result } from "./protocol";
import { SerialQueue } from "./serialQueue";

const ROOM_CODE_ALPHABET = "ABCDEFGHJKLMNPQRSTUVWXYZ23456789";

export function makeRoomCode(): string {
  let out = "";
  for (let i = 0; i < 6; i++) out += ROOM_CODE_ALPHABET[Math.floor(Math.random() * ROOM_CODE_ALPHABET.length)];
  return out;
}

export type SessionManagerConfig = Pick<
  ServerConfig,
  | "maxPlayersPerSession"
  | "maxActionsPerRound"
  | "disconnectDeadlineSeconds"
  | "sessionGracePeriodSeconds"
  | "chatHistoryLimit"
  | "maxChatLength"
>;

export type SessionManagerOptions<W extends GameWorld<W>, M> = {
  config: SessionManagerConfig;
  rules: GameRules<W, M>;
  sink: SessionSink;
  logger: Logger;
  now?: () => number;
  seedSource?: () => number;
  makeId?: () => SessionId;
};

export type CreateGameOptions = {
  name?: string;
  maxPlayers?: number;
};

/**
 * Registry of live sessions. Each session has its own serial queue; every
 * method below that touches a session must run inside `run(sessionId, ...)`.
 */
export class SessionManager<W extends GameWorld<W>, M> {
  private readonly sessions = new Map<SessionId, GameSession<W, M>>();
  private readonly queues = new Map<SessionId, SerialQueue>();
  private readonly deadlineTimers = new Map<string, NodeJS.Timeout>();
  private readonly teardownTimers = new Map<SessionId, NodeJS.Timeout>();
  private readonly now: () => number;

  constructor(private readonly opts: SessionManagerOptions<W, M>) {
    this.now = opts.now ?? (() => Date.now());
  }

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: SessionId): GameSession<W, M> | undefined {
    return this.sessions.get(sessionId);
  }

  /** Number of per-session queues currently held. */
  get queueCount(): number {
    return this.queues.size;
  }

  /**
   * Queue `task` behind every earlier task for the same session. A queue for
   * an id with no session is dropped as soon as it goes idle.
   */
  run<T>(sessionId: SessionId, task: () => T): Promise<T> {
    let queue = this.queues.get(sessionId);
    if (!queue) {
      queue = new SerialQueue();
      this.queues.set(sessionId, queue);
    }
    const owner = queue;
    return owner.run(task).finally(() => this.releaseQueue(sessionId, owner));
  }

  newSessionId(): SessionId {
    const make = this.opts.makeId ?? makeRoomCode;
    for (let attempt = 0; attempt < 100; attempt++) {
      const id = make();
      if (!this.sessions.has(id)) return id;
    }
    throw new Error("Could not allocate a free session id.");
  }

  createGame(owner: PlayerSession, sessionId: SessionId, opts: CreateGameOptions = {}): Result<{ session: GameSession<W, M> }> {
    if (owner.gameSessionId) return fail("already_in_game", "Leave your current game first.");
    if (this.sessions.has(sessionId)) return fail("invalid_state", `Session ${sessionId} already exists.`);

    const { config } = this.opts;
    const session = new GameSession<W, M>({
      id: sessionId,
      name: opts.name ?? `${owner.displayName}'s game`,
      maxPlayers: Math.min(opts.maxPlayers ?? config.maxPlayersPerSession, config.maxPlayersPerSession),
      maxActionsPerRound: config.maxActionsPerRound,
      chatHistoryLimit: config.chatHistoryLimit,
      maxChatLength: config.maxChatLength,
      rules: this.opts.rules,
      sink: this.opts.sink,
      logger: this.opts.logger,
      now: this.now,
      seedSource: this.opts.seedSource,
      onEnded: (s) => this.scheduleTeardown(s.id),
    });
    this.sessions.set(sessionId, session);

    const joined = session.join(owner);
    if (!joined.ok) {
      this.sessions.delete(sessionId);
      return joined;
    }
    this.opts.logger.info("session:create", { sessionId, owner: owner.playerId });
    return { ok: true, session };
  }

  joinGame(sessionId: SessionId, player: PlayerSession): Result<{ session: GameSession<W, M>; rejoined: boolean }> {
    if (player.gameSessionId) return fail("already_in_game", "Leave your current game first.");
    const session = this.sessions.get(sessionId);
    if (!session) return fail("session_not_found", `No session ${sessionId}.`);

    const joined = session.join(player);
    if (!joined.ok) return joined;
    if (joined.rejoined) this.clearDeadline(sessionId, player.playerId);
    return { ok: true, session, rejoined: joined.rejoined };
  }

  reconnect(player: PlayerSession, sessionId: SessionId): Result<{ session: GameSession<W, M> }> {
    if (player.gameSessionId && player.gameSessionId !== sessionId) {
      return fail("already_in_game", "Leave your current game first.");
    }
    const session = this.sessions.get(sessionId);
    const slot = session?.slot(player.playerId);
    if (!session || !slot) return fail("reconnect_expired", "The reserved slot is gone.");
    if (slot.connected) return fail("invalid_state", "Player is already connected to this game.");
    if (slot.deadline !== null && slot.deadline <= this.now()) {
      return fail("reconnect_expired", "The reconnect deadline has passed.");
    }

    const res = session.markReconnected(player.playerId);
    if (!res.ok) return res;
    this.clearDeadline(sessionId, player.playerId);
    return { ok: true, session };
  }

  leaveGame(player: PlayerSession): Result<{ sessionId: SessionId }> {
    const sessionId = player.gameSessionId;
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!sessionId || !session) {
      player.gameSessionId = null;
      return fail("not_in_game", "You are not in a game.");
    }

    const wasActive = session.status === "ACTIVE";
    const res = session.leave(player.playerId, this.deadline());
    if (!res.ok) return res;
    if (wasActive && session.slot(player.playerId)) this.scheduleDeadline(session, player.playerId);

    this.reap(session);
    return { ok: true, sessionId };
  }

  /** Socket closed: keep the slot until the disconnect deadline. */
  disconnect(player: PlayerSession): void {
    const sessionId = player.gameSessionId;
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!session) return;

    const deadline = this.deadline();
    player.disconnectDeadline = deadline;
    session.markDisconnected(player.playerId, deadline);
    if (session.slot(player.playerId)) this.scheduleDeadline(session, player.playerId);
    this.reap(session);
  }

  listGames(): GameSummary[] {
    const out: GameSummary[] = [];
    for (const s of this.sessions.values()) {
      if (s.status === "LOBBY" && !s.isFull) out.push(s.summary());
    }
    return out.sort((a, b) => (a.session_id < b.session_id ? -1 : a.session_id > b.session_id ? 1 : 0));
  }

  /** Remove a session, releasing and notifying whoever is still in it. */
  teardown(sessionId: SessionId): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;

    const timer = this.teardownTimers.get(sessionId);
    if (timer) clearTimeout(timer);
    this.teardownTimers.delete(sessionId);
    for (const pid of session.roster.keys()) this.clearDeadline(sessionId, pid);

    for (const pid of session.memberIds()) {
      const slot = session.slot(pid);
      if (!slot) continue;
      slot.player.gameSessionId = null;
      if (!slot.connected) continue;
      this.opts.sink.send(pid, makeSystem("info", `Session ${sessionId} has closed.`));
      this.opts.sink.send(pid, { type: "GAME_LEFT", payload: { session_id: sessionId } });
    }

    this.sessions.delete(sessionId);
    this.queues.delete(sessionId);
    this.opts.logger.info("session:teardown", { sessionId });
  }

  shutdown(): void {
    for (const t of this.deadlineTimers.values()) clearTimeout(t);
    for (const t of this.teardownTimers.values()) clearTimeout(t);
    this.deadlineTimers.clear();
    this.teardownTimers.clear();
  }

  private releaseQueue(sessionId: SessionId, queue: SerialQueue): void {
    if (this.queues.get(sessionId) !== queue || queue.size > 0 || this.sessions.has(sessionId)) return;
    this.queues.delete(sessionId);
  }

  private deadline(): number {
    return this.now() + this.opts.config.disconnectDeadlineSeconds * 1000;
  }

  /** An empty lobby goes away at once; an ended session after the grace period. */
  private reap(session: GameSession<W, M>): void {
    if (session.status === "LOBBY" && session.isEmpty) this.teardown(session.id);
  }

  private scheduleDeadline(session: GameSession<W, M>, playerId: PlayerId): void {
    const key = `${session.id}:${playerId}`;
    this.clearDeadline(session.id, playerId);

    const sessionId = session.id;
    const timer = setTimeout(() => {
      this.deadlineTimers.delete(key);
      this.run(sessionId, () => {
        const s = this.sessions.get(sessionId);
        if (!s || !s.expire(playerId)) return;
        this.reap(s);
      }).catch((err: unknown) => this.opts.logger.error("session:deadline_error", { sessionId, playerId, err }));
    }, this.opts.config.disconnectDeadlineSeconds * 1000);
    this.deadlineTimers.set(key, timer);
  }

  private clearDeadline(sessionId: SessionId, playerId: PlayerId): void {
    const key = `${sessionId}:${playerId}`;
    const timer = this.deadlineTimers.get(key);
    if (timer) clearTimeout(timer);
    this.deadlineTimers.delete(key);
  }

  private scheduleTeardown(sessionId: SessionId): void {
    if (this.teardownTimers.has(sessionId)) return;
    const timer = setTimeout(() => {
      this.teardownTimers.delete(sessionId);
      this.run(sessionId, () => this.teardown(sessionId)).catch((err: unknown) =>
        this.opts.logger.error("session:teardown_error", { sessionId, err })
      );
    }, this.opts.config.sessionGracePeriodSeconds * 1000);
    this.teardownTimers.set(sessionId, timer);
  }
}
