import { randomInt } from "node:crypto";
import type {
  ActionContext,
  EntityId,
  GameRules,
  GameWorld,
  JsonObject,
  Outcome,
  PlayerId,
  SessionId,
} from "../types";
import {
  StateSynchronizer,
  documentToJson,
  entityDocuments,
  stableStringify,
  type StateDocument,
  type StateSnapshot,
} from "../sync";
import type { PlayerSession } from "./auth";
import type { Logger } from "./log";
import {
  fail,
  makeSystem,
  withRequestId,
  type ChatEntry,
  type DeltaMessage,
  type GameSummary,
  type LeaveReason,
  type Result,
  type ServerMessage,
  type SessionResult,
  type SessionStatus,
  type StateMessage,
} from "./protocol";

export type SessionSink = {
  send(playerId: PlayerId, msg: ServerMessage): void;
};

export type RosterSlot = {
  player: PlayerSession;
  entityId: EntityId | null;
  ready: boolean;
  passed: boolean;
  connected: boolean;
  /** Epoch ms after which a disconnected slot is removed. */
  deadline: number | null;
  joinedAt: number;
};

export type RoundState = {
  roundNumber: number;
  actionsTaken: number;
  maxActions: number;
};

export type ActionEnvelope = {
  sequence: number;
  playerId: PlayerId;
  actionType: string;
  params: unknown;
  timestamp: number;
};

export type ActionRequest = {
  playerId: PlayerId;
  actionType: string;
  params: unknown;
  requestId?: string;
};

export type GameSessionOptions<W extends GameWorld<W>, M> = {
  id: SessionId;
  name: string;
  maxPlayers: number;
  maxActionsPerRound: number;
  chatHistoryLimit: number;
  maxChatLength: number;
  rules: GameRules<W, M>;
  sink: SessionSink;
  logger: Logger;
  now?: () => number;
  seedSource?: () => number;
  onEnded?: (session: GameSession<W, M>) => void;
};

type PublishOptions = {
  echo?: { playerId: PlayerId; requestId?: string };
  exclude?: PlayerId;
  messages?: string[];
};

/**
 * One shared dungeon run. Every method is synchronous and must be called from
 * the session's serial queue; nothing else mutates the world.
 */
export class GameSession<W extends GameWorld<W>, M> {
  readonly id: SessionId;
  readonly name: string;
  readonly maxPlayers: number;
  readonly createdAt: number;

  status: SessionStatus = "LOBBY";
  result: SessionResult | null = null;
  seed: number | null = null;

  readonly roster = new Map<PlayerId, RosterSlot>();
  readonly round: RoundState;
  readonly roundLog: ActionEnvelope[] = [];
  readonly chat: ChatEntry[] = [];

  private world: W | null = null;
  private sequence = 0;
  private readonly sync: StateSynchronizer;
  private readonly opts: GameSessionOptions<W, M>;
  private readonly now: () => number;

  constructor(opts: GameSessionOptions<W, M>) {
    this.opts = opts;
    this.id = opts.id;
    this.name = opts.name;
    this.maxPlayers = opts.maxPlayers;
    this.now = opts.now ?? (() => Date.now());
    this.createdAt = this.now();
    this.round = { roundNumber: 0, actionsTaken: 0, maxActions: opts.maxActionsPerRound };
    this.sync = new StateSynchronizer(this.buildDocument());
  }

  /* =========================
   * Read side
   * ========================= */

  getWorld(): W | null {
    return this.world;
  }

  get isEmpty(): boolean {
    return this.roster.size === 0;
  }

  get isFull(): boolean {
    return this.roster.size >= this.maxPlayers;
  }

  slot(playerId: PlayerId): RosterSlot | undefined {
    return this.roster.get(playerId);
  }

  snapshot(): StateSnapshot {
    return this.sync.current();
  }

  summary(): GameSummary {
    return {
      session_id: this.id,
      name: this.name,
      status: this.status,
      players: this.roster.size,
      max_players: this.maxPlayers,
    };
  }

  stateMessage(requestId?: string): StateMessage {
    const { revision, state } = this.sync.current();
    return withRequestId<StateMessage>(
      {
        type: "STATE",
        payload: {
          session_id: this.id,
          revision,
          state: documentToJson(state),
          map: this.world ? this.world.describeMap() : null,
          chat: this.chat.map((c) => ({ ...c })),
          game_over: this.status === "ENDED",
        },
      },
      requestId
    );
  }

  sendSnapshot(playerId: PlayerId, requestId?: string): void {
    this.opts.sink.send(playerId, this.stateMessage(requestId));
  }

  /* =========================
   * Roster
   * ========================= */

  join(player: PlayerSession): Result<{ rejoined: boolean }> {
    if (this.status === "ENDED") return fail("invalid_state", "Game has ended.");

    const existing = this.roster.get(player.playerId);
    if (existing) {
      if (!existing.connected) {
        this.markReconnected(player.playerId);
        return { ok: true, rejoined: true };
      }
      return fail("already_in_game", "Already in this game.");
    }

    if (this.status === "ACTIVE") return fail("invalid_state", "Game already started.");
    if (this.isFull) return fail("session_full", "Game is full.");

    this.roster.set(player.playerId, {
      player,
      entityId: null,
      ready: false,
      passed: false,
      connected: true,
      deadline: null,
      joinedAt: this.now(),
    });
    player.gameSessionId = this.id;

    this.broadcast(
      { type: "PLAYER_JOINED", payload: { player_id: player.playerId, display_name: player.displayName } },
      player.playerId
    );
    this.publish({ exclude: player.playerId });
    this.opts.logger.info("session:join", { sessionId: this.id, playerId: player.playerId });
    return { ok: true, rejoined: false };
  }

  /**
   * LOBBY and ENDED: drop the slot. ACTIVE: keep the slot (and entity) until
   * the disconnect deadline and release the player.
   */
  leave(playerId: PlayerId, deadline: number): Result {
    const slot = this.roster.get(playerId);
    if (!slot) return fail("not_in_game", "Not in this game.");

    if (this.status !== "ACTIVE") {
      this.removePlayer(playerId, "left");
      return { ok: true };
    }

    this.disconnectSlot(slot, deadline, "left");
    this.release(slot.player);
    this.afterRosterChange();
    return { ok: true };
  }

  markDisconnected(playerId: PlayerId, deadline: number): void {
    const slot = this.roster.get(playerId);
    if (!slot || !slot.connected) return;
    this.disconnectSlot(slot, deadline, "disconnected");
    this.afterRosterChange();
  }

  markReconnected(playerId: PlayerId): Result {
    const slot = this.roster.get(playerId);
    if (!slot) return fail("reconnect_expired", "No reserved slot in this game.");
    if (slot.connected) return fail("invalid_state", "Player is already connected.");

    slot.connected = true;
    slot.deadline = null;
    slot.player.gameSessionId = this.id;
    slot.player.disconnectDeadline = null;

    this.broadcast(
      { type: "PLAYER_JOINED", payload: { player_id: playerId, display_name: slot.player.displayName } },
      playerId
    );
    this.publish({ exclude: playerId });
    this.opts.logger.info("session:reconnect", { sessionId: this.id, playerId });
    return { ok: true };
  }

  /** Deadline timer fired: remove the slot if it is still disconnected. */
  expire(playerId: PlayerId): boolean {
    const slot = this.roster.get(playerId);
    if (!slot || slot.connected) return false;
    this.removePlayer(playerId, "expired");
    return true;
  }

  removePlayer(playerId: PlayerId, reason: LeaveReason): void {
    if (!this.dropSlot(playerId, reason)) return;
    this.afterRosterChange();
  }

  /* =========================
   * Lobby
   * ========================= */

  setReady(playerId: PlayerId, ready: boolean, requestId?: string): Result {
    if (this.status !== "LOBBY") return fail("invalid_state", "Game is not in the lobby.");
    const slot = this.roster.get(playerId);
    if (!slot) return fail("not_in_game", "Not in this game.");
    if (!slot.connected) return fail("not_connected", "Player is not connected.");

    slot.ready = ready;
    this.publish({ echo: { playerId, requestId } });
    this.maybeStart();
    return { ok: true };
  }

  /* =========================
   * Active play
   * ========================= */

  submitAction(req: ActionRequest): Result<{ sequence: number }> {
    if (this.status !== "ACTIVE") return fail("invalid_state", "Game is not active.");
    const world = this.world;
    const slot = this.roster.get(req.playerId);
    if (!world || !slot || !slot.entityId) return fail("not_in_game", "Not in this game.");
    if (!slot.connected) return fail("not_connected", "Player is not connected.");
    if (!this.isAlive(req.playerId)) return fail("player_dead", "Your character is dead.");
    if (this.round.actionsTaken >= this.round.maxActions) {
      return fail("budget_exhausted", "No actions left this round.");
    }

    const decoded = this.opts.rules.codec.decode(req.actionType, req.params);
    if (!decoded.ok) return fail(decoded.code, decoded.message);

    const ctx: ActionContext<W> = {
      world,
      playerId: req.playerId,
      entityId: slot.entityId,
      roundNumber: this.round.roundNumber,
    };
    if (!decoded.action.validate(ctx)) return fail("invalid_action", `Cannot ${req.actionType} now.`);

    const before = this.worldFingerprint(world);
    let outcome: Outcome;
    try {
      outcome = world.apply(decoded.action, ctx);
    } catch (err) {
      this.corrupt(`Action ${req.actionType} failed.`, err);
      return fail("internal_error", "Action failed; the game was aborted.");
    }

    if (!outcome.ok) {
      if (this.worldFingerprint(world) !== before) {
        this.corrupt(`Action ${req.actionType} changed the world and then failed.`);
        return fail("internal_error", "Action failed; the game was aborted.");
      }
      return fail("invalid_action", outcome.reason);
    }

    const envelope: ActionEnvelope = {
      sequence: ++this.sequence,
      playerId: req.playerId,
      actionType: req.actionType,
      params: req.params,
      timestamp: this.now(),
    };
    this.roundLog.push(envelope);
    this.round.actionsTaken++;

    this.publish({ echo: { playerId: req.playerId, requestId: req.requestId }, messages: outcome.messages });
    this.opts.logger.debug("session:action", {
      sessionId: this.id,
      playerId: req.playerId,
      action: decoded.action.toJSON(),
      sequence: envelope.sequence,
    });

    if (this.checkGameOver()) return { ok: true, sequence: envelope.sequence };
    if (this.round.actionsTaken >= this.round.maxActions) this.completeRound();
    return { ok: true, sequence: envelope.sequence };
  }

  pass(playerId: PlayerId, requestId?: string): Result {
    if (this.status !== "ACTIVE") return fail("invalid_state", "Game is not active.");
    const slot = this.roster.get(playerId);
    if (!slot) return fail("not_in_game", "Not in this game.");
    if (!slot.connected) return fail("not_connected", "Player is not connected.");
    if (!this.isAlive(playerId)) return fail("player_dead", "Your character is dead.");

    slot.passed = true;
    this.publish({ echo: { playerId, requestId } });
    if (this.everyonePassed()) this.completeRound();
    return { ok: true };
  }

  /* =========================
   * Chat
   * ========================= */

  postChat(playerId: PlayerId, rawText: string, requestId?: string): Result {
    const slot = this.roster.get(playerId);
    if (!slot) return fail("not_in_game", "Not in this game.");
    const text = rawText.trim();
    if (text.length === 0 || text.length > this.opts.maxChatLength) {
      return fail("invalid_payload", `Chat text must be 1-${this.opts.maxChatLength} characters.`);
    }

    const entry: ChatEntry = {
      player_id: playerId,
      display_name: slot.player.displayName,
      text,
      timestamp: this.now(),
    };
    this.chat.push(entry);
    while (this.chat.length > this.opts.chatHistoryLimit) this.chat.shift();

    for (const [pid, s] of this.roster) {
      if (!s.connected) continue;
      const msg: ServerMessage = { type: "CHAT_MESSAGE", payload: { ...entry } };
      this.opts.sink.send(pid, pid === playerId ? withRequestId(msg, requestId) : msg);
    }
    return { ok: true };
  }

  /* =========================
   * Lifecycle
   * ========================= */

  end(result: SessionResult): void {
    if (this.status === "ENDED") return;
    this.status = "ENDED";
    this.result = result;

    this.broadcast({ type: "GAME_END", payload: { result, round_number: this.round.roundNumber } });
    this.sync.rebase(this.buildDocument());
    for (const [pid, s] of this.roster) if (s.connected) this.sendSnapshot(pid);

    this.opts.logger.info("session:end", { sessionId: this.id, result, round: this.round.roundNumber });
    this.opts.onEnded?.(this);
  }

  corrupt(reason: string, err?: unknown): void {
    this.opts.logger.error("session:corrupt", { sessionId: this.id, reason, err });
    this.broadcast(makeSystem("error", `${reason} The game has been aborted.`));
    this.end("aborted");
  }

  /** Players still on the roster who have not been released to another game. */
  memberIds(): PlayerId[] {
    const out: PlayerId[] = [];
    for (const [pid, s] of this.roster) if (s.player.gameSessionId === this.id) out.push(pid);
    return out;
  }

  /* =========================
   * Internals
   * ========================= */

  private maybeStart(): void {
    if (this.status !== "LOBBY" || this.roster.size === 0) return;
    for (const s of this.roster.values()) if (!s.ready || !s.connected) return;
    this.start();
  }

  private start(): void {
    const { rules } = this.opts;
    const seed = (this.opts.seedSource ?? (() => randomInt(0, 0x7fffffff)))();
    const ids = [...this.roster.keys()];

    let world: W;
    try {
      const map = rules.mapGenerator.generate(seed);
      const spawns = rules.mapGenerator.findSpawnPositions(map, ids.length);
      const distinct = new Set(spawns.map((c) => `${c.x},${c.y}`));
      if (spawns.length < ids.length || distinct.size !== spawns.length) {
        throw new Error(`Map ${seed} has ${distinct.size} spawn positions for ${ids.length} players.`);
      }

      world = rules.createWorld(map, seed);
      for (let i = 0; i < ids.length; i++) {
        const pid = ids[i];
        const slot = pid ? this.roster.get(pid) : undefined;
        const at = spawns[i];
        if (!pid || !slot || !at) continue;
        slot.entityId = world.spawnPlayer(pid, slot.player.displayName, at);
      }
    } catch (err) {
      this.seed = seed;
      this.corrupt("Could not set up the dungeon.", err);
      return;
    }

    this.world = world;
    this.seed = seed;
    this.status = "ACTIVE";
    this.round.roundNumber = 1;
    this.round.actionsTaken = 0;
    for (const s of this.roster.values()) s.passed = false;

    const players = ids.flatMap((pid) => {
      const s = this.roster.get(pid);
      return s && s.entityId
        ? [{ player_id: pid, display_name: s.player.displayName, entity_id: s.entityId }]
        : [];
    });
    this.broadcast({
      type: "GAME_START",
      payload: {
        session_id: this.id,
        seed,
        round_number: this.round.roundNumber,
        max_actions: this.round.maxActions,
        players,
      },
    });
    this.sync.rebase(this.buildDocument());
    for (const [pid, s] of this.roster) if (s.connected) this.sendSnapshot(pid);

    this.opts.logger.info("session:start", { sessionId: this.id, seed, players: ids.length });
  }

  private completeRound(): void {
    const world = this.world;
    if (!world || this.status !== "ACTIVE") return;

    // Overdue disconnects leave before the environment acts.
    const t = this.now();
    for (const [pid, s] of [...this.roster]) {
      if (!s.connected && s.deadline !== null && s.deadline <= t) this.dropSlot(pid, "expired");
    }
    if (this.roster.size === 0) {
      this.end("abandoned");
      return;
    }

    try {
      this.opts.rules.turnSystem.processRound({
        world,
        roundNumber: this.round.roundNumber,
        playerIds: [...this.roster.keys()],
      });
    } catch (err) {
      this.corrupt("The dungeon failed to take its turn.", err);
      return;
    }

    this.round.roundNumber++;
    this.round.actionsTaken = 0;
    this.roundLog.length = 0;
    for (const s of this.roster.values()) s.passed = false;

    this.publish({ messages: [`Round ${this.round.roundNumber} begins.`] });
    this.checkGameOver();
  }

  private checkGameOver(): boolean {
    const world = this.world;
    if (!world || this.status !== "ACTIVE" || !world.isGameOver()) return false;
    this.end(world.result() ?? "defeat");
    return true;
  }

  private everyonePassed(): boolean {
    let connectedAlive = 0;
    for (const [pid, s] of this.roster) {
      if (!s.connected || !this.isAlive(pid)) continue;
      connectedAlive++;
      if (!s.passed) return false;
    }
    return connectedAlive > 0;
  }

  private afterRosterChange(): void {
    if (this.status === "LOBBY") {
      this.maybeStart();
      return;
    }
    if (this.status !== "ACTIVE") return;
    if (this.roster.size === 0) {
      this.end("abandoned");
      return;
    }
    if (this.checkGameOver()) return;
    if (this.everyonePassed()) this.completeRound();
  }

  private disconnectSlot(slot: RosterSlot, deadline: number, reason: LeaveReason): void {
    slot.connected = false;
    slot.ready = false;
    slot.passed = false;
    slot.deadline = deadline;

    const playerId = slot.player.playerId;
    this.broadcast({
      type: "PLAYER_LEFT",
      payload: { player_id: playerId, display_name: slot.player.displayName, reason },
    });
    this.publish();
    this.opts.logger.info("session:disconnect", { sessionId: this.id, playerId, reason, deadline });
  }

  /** Remove a slot and its entity without running follow-up transitions. */
  private dropSlot(playerId: PlayerId, reason: LeaveReason): boolean {
    const slot = this.roster.get(playerId);
    if (!slot) return false;

    this.roster.delete(playerId);
    if (this.world && slot.entityId) this.world.removePlayer(playerId);
    this.release(slot.player);

    this.broadcast({
      type: "PLAYER_LEFT",
      payload: { player_id: playerId, display_name: slot.player.displayName, reason },
    });
    this.publish();
    this.opts.logger.info("session:remove", { sessionId: this.id, playerId, reason });
    return true;
  }

  private release(player: PlayerSession): void {
    if (player.gameSessionId === this.id) player.gameSessionId = null;
  }

  private isAlive(playerId: PlayerId): boolean {
    if (!this.world) return true;
    return this.world.getPlayer(playerId)?.alive ?? false;
  }

  private worldFingerprint(world: W): string {
    return stableStringify(entityDocuments(world.getEntities()));
  }

  private buildDocument(): StateDocument {
    const world = this.world;
    const players: Record<string, JsonObject> = {};
    for (const [pid, s] of this.roster) {
      players[pid] = {
        displayName: s.player.displayName,
        entityId: s.entityId,
        ready: s.ready,
        passed: s.passed,
        connected: s.connected,
        alive: this.isAlive(pid),
      };
    }

    return {
      meta: {
        status: this.status,
        roundNumber: this.round.roundNumber,
        actionsTaken: this.round.actionsTaken,
        maxActions: this.round.maxActions,
        gameOver: this.status === "ENDED",
        result: this.result,
      },
      players,
      entities: world ? entityDocuments(world.getEntities()) : {},
    };
  }

  private broadcast(msg: ServerMessage, exclude?: PlayerId): void {
    for (const [pid, s] of this.roster) {
      if (pid === exclude || !s.connected) continue;
      this.opts.sink.send(pid, msg);
    }
  }

  /** Commit the current state and send the resulting DELTA, if any. */
  private publish(opts: PublishOptions = {}): boolean {
    const delta = this.sync.commit(this.buildDocument());
    if (!delta) return false;

    const msg: DeltaMessage = {
      type: "DELTA",
      payload: {
        session_id: this.id,
        base_revision: delta.baseRevision,
        new_revision: delta.newRevision,
        ...(delta.meta ? { meta: delta.meta } : {}),
        players: delta.players,
        entities: delta.entities,
        messages: opts.messages ?? [],
      },
    };

    for (const [pid, s] of this.roster) {
      if (pid === opts.exclude || !s.connected) continue;
      const echo = opts.echo && opts.echo.playerId === pid ? opts.echo.requestId : undefined;
      this.opts.sink.send(pid, withRequestId(msg, echo));
    }
    return true;
  }
}
