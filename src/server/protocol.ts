// src/server/protocol.ts

import type { GameResult, JsonObject, JsonValue, PlayerId, SessionId } from "../types";
import type { EntityChange } from "../sync";

/* =========================
 * Envelope
 * ========================= */

export type Envelope<T extends string, P> = {
  type: T;
  payload: P;
  request_id?: string;
};

export const CLIENT_MESSAGE_TYPES = [
  "AUTH",
  "CREATE_GAME",
  "JOIN_GAME",
  "LEAVE_GAME",
  "READY",
  "ACTION",
  "CHAT",
  "RECONNECT",
  "PASS",
  "RESYNC",
  "LIST_GAMES",
] as const;

export type ClientMessageType = (typeof CLIENT_MESSAGE_TYPES)[number];

/* =========================
 * Error reasons
 * ========================= */

export type ErrorReason =
  | "malformed_frame"
  | "unknown_message"
  | "invalid_payload"
  | "not_authenticated"
  | "invalid_state"
  | "already_in_game"
  | "not_in_game"
  | "session_not_found"
  | "session_full"
  | "reconnect_expired"
  | "unknown_action"
  | "invalid_params"
  | "invalid_action"
  | "budget_exhausted"
  | "player_dead"
  | "not_connected"
  | "internal_error";

export type AuthFailureReason = "invalid_name" | "invalid_token" | "expired" | "timeout";

/** Result shape shared by the manager, session and auth registry. */
export type Result<T = unknown> = ({ ok: true } & T) | { ok: false; error: { code: ErrorReason; message: string } };

export function fail(code: ErrorReason, message: string): { ok: false; error: { code: ErrorReason; message: string } } {
  return { ok: false, error: { code, message } };
}

/* =========================
 * Server → Client messages
 * ========================= */

export type SessionStatus = "LOBBY" | "ACTIVE" | "ENDED";
export type SessionResult = GameResult | "abandoned" | "aborted";
export type SystemLevel = "info" | "warn" | "error";
export type LeaveReason = "left" | "disconnected" | "expired";

export type AuthSuccessMessage = Envelope<"AUTH_SUCCESS", { player_id: PlayerId; token: string; display_name: string }>;
export type AuthFailureMessage = Envelope<"AUTH_FAILURE", { reason: AuthFailureReason; message: string }>;
export type ErrorMessage = Envelope<"ERROR", { reason: ErrorReason; message: string }>;
export type SystemMessage = Envelope<"SYSTEM", { level: SystemLevel; message: string }>;

export type ChatEntry = {
  player_id: PlayerId;
  display_name: string;
  text: string;
  timestamp: number;
};

export type StateMessage = Envelope<
  "STATE",
  {
    session_id: SessionId;
    revision: number;
    state: JsonObject;
    map: JsonValue;
    chat: ChatEntry[];
    game_over: boolean;
  }
>;

export type DeltaMessage = Envelope<
  "DELTA",
  {
    session_id: SessionId;
    base_revision: number;
    new_revision: number;
    meta?: JsonObject;
    players: EntityChange[];
    entities: EntityChange[];
    messages: string[];
  }
>;

export type ChatMessage = Envelope<"CHAT_MESSAGE", ChatEntry>;
export type PlayerJoinedMessage = Envelope<"PLAYER_JOINED", { player_id: PlayerId; display_name: string }>;
export type PlayerLeftMessage = Envelope<
  "PLAYER_LEFT",
  { player_id: PlayerId; display_name: string; reason: LeaveReason }
>;

export type GameStartMessage = Envelope<
  "GAME_START",
  {
    session_id: SessionId;
    seed: number;
    round_number: number;
    max_actions: number;
    players: { player_id: PlayerId; display_name: string; entity_id: string }[];
  }
>;

export type GameEndMessage = Envelope<"GAME_END", { result: SessionResult; round_number: number }>;

export type GameSummary = {
  session_id: SessionId;
  name: string;
  status: SessionStatus;
  players: number;
  max_players: number;
};

export type GameJoinedMessage = Envelope<"GAME_JOINED", GameSummary>;
export type GameLeftMessage = Envelope<"GAME_LEFT", { session_id: SessionId }>;
export type GameListMessage = Envelope<"GAME_LIST", { games: GameSummary[] }>;

export type ServerMessage =
  | AuthSuccessMessage
  | AuthFailureMessage
  | ErrorMessage
  | SystemMessage
  | StateMessage
  | DeltaMessage
  | ChatMessage
  | PlayerJoinedMessage
  | PlayerLeftMessage
  | GameStartMessage
  | GameEndMessage
  | GameJoinedMessage
  | GameLeftMessage
  | GameListMessage;

export type ServerMessageType = ServerMessage["type"];

/**
 * Messages the outbound queue may shed under pressure. Everything else,
 * STATE and DELTA in particular, is always delivered.
 */
const DROPPABLE_TYPES: ReadonlySet<ServerMessageType> = new Set<ServerMessageType>([
  "CHAT_MESSAGE",
  "SYSTEM",
  "PLAYER_JOINED",
  "PLAYER_LEFT",
  "GAME_LIST",
]);

/** SYSTEM errors are kept even though SYSTEM is otherwise droppable. */
export function isDroppable(msg: ServerMessage): boolean {
  if (msg.type === "SYSTEM" && msg.payload.level === "error") return false;
  return DROPPABLE_TYPES.has(msg.type);
}

/* =========================
 * Builders
 * ========================= */

export function withRequestId<T extends ServerMessage>(msg: T, requestId?: string): T {
  if (!requestId) return msg;
  return { ...msg, request_id: requestId };
}

export function makeError(reason: ErrorReason, message: string, requestId?: string): ErrorMessage {
  return withRequestId<ErrorMessage>({ type: "ERROR", payload: { reason, message } }, requestId);
}

export function makeAuthFailure(reason: AuthFailureReason, message: string, requestId?: string): AuthFailureMessage {
  return withRequestId<AuthFailureMessage>({ type: "AUTH_FAILURE", payload: { reason, message } }, requestId);
}

export function makeSystem(level: SystemLevel, message: string): SystemMessage {
  return { type: "SYSTEM", payload: { level, message } };
}
