// src/types.ts
//
// Contracts between the multiplayer layer and the game it hosts. The server
// never looks inside a world beyond these methods.

export type PlayerId = string;
export type SessionId = string;
export type EntityId = string;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface Coord {
  x: number;
  y: number;
}

/**
 * One entity as the world reports it.
 * `fields` are canonical and participate in diffing; `hints` are display-only
 * and never reach a snapshot.
 */
export interface EntityRecord {
  id: EntityId;
  kind: string;
  alive: boolean;
  fields: JsonObject;
  hints?: JsonObject;
}

export type Outcome =
  | { ok: true; messages: string[] }
  | { ok: false; reason: string; messages: string[] };

export type GameResult = "victory" | "defeat";

export interface ActionContext<W> {
  world: W;
  playerId: PlayerId;
  entityId: EntityId;
  roundNumber: number;
}

export interface GameAction<W> {
  readonly type: string;
  validate(ctx: ActionContext<W>): boolean;
  execute(ctx: ActionContext<W>): Outcome;
  toJSON(): JsonObject;
}

export interface GameWorld<Self> {
  getPlayer(playerId: PlayerId): EntityRecord | undefined;
  getEntities(): readonly EntityRecord[];
  apply(action: GameAction<Self>, ctx: ActionContext<Self>): Outcome;
  isGameOver(): boolean;
  result(): GameResult | null;
  spawnPlayer(playerId: PlayerId, displayName: string, at: Coord): EntityId;
  removePlayer(playerId: PlayerId): void;
  describeMap(): JsonValue;
}

export interface MapGenerator<M> {
  generate(seed: number): M;
  findSpawnPositions(map: M, count: number): Coord[];
}

export interface RoundContext<W> {
  world: W;
  roundNumber: number;
  /** Players still on the roster, connected or not. */
  playerIds: readonly PlayerId[];
}

export interface TurnSystem<W> {
  processRound(ctx: RoundContext<W>): void;
}

export interface ActionDecoder<W> {
  decode(actionType: string, params: unknown): DecodeResult<W>;
}

export type DecodeResult<W> =
  | { ok: true; action: GameAction<W> }
  | { ok: false; code: "unknown_action" | "invalid_params"; message: string };

export interface GameRules<W extends GameWorld<W>, M> {
  mapGenerator: MapGenerator<M>;
  createWorld(map: M, seed: number): W;
  turnSystem: TurnSystem<W>;
  codec: ActionDecoder<W>;
}
