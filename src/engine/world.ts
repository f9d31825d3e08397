import type {
  ActionContext,
  Coord,
  EntityId,
  EntityRecord,
  GameAction,
  GameResult,
  GameWorld,
  JsonValue,
  Outcome,
  PlayerId,
} from "../types";
import { type DungeonMap, isWalkable } from "./dungeonMap";

export const PLAYER_STATS = { hp: 10, attack: 3 } as const;
export const MONSTER_STATS = { name: "cave rat", hp: 4, attack: 1 } as const;

export type Actor = {
  id: EntityId;
  kind: "player" | "monster";
  name: string;
  x: number;
  y: number;
  hp: number;
  maxHp: number;
  attack: number;
  inventory: string[];
  playerId?: PlayerId;
};

export type Item = {
  id: EntityId;
  kind: "item";
  name: string;
  x: number;
  y: number;
};

type Entity = Actor | Item;

export function playerEntityId(playerId: PlayerId): EntityId {
  return `player:${playerId}`;
}

export function chebyshev(a: Coord, b: Coord): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

function toRecord(e: Entity): EntityRecord {
  if (e.kind === "item") {
    return {
      id: e.id,
      kind: e.kind,
      alive: true,
      fields: { name: e.name, x: e.x, y: e.y },
      hints: { glyph: "!" },
    };
  }

  const fields: Record<string, JsonValue> = {
    name: e.name,
    x: e.x,
    y: e.y,
    hp: e.hp,
    maxHp: e.maxHp,
    attack: e.attack,
    inventory: [...e.inventory],
  };
  if (e.playerId) fields.playerId = e.playerId;

  return {
    id: e.id,
    kind: e.kind,
    alive: e.hp > 0,
    fields,
    hints: { glyph: e.kind === "player" ? "@" : "r" },
  };
}

/**
 * Reference world: one floor, players, monsters and loot. Monsters are
 * deleted when killed; players stay on the floor at 0 hp.
 */
export class DungeonWorld implements GameWorld<DungeonWorld> {
  readonly map: DungeonMap;
  readonly seed: number;

  private readonly entities = new Map<EntityId, Entity>();
  private readonly byPlayer = new Map<PlayerId, EntityId>();

  constructor(map: DungeonMap, seed: number) {
    this.map = map;
    this.seed = seed;

    map.monsterSpawns.forEach((at, i) => {
      const id = `m${i + 1}`;
      this.entities.set(id, {
        id,
        kind: "monster",
        name: MONSTER_STATS.name,
        x: at.x,
        y: at.y,
        hp: MONSTER_STATS.hp,
        maxHp: MONSTER_STATS.hp,
        attack: MONSTER_STATS.attack,
        inventory: [],
      });
    });

    map.itemSpawns.forEach((spawn, i) => {
      const id = `i${i + 1}`;
      this.entities.set(id, { id, kind: "item", name: spawn.item, x: spawn.at.x, y: spawn.at.y });
    });
  }

  getPlayer(playerId: PlayerId): EntityRecord | undefined {
    const id = this.byPlayer.get(playerId);
    const e = id ? this.entities.get(id) : undefined;
    return e ? toRecord(e) : undefined;
  }

  getEntities(): readonly EntityRecord[] {
    return [...this.entities.values()].map(toRecord);
  }

  apply(action: GameAction<DungeonWorld>, ctx: ActionContext<DungeonWorld>): Outcome {
    return action.execute(ctx);
  }

  isGameOver(): boolean {
    return this.result() !== null;
  }

  result(): GameResult | null {
    const players = this.players();
    if (players.length === 0) return null;
    const { exit } = this.map;
    if (players.some((p) => p.hp > 0 && p.x === exit.x && p.y === exit.y)) return "victory";
    if (players.every((p) => p.hp <= 0)) return "defeat";
    return null;
  }

  spawnPlayer(playerId: PlayerId, displayName: string, at: Coord): EntityId {
    if (!isWalkable(this.map, at.x, at.y) || this.blockerAt(at.x, at.y)) {
      throw new Error(`Cannot spawn ${playerId} at ${at.x},${at.y}.`);
    }
    const id = playerEntityId(playerId);
    this.entities.set(id, {
      id,
      kind: "player",
      name: displayName,
      x: at.x,
      y: at.y,
      hp: PLAYER_STATS.hp,
      maxHp: PLAYER_STATS.hp,
      attack: PLAYER_STATS.attack,
      inventory: [],
      playerId,
    });
    this.byPlayer.set(playerId, id);
    return id;
  }

  removePlayer(playerId: PlayerId): void {
    const id = this.byPlayer.get(playerId);
    if (!id) return;
    this.entities.delete(id);
    this.byPlayer.delete(playerId);
  }

  describeMap(): JsonValue {
    const { width, height, tiles, exit } = this.map;
    return { width, height, tiles: [...tiles], exit: { x: exit.x, y: exit.y } };
  }

  // Mutation helpers for actions and the monster turn.

  actor(id: EntityId): Actor | undefined {
    const e = this.entities.get(id);
    return e && e.kind !== "item" ? e : undefined;
  }

  players(): Actor[] {
    const out: Actor[] = [];
    for (const e of this.entities.values()) if (e.kind === "player") out.push(e);
    return out;
  }

  monsters(): Actor[] {
    const out: Actor[] = [];
    for (const e of this.entities.values()) if (e.kind === "monster" && e.hp > 0) out.push(e);
    return out.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  blockerAt(x: number, y: number): Actor | undefined {
    for (const e of this.entities.values()) {
      if (e.kind !== "item" && e.hp > 0 && e.x === x && e.y === y) return e;
    }
    return undefined;
  }

  itemsAt(x: number, y: number): Item[] {
    const out: Item[] = [];
    for (const e of this.entities.values()) if (e.kind === "item" && e.x === x && e.y === y) out.push(e);
    return out;
  }

  canEnter(x: number, y: number): boolean {
    return isWalkable(this.map, x, y) && !this.blockerAt(x, y);
  }

  moveActor(actor: Actor, x: number, y: number): void {
    actor.x = x;
    actor.y = y;
  }

  /** Returns true when the hit was lethal. */
  damage(target: Actor, amount: number): boolean {
    target.hp = Math.max(0, target.hp - amount);
    if (target.hp > 0) return false;
    if (target.kind === "monster") this.entities.delete(target.id);
    return true;
  }

  pickUp(actor: Actor, item: Item): void {
    actor.inventory.push(item.name);
    this.entities.delete(item.id);
  }
}
