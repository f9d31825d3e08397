import type { Coord, MapGenerator } from "../types";
import { makeXorShift32, pickIndex } from "./rng";

export interface ItemSpawn {
  at: Coord;
  item: string;
}

/**
 * Static floor layout. `tiles` holds one string per row:
 * "#" wall, "." floor, ">" exit.
 */
export interface DungeonMap {
  seed: number;
  width: number;
  height: number;
  tiles: string[];
  exit: Coord;
  spawnPoints: Coord[];
  monsterSpawns: Coord[];
  itemSpawns: ItemSpawn[];
}

const ITEM_GLYPHS: Record<string, string> = {
  "!": "potion",
  $: "gold",
  "/": "dagger",
};

const ITEM_NAMES = Object.values(ITEM_GLYPHS);

export function tileAt(map: DungeonMap, x: number, y: number): string {
  if (y < 0 || y >= map.height || x < 0 || x >= map.width) return "#";
  return map.tiles[y]?.charAt(x) || "#";
}

export function isWalkable(map: DungeonMap, x: number, y: number): boolean {
  return tileAt(map, x, y) !== "#";
}

function sameCoord(a: Coord, b: Coord): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Build a map from ASCII rows. Besides the three tile glyphs:
 * "@" player spawn point, "m" monster, "!" "$" "/" items (all on floor).
 */
export function mapFromAscii(rows: readonly string[], seed = 0): DungeonMap {
  const height = rows.length;
  const width = Math.max(0, ...rows.map((r) => r.length));
  const tiles: string[] = [];
  const spawnPoints: Coord[] = [];
  const monsterSpawns: Coord[] = [];
  const itemSpawns: ItemSpawn[] = [];
  let exit: Coord | null = null;

  for (let y = 0; y < height; y++) {
    const row = rows[y] ?? "";
    let out = "";
    for (let x = 0; x < width; x++) {
      const ch = row.charAt(x) || "#";
      if (ch === "@") spawnPoints.push({ x, y });
      else if (ch === "m") monsterSpawns.push({ x, y });
      else if (ch in ITEM_GLYPHS) itemSpawns.push({ at: { x, y }, item: ITEM_GLYPHS[ch] ?? "trinket" });
      else if (ch === ">" && !exit) exit = { x, y };

      out += ch === "#" ? "#" : ch === ">" ? ">" : ".";
    }
    tiles.push(out);
  }

  if (!exit) throw new Error("Map has no exit tile.");
  return { seed, width, height, tiles, exit, spawnPoints, monsterSpawns, itemSpawns };
}

const NEIGHBOURS: readonly Coord[] = [
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 0, y: -1 },
];

/**
 * Distinct spawn tiles: declared spawn points first, then the nearest free
 * floor tiles by breadth-first order from the first spawn point (or 1,1).
 * May return fewer than `count` when the map has no room.
 */
export function findSpawnPositions(map: DungeonMap, count: number): Coord[] {
  const out = map.spawnPoints.slice(0, count).map((c) => ({ ...c }));
  if (out.length >= count) return out;

  const reserved = (c: Coord) =>
    sameCoord(c, map.exit) ||
    map.monsterSpawns.some((m) => sameCoord(m, c)) ||
    map.itemSpawns.some((i) => sameCoord(i.at, c)) ||
    out.some((o) => sameCoord(o, c));

  const start = map.spawnPoints[0] ?? { x: 1, y: 1 };
  if (!isWalkable(map, start.x, start.y)) return out;

  const seen = new Set<string>([`${start.x},${start.y}`]);
  const frontier: Coord[] = [start];
  while (frontier.length > 0 && out.length < count) {
    const cur = frontier.shift();
    if (!cur) break;
    if (!reserved(cur)) out.push({ ...cur });
    for (const d of NEIGHBOURS) {
      const next = { x: cur.x + d.x, y: cur.y + d.y };
      const key = `${next.x},${next.y}`;
      if (seen.has(key) || !isWalkable(map, next.x, next.y)) continue;
      seen.add(key);
      frontier.push(next);
    }
  }
  return out;
}

export type PillarMapOptions = {
  width?: number;
  height?: number;
  monsters?: number;
  items?: number;
  pillarChance?: number;
};

/**
 * Walled rectangle with pillars on even/even cells only, so every odd row and
 * column stays open and the floor is always connected. Spawn corner is (1,1),
 * exit is the opposite corner.
 */
export class PillarMapGenerator implements MapGenerator<DungeonMap> {
  private readonly width: number;
  private readonly height: number;
  private readonly monsters: number;
  private readonly items: number;
  private readonly pillarChance: number;

  constructor(opts: PillarMapOptions = {}) {
    this.width = opts.width ?? 25;
    this.height = opts.height ?? 15;
    this.monsters = opts.monsters ?? 6;
    this.items = opts.items ?? 4;
    this.pillarChance = opts.pillarChance ?? 0.5;

    if (this.width < 5 || this.height < 5 || this.width % 2 === 0 || this.height % 2 === 0) {
      throw new Error(`Map size must be odd and at least 5x5, got ${this.width}x${this.height}.`);
    }
  }

  generate(seed: number): DungeonMap {
    const rand = makeXorShift32(seed);
    const { width, height } = this;
    const exit = { x: width - 2, y: height - 2 };

    const tiles: string[] = [];
    for (let y = 0; y < height; y++) {
      let row = "";
      for (let x = 0; x < width; x++) {
        const border = x === 0 || y === 0 || x === width - 1 || y === height - 1;
        if (border) row += "#";
        else if (x === exit.x && y === exit.y) row += ">";
        else if (x % 2 === 0 && y % 2 === 0 && rand() < this.pillarChance) row += "#";
        else row += ".";
      }
      tiles.push(row);
    }

    const map: DungeonMap = { seed, width, height, tiles, exit, spawnPoints: [], monsterSpawns: [], itemSpawns: [] };

    // Keep monsters and loot out of the spawn corner.
    const minDistance = Math.floor((width + height) / 3);
    const taken = new Set<string>([`${exit.x},${exit.y}`]);
    const pickFloor = (): Coord | null => {
      for (let attempt = 0; attempt < 200; attempt++) {
        const x = 1 + pickIndex(rand, width - 2);
        const y = 1 + pickIndex(rand, height - 2);
        const key = `${x},${y}`;
        if (taken.has(key) || !isWalkable(map, x, y)) continue;
        if (x - 1 + (y - 1) < minDistance) continue;
        taken.add(key);
        return { x, y };
      }
      return null;
    };

    for (let i = 0; i < this.monsters; i++) {
      const at = pickFloor();
      if (at) map.monsterSpawns.push(at);
    }
    for (let i = 0; i < this.items; i++) {
      const at = pickFloor();
      if (at) map.itemSpawns.push({ at, item: ITEM_NAMES[pickIndex(rand, ITEM_NAMES.length)] ?? "gold" });
    }

    return map;
  }

  findSpawnPositions(map: DungeonMap, count: number): Coord[] {
    return findSpawnPositions(map, count);
  }
}
