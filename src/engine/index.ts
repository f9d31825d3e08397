import type { GameRules } from "../types";
import { ActionCodec } from "../server/actionCodec";
import { registerDungeonActions } from "./actions";
import { PillarMapGenerator, type DungeonMap, type PillarMapOptions } from "./dungeonMap";
import { MonsterTurnSystem } from "./monsterTurn";
import { DungeonWorld } from "./world";

export * from "./actions";
export * from "./dungeonMap";
export * from "./monsterTurn";
export * from "./rng";
export * from "./world";

export type DungeonRulesOptions = {
  map?: PillarMapOptions;
};

export function createDungeonRules(opts: DungeonRulesOptions = {}): GameRules<DungeonWorld, DungeonMap> {
  return {
    mapGenerator: new PillarMapGenerator(opts.map),
    createWorld: (map, seed) => new DungeonWorld(map, seed),
    turnSystem: new MonsterTurnSystem(),
    codec: registerDungeonActions(new ActionCodec<DungeonWorld>()),
  };
}
