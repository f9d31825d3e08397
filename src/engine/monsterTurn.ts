import type { RoundContext, TurnSystem } from "../types";
import { chebyshev, type Actor, type DungeonWorld } from "./world";

function nearestPlayer(world: DungeonWorld, monster: Actor): Actor | undefined {
  let best: Actor | undefined;
  let bestDistance = Infinity;
  for (const p of world.players()) {
    if (p.hp <= 0) continue;
    const d = chebyshev(monster, p);
    if (d < bestDistance || (d === bestDistance && best && p.id < best.id)) {
      best = p;
      bestDistance = d;
    }
  }
  return best;
}

/**
 * Environment step: every living monster, in id order, hits an adjacent
 * player or takes one step toward the nearest one.
 */
export class MonsterTurnSystem implements TurnSystem<DungeonWorld> {
  processRound({ world }: RoundContext<DungeonWorld>): void {
    for (const monster of world.monsters()) {
      if (monster.hp <= 0) continue;
      const target = nearestPlayer(world, monster);
      if (!target) return;

      if (chebyshev(monster, target) === 1) {
        world.damage(target, monster.attack);
        continue;
      }

      const sx = Math.sign(target.x - monster.x);
      const sy = Math.sign(target.y - monster.y);
      const steps = [
        { x: sx, y: sy },
        { x: sx, y: 0 },
        { x: 0, y: sy },
      ];
      for (const s of steps) {
        if (s.x === 0 && s.y === 0) continue;
        const nx = monster.x + s.x;
        const ny = monster.y + s.y;
        if (world.canEnter(nx, ny)) {
          world.moveActor(monster, nx, ny);
          break;
        }
      }
    }
  }
}
