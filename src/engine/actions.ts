import { z } from "zod";
import type { ActionContext, GameAction, JsonObject, Outcome } from "../types";
import type { ActionCodec } from "../server/actionCodec";
import { chebyshev, type DungeonWorld } from "./world";

type Ctx = ActionContext<DungeonWorld>;

const step = z.number().int().min(-1).max(1);

export const moveParams = z
  .object({ dx: step, dy: step })
  .refine((p) => p.dx !== 0 || p.dy !== 0, { message: "move needs a direction" });

export const attackParams = z.object({ target_id: z.string().min(1) });

export const emptyParams = z.object({}).strict();

function fail(reason: string): Outcome {
  return { ok: false, reason, messages: [reason] };
}

export class MoveAction implements GameAction<DungeonWorld> {
  readonly type = "move";

  constructor(
    readonly dx: number,
    readonly dy: number
  ) {}

  validate({ world, entityId }: Ctx): boolean {
    const actor = world.actor(entityId);
    if (!actor || actor.hp <= 0) return false;
    return world.canEnter(actor.x + this.dx, actor.y + this.dy);
  }

  execute(ctx: Ctx): Outcome {
    if (!this.validate(ctx)) return fail("The way is blocked.");
    const { world, entityId } = ctx;
    const actor = world.actor(entityId);
    if (!actor) return fail("Nobody to move.");

    world.moveActor(actor, actor.x + this.dx, actor.y + this.dy);
    const messages = world.itemsAt(actor.x, actor.y).map((item) => `${actor.name} sees a ${item.name}.`);
    return { ok: true, messages };
  }

  toJSON(): JsonObject {
    return { type: this.type, dx: this.dx, dy: this.dy };
  }
}

export class AttackAction implements GameAction<DungeonWorld> {
  readonly type = "attack";

  constructor(readonly targetId: string) {}

  validate({ world, entityId }: Ctx): boolean {
    const actor = world.actor(entityId);
    const target = world.actor(this.targetId);
    if (!actor || actor.hp <= 0 || !target || target.hp <= 0) return false;
    if (target.kind !== "monster") return false;
    return chebyshev(actor, target) === 1;
  }

  execute(ctx: Ctx): Outcome {
    if (!this.validate(ctx)) return fail("No target in reach.");
    const { world, entityId } = ctx;
    const actor = world.actor(entityId);
    const target = world.actor(this.targetId);
    if (!actor || !target) return fail("No target in reach.");

    const messages = [`${actor.name} hits the ${target.name} for ${actor.attack}.`];
    if (world.damage(target, actor.attack)) messages.push(`The ${target.name} dies.`);
    return { ok: true, messages };
  }

  toJSON(): JsonObject {
    return { type: this.type, target_id: this.targetId };
  }
}

export class WaitAction implements GameAction<DungeonWorld> {
  readonly type = "wait";

  validate({ world, entityId }: Ctx): boolean {
    const actor = world.actor(entityId);
    return !!actor && actor.hp > 0;
  }

  execute(ctx: Ctx): Outcome {
    if (!this.validate(ctx)) return fail("Cannot wait.");
    return { ok: true, messages: [] };
  }

  toJSON(): JsonObject {
    return { type: this.type };
  }
}

export class PickupAction implements GameAction<DungeonWorld> {
  readonly type = "pickup";

  validate({ world, entityId }: Ctx): boolean {
    const actor = world.actor(entityId);
    if (!actor || actor.hp <= 0) return false;
    return world.itemsAt(actor.x, actor.y).length > 0;
  }

  execute(ctx: Ctx): Outcome {
    const { world, entityId } = ctx;
    const actor = world.actor(entityId);
    const item = actor ? world.itemsAt(actor.x, actor.y)[0] : undefined;
    if (!actor || actor.hp <= 0 || !item) return fail("Nothing here.");

    world.pickUp(actor, item);
    return { ok: true, messages: [`${actor.name} picks up the ${item.name}.`] };
  }

  toJSON(): JsonObject {
    return { type: this.type };
  }
}

export function registerDungeonActions(codec: ActionCodec<DungeonWorld>): ActionCodec<DungeonWorld> {
  return codec
    .register("move", { params: moveParams, create: (p) => new MoveAction(p.dx, p.dy) })
    .register("attack", { params: attackParams, create: (p) => new AttackAction(p.target_id) })
    .register("wait", { params: emptyParams, create: () => new WaitAction() })
    .register("pickup", { params: emptyParams, create: () => new PickupAction() });
}
