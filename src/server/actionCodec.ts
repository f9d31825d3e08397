import type { z } from "zod";
import type { ActionDecoder, DecodeResult, GameAction } from "../types";

export type ActionFactory<W, P> = {
  params: z.ZodType<P, z.ZodTypeDef, unknown>;
  create(params: P): GameAction<W>;
};

type Entry<W> = {
  decode(params: unknown): DecodeResult<W>;
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/**
 * Open registry from wire action type to a game action. Decoding never
 * touches a world.
 */
export class ActionCodec<W> implements ActionDecoder<W> {
  private readonly entries = new Map<string, Entry<W>>();

  register<P>(actionType: string, factory: ActionFactory<W, P>): this {
    if (this.entries.has(actionType)) {
      throw new Error(`Action type already registered: ${actionType}`);
    }
    this.entries.set(actionType, {
      decode: (params) => {
        const parsed = factory.params.safeParse(params ?? {});
        if (!parsed.success) {
          return { ok: false, code: "invalid_params", message: formatIssues(parsed.error) };
        }
        return { ok: true, action: factory.create(parsed.data) };
      },
    });
    return this;
  }

  has(actionType: string): boolean {
    return this.entries.has(actionType);
  }

  types(): string[] {
    return [...this.entries.keys()].sort();
  }

  decode(actionType: string, params: unknown): DecodeResult<W> {
    const entry = this.entries.get(actionType);
    if (!entry) return { ok: false, code: "unknown_action", message: `Unknown action: ${actionType}` };
    return entry.decode(params);
  }
}
