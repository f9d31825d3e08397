import type { z } from "zod";
import { makeError, type ServerMessage } from "./protocol";

export type RouteContext<C> = {
  conn: C;
  requestId?: string;
  reply(msg: ServerMessage): void;
};

export type RouteHandler<C, P> = (payload: P, ctx: RouteContext<C>) => void | Promise<void>;

export type RouteOptions = {
  /** Defaults to true. */
  requiresAuth?: boolean;
};

type Route<C> = {
  requiresAuth: boolean;
  dispatch(payload: unknown, ctx: RouteContext<C>): void | Promise<void>;
};

export type DispatchInput = {
  type: string;
  payload: unknown;
  authenticated: boolean;
};

/**
 * Message type → payload schema + handler. Adding a message type is one
 * `register` call; `dispatch` never changes.
 */
export class MessageRouter<C> {
  private readonly routes = new Map<string, Route<C>>();

  register<P>(
    type: string,
    schema: z.ZodType<P, z.ZodTypeDef, unknown>,
    handler: RouteHandler<C, P>,
    opts: RouteOptions = {}
  ): this {
    if (this.routes.has(type)) throw new Error(`Message type already registered: ${type}`);
    this.routes.set(type, {
      requiresAuth: opts.requiresAuth ?? true,
      dispatch: (payload, ctx) => {
        const parsed = schema.safeParse(payload ?? {});
        if (!parsed.success) {
          const detail = parsed.error.issues
            .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
            .join("; ");
          ctx.reply(makeError("invalid_payload", `Invalid ${type} payload: ${detail}`, ctx.requestId));
          return;
        }
        return handler(parsed.data, ctx);
      },
    });
    return this;
  }

  has(type: string): boolean {
    return this.routes.has(type);
  }

  types(): string[] {
    return [...this.routes.keys()];
  }

  async dispatch(input: DispatchInput, ctx: RouteContext<C>): Promise<void> {
    const route = this.routes.get(input.type);
    if (!route) {
      ctx.reply(makeError("unknown_message", `Unknown message type: ${input.type}`, ctx.requestId));
      return;
    }
    if (route.requiresAuth && !input.authenticated) {
      ctx.reply(makeError("not_authenticated", "Authenticate first.", ctx.requestId));
      return;
    }
    await route.dispatch(input.payload, ctx);
  }
}
