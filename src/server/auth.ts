import { randomBytes, randomUUID } from "node:crypto";
import type { PlayerId, SessionId } from "../types";
import type { AuthFailureReason } from "./protocol";

/** Identity of one authenticated player, independent of any socket. */
export type PlayerSession = {
  token: string;
  playerId: PlayerId;
  displayName: string;
  gameSessionId: SessionId | null;
  connected: boolean;
  disconnectDeadline: number | null;
  createdAt: number;
  lastSeen: number;
};

export type AuthResult =
  | { ok: true; session: PlayerSession }
  | { ok: false; reason: AuthFailureReason; message: string };

const NAME_RE = /^[A-Za-z0-9 _-]{1,24}$/;

export function normalizeDisplayName(raw: string): string | null {
  const name = raw.trim();
  return NAME_RE.test(name) ? name : null;
}

export type AuthRegistryOptions = {
  tokenTtlSeconds: number;
  now?: () => number;
};

/**
 * Token → PlayerSession registry. Tokens expire `tokenTtlSeconds` after they
 * are issued; revoked or expired tokens are forgotten.
 */
export class AuthRegistry {
  private readonly byToken = new Map<string, PlayerSession>();
  private readonly byPlayer = new Map<PlayerId, PlayerSession>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: AuthRegistryOptions) {
    this.ttlMs = opts.tokenTtlSeconds * 1000;
    this.now = opts.now ?? (() => Date.now());
  }

  authenticate(rawName: string): AuthResult {
    const displayName = normalizeDisplayName(rawName);
    if (!displayName) {
      return {
        ok: false,
        reason: "invalid_name",
        message: "Display name must be 1-24 letters, digits, spaces, '_' or '-'.",
      };
    }

    const t = this.now();
    const session: PlayerSession = {
      token: randomBytes(24).toString("base64url"),
      playerId: randomUUID(),
      displayName,
      gameSessionId: null,
      connected: true,
      disconnectDeadline: null,
      createdAt: t,
      lastSeen: t,
    };
    this.byToken.set(session.token, session);
    this.byPlayer.set(session.playerId, session);
    return { ok: true, session };
  }

  /** Look up a token presented by a client (RECONNECT). */
  resolve(token: string): AuthResult {
    const session = this.byToken.get(token);
    if (!session) return { ok: false, reason: "invalid_token", message: "Unknown token." };
    if (this.isExpired(session)) {
      this.revoke(token);
      return { ok: false, reason: "expired", message: "Token has expired." };
    }
    session.lastSeen = this.now();
    return { ok: true, session };
  }

  /** True while the session's token is still registered and within its TTL. */
  isValid(session: PlayerSession): boolean {
    return this.byToken.get(session.token) === session && !this.isExpired(session);
  }

  touch(session: PlayerSession): void {
    session.lastSeen = this.now();
  }

  getPlayer(playerId: PlayerId): PlayerSession | undefined {
    return this.byPlayer.get(playerId);
  }

  revoke(token: string): void {
    const session = this.byToken.get(token);
    if (!session) return;
    this.byToken.delete(token);
    this.byPlayer.delete(session.playerId);
  }

  /** Forget expired sessions that are not attached to a socket or a game. */
  cleanupExpired(): number {
    let removed = 0;
    for (const session of [...this.byToken.values()]) {
      if (!this.isExpired(session) || session.connected || session.gameSessionId) continue;
      this.revoke(session.token);
      removed++;
    }
    return removed;
  }

  get size(): number {
    return this.byToken.size;
  }

  private isExpired(session: PlayerSession): boolean {
    return this.now() - session.createdAt > this.ttlMs;
  }
}
