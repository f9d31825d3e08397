import { describe, it, expect } from "vitest";
import { AuthRegistry, normalizeDisplayName } from "../src/server/auth";

function makeRegistry(ttlSeconds = 60) {
  let t = 1_000_000;
  const registry = new AuthRegistry({ tokenTtlSeconds: ttlSeconds, now: () => t });
  return {
    registry,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe("display names", () => {
  it("trims and accepts letters, digits, space, underscore and dash", () => {
    expect(normalizeDisplayName("  Ann_the-2nd  ")).toBe("Ann_the-2nd");
    expect(normalizeDisplayName("Two Words")).toBe("Two Words");
  });

  it("rejects empty, long or odd names", () => {
    expect(normalizeDisplayName("   ")).toBeNull();
    expect(normalizeDisplayName("x".repeat(25))).toBeNull();
    expect(normalizeDisplayName("x".repeat(24))).toBe("x".repeat(24));
    expect(normalizeDisplayName("<script>")).toBeNull();
    expect(normalizeDisplayName("Zoë")).toBeNull();
  });
});

describe("AuthRegistry", () => {
  it("issues distinct tokens and player ids", () => {
    const { registry } = makeRegistry();
    const a = registry.authenticate("Ann");
    const b = registry.authenticate("Ann");
    if (!a.ok || !b.ok) throw new Error("auth failed");
    expect(a.session.token).not.toBe(b.session.token);
    expect(a.session.playerId).not.toBe(b.session.playerId);
    expect(a.session.token).toMatch(/^[A-Za-z0-9_-]{32}$/);
    expect(a.session).toMatchObject({ displayName: "Ann", gameSessionId: null, connected: true });
    expect(registry.size).toBe(2);
  });

  it("fails with invalid_name", () => {
    const { registry } = makeRegistry();
    const res = registry.authenticate("");
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.reason).toBe("invalid_name");
  });

  it("resolves known tokens and rejects unknown ones", () => {
    const { registry } = makeRegistry();
    const a = registry.authenticate("Ann");
    if (!a.ok) throw new Error("auth failed");
    const again = registry.resolve(a.session.token);
    expect(again.ok && again.session).toBe(a.session);
    expect(registry.resolve("test-token-nope")).toEqual({
      ok: false,
      reason: "invalid_token",
      message: "Unknown token.",
    });
  });

  it("expires tokens after their TTL", () => {
    const { registry, advance } = makeRegistry(60);
    const a = registry.authenticate("Ann");
    if (!a.ok) throw new Error("auth failed");

    advance(60_000);
    expect(registry.isValid(a.session)).toBe(true);
    advance(1);
    expect(registry.isValid(a.session)).toBe(false);
    expect(registry.resolve(a.session.token)).toEqual({ ok: false, reason: "expired", message: "Token has expired." });
    expect(registry.resolve(a.session.token).ok).toBe(false);
    expect(registry.getPlayer(a.session.playerId)).toBeUndefined();
  });

  it("revokes tokens", () => {
    const { registry } = makeRegistry();
    const a = registry.authenticate("Ann");
    if (!a.ok) throw new Error("auth failed");
    registry.revoke(a.session.token);
    expect(registry.isValid(a.session)).toBe(false);
    expect(registry.size).toBe(0);
  });

  it("cleans up only idle expired sessions", () => {
    const { registry, advance } = makeRegistry(10);
    const idle = registry.authenticate("Idle");
    const online = registry.authenticate("Online");
    const playing = registry.authenticate("Playing");
    if (!idle.ok || !online.ok || !playing.ok) throw new Error("auth failed");
    idle.session.connected = false;
    playing.session.connected = false;
    playing.session.gameSessionId = "ABC234";

    advance(11_000);
    expect(registry.cleanupExpired()).toBe(1);
    expect(registry.getPlayer(idle.session.playerId)).toBeUndefined();
    expect(registry.size).toBe(2);
  });
});
