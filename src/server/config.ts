import { isLogLevel, type LogLevel } from "./log";

export type ServerConfig = {
  host: string;
  port: number;
  maxPlayersPerSession: number;
  maxActionsPerRound: number;
  disconnectDeadlineSeconds: number;
  sessionGracePeriodSeconds: number;
  authTimeoutSeconds: number;
  tokenTtlSeconds: number;
  heartbeatIntervalSeconds: number;
  outboundQueueLimit: number;
  maxMessageBytes: number;
  chatHistoryLimit: number;
  maxChatLength: number;
  logLevel: LogLevel;
};

export const DEFAULT_CONFIG: ServerConfig = {
  host: "0.0.0.0",
  port: 8765,
  maxPlayersPerSession: 4,
  maxActionsPerRound: 4,
  disconnectDeadlineSeconds: 120,
  sessionGracePeriodSeconds: 60,
  authTimeoutSeconds: 30,
  tokenTtlSeconds: 86_400,
  heartbeatIntervalSeconds: 30,
  outboundQueueLimit: 256,
  maxMessageBytes: 65_536,
  chatHistoryLimit: 50,
  maxChatLength: 500,
  logLevel: "info",
};

type Env = Record<string, string | undefined>;

function envString(env: Env, name: string, defaultValue: string): string {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = v.trim();
  return s === "" ? defaultValue : s;
}

function envInt(env: Env, name: string, defaultValue: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new Error(`${name} must be an integer in [${min}, ${max}], got "${v}".`);
  }
  return n;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const logLevel = envString(env, "DELVE_LOG_LEVEL", DEFAULT_CONFIG.logLevel).toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(`DELVE_LOG_LEVEL must be one of debug, info, warn, error or silent, got "${logLevel}".`);
  }

  const d = DEFAULT_CONFIG;
  return {
    host: envString(env, "DELVE_HOST", d.host),
    port: envInt(env, "DELVE_PORT", d.port, 0, 65_535),
    maxPlayersPerSession: envInt(env, "DELVE_MAX_PLAYERS", d.maxPlayersPerSession, 1, 64),
    maxActionsPerRound: envInt(env, "DELVE_ACTIONS_PER_ROUND", d.maxActionsPerRound, 1),
    disconnectDeadlineSeconds: envInt(env, "DELVE_DISCONNECT_DEADLINE", d.disconnectDeadlineSeconds, 0),
    sessionGracePeriodSeconds: envInt(env, "DELVE_SESSION_GRACE", d.sessionGracePeriodSeconds, 0),
    authTimeoutSeconds: envInt(env, "DELVE_AUTH_TIMEOUT", d.authTimeoutSeconds, 1),
    tokenTtlSeconds: envInt(env, "DELVE_TOKEN_TTL", d.tokenTtlSeconds, 1),
    heartbeatIntervalSeconds: envInt(env, "DELVE_HEARTBEAT", d.heartbeatIntervalSeconds, 0),
    outboundQueueLimit: envInt(env, "DELVE_OUTBOUND_LIMIT", d.outboundQueueLimit, 1),
    maxMessageBytes: envInt(env, "DELVE_MAX_MESSAGE_BYTES", d.maxMessageBytes, 256),
    chatHistoryLimit: envInt(env, "DELVE_CHAT_HISTORY", d.chatHistoryLimit, 0),
    maxChatLength: envInt(env, "DELVE_MAX_CHAT_LENGTH", d.maxChatLength, 1),
    logLevel,
  };
}
