import { createDungeonRules } from "../engine";
import { loadConfig } from "./config";
import { createLogger } from "./log";
import { startWsServer } from "./wsServer";

async function main() {
  const config = loadConfig(process.env);
  const logger = createLogger(config.logLevel);
  const server = await startWsServer({ config, logger, rules: createDungeonRules() });

  logger.info("server:ready", {
    url: `ws://${config.host}:${server.port}`,
    maxPlayers: config.maxPlayersPerSession,
    actionsPerRound: config.maxActionsPerRound,
  });

  const shutdown = (signal: string) => {
    logger.info("server:shutdown", { signal });
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("server:shutdown_error", { err });
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  createLogger("error").error("server:fatal", { err });
  process.exit(1);
});
