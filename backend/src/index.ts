/**
 * Deckwise Backend
 *
 * Entry point for the Hono server on Node.js providing the REST API for
 * reviewing CSV flashcard decks.
 */

import { serve } from "@hono/node-server";
import { loadDeckConfig, loadServerConfig } from "./config";
import { serverLog as log } from "./logger";
import { ReviewSession } from "./review-session";
import { createApp } from "./server";

async function main(): Promise<void> {
  const config = loadServerConfig();
  const deckConfig = await loadDeckConfig(config.decksDir);

  const session = new ReviewSession({
    decksDir: config.decksDir,
    policy: deckConfig.policy,
    forecastDays: deckConfig.forecastDays,
  });

  const app = createApp({ session });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    const displayHost = config.host === "0.0.0.0" ? "localhost" : config.host;
    log.info(`Deckwise Backend running at http://${displayHost}:${info.port}`);
    log.info(`Decks directory: ${config.decksDir}`);
    log.info(`Health check at http://${displayHost}:${info.port}/api/health`);
    if (config.host === "0.0.0.0") {
      log.info(`Server bound to all interfaces (0.0.0.0) - accessible remotely`);
    }
  });

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, saving ${session.pendingChanges} pending change(s)`);
    session
      .save()
      .then((summary) => {
        if (summary.failed.length > 0) {
          log.error(`Unsaved decks: ${summary.failed.map((f) => f.deck).join(", ")}`);
          process.exitCode = 1;
        }
      })
      .catch((error: unknown) => {
        log.error("Save on shutdown failed", error);
        process.exitCode = 1;
      })
      .finally(() => {
        server.close();
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  log.error("Failed to start server", error);
  process.exit(1);
});
