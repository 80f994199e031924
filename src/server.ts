import http from "node:http";
import { createHealthCoachFromConfig } from "../index.js";
import { errorResponse } from "./api.js";
import { loadConfig, type HealthCoachConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";

// Missing or invalid configuration is the one fatal error.
function loadConfigOrExit(): HealthCoachConfig {
  try {
    return loadConfig();
  } catch (err) {
    createLogger().error("startup failed", { error: errorMessage(err) });
    process.exit(1);
  }
}

function main(): void {
  const config = loadConfigOrExit();
  const logger = createLogger({ level: config.logLevel });
  const app = createHealthCoachFromConfig(config, logger);

  const server = http.createServer((req, res) => {
    app
      .handle(req, res)
      .then((handled) => {
        if (!handled) {
          errorResponse(res, 404, "Not found", "not_found");
        }
      })
      .catch((err: unknown) => {
        logger.error("unhandled request error", { error: err, url: req.url });
        if (!res.headersSent) {
          errorResponse(res, 500, "Internal error", "internal_error");
        }
      });
  });

  server.listen(config.port, () => {
    logger.info("health coach listening", { port: config.port, model: config.model });
  });

  const shutdown = (signal: string) => {
    logger.info("shutting down", { signal });
    server.close(() => {
      app.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main();
