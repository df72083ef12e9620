#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { SessionCache } from "./auth/session-cache.js";
import { loadConfig } from "./config.js";
import { NotehubClient } from "./notehub/client.js";
import { createNotehubServer, SERVER_NAME, SERVER_VERSION } from "./server.js";
import { errorMessage } from "./shared/errors.js";
import { logger } from "./shared/logger.js";

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  logger.setLevel(config.logLevel);

  const client = new NotehubClient({
    baseUrl: config.apiBase,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  const sessions = new SessionCache({
    login: (credential, signal) => client.login(credential, signal),
    ttlMs: config.sessionTtlMs,
    loginTimeoutMs: config.loginTimeoutMs,
  });

  const mcp = createNotehubServer({
    gateway: client,
    sessions,
    retryOnRejectedToken: config.retryOnRejectedToken,
    logger,
  }, { sessionTtlMs: config.sessionTtlMs });

  await mcp.connect(new StdioServerTransport());
  logger.info({ event: "transport_connected", transport: "stdio" });
  logger.info({
    event: "server_started",
    name: SERVER_NAME,
    version: SERVER_VERSION,
    api_base: config.apiBase,
    session_ttl_ms: config.sessionTtlMs,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    mcp
      .close()
      .then(() => {
        logger.info({ event: "transport_closed", transport: "stdio", signal });
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ event: "server_error", error: errorMessage(error), context: "shutdown" });
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.critical({ event: "server_error", error: errorMessage(error), context: "startup" });
  process.exit(1);
});
