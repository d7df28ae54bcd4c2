import { ConfigError, loadConfig } from "./config.js";
import { buildDashboardState, DataUnavailableError } from "./pipeline.js";
import { createApp, startServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const state = await buildDashboardState(config);

  console.log("WORLD BANK DASHBOARD");
  console.log("[Server] Starting dashboard server...");

  const server = await startServer(createApp(state), config.port);
  console.log(`World Bank dashboard running: http://localhost:${config.port}`);
  server.on("error", error => {
    console.error("[Server] Server error:", error);
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(error => {
      if (error) {
        console.error("[Server] Error while closing:", error);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  if (error instanceof DataUnavailableError || error instanceof ConfigError) {
    console.error(`[Pipeline] ${error.message}`);
  } else {
    console.error("[Pipeline] Unexpected startup failure:", error);
  }
  process.exit(1);
});
