import { loadServerEnv } from "./env";

// load env FIRST
const envFiles = loadServerEnv();

// now import the real server
const { startServer } = await import("./index");
const { logger } = await import("./logger");

logger.info(`[Server] env files: ${envFiles.length > 0 ? envFiles.join(", ") : "none"}`);

startServer().catch((err: unknown) => {
  logger.error("[Server] ❌ failed to start", {
    error: err instanceof Error ? err.message : String(err)
  });
  process.exit(1);
});
