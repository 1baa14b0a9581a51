/**
 * navdock Demo Server
 *
 * Fastify entry point. Boots the platform, registers routes, starts listening.
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import {
  captureException,
  flushObservability,
  initObservability,
  loadConfig,
} from "@navdock/platform";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

async function main() {
  // 0. Initialize observability FIRST so it sees errors from all subsequent steps
  initObservability();

  // 1. Load configuration from environment
  const config = loadConfig();

  // 2. Wire panels, render hooks, and the renderer
  const context = bootstrap(config);

  // 3. Create the Fastify instance with routes
  const app = await buildServer(context);

  // 4. Start server
  await app.listen({
    port: config.server.port,
    host: config.server.host,
  });

  context.logger.info("Demo server listening", {
    url: `http://localhost:${config.server.port}/admin`,
  });

  // 5. Graceful shutdown
  const shutdown = async (signal: string) => {
    context.logger.info("Shutting down", { signal });
    await app.close();
    await flushObservability(2000);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("Shutdown failed:", err);
          process.exit(1);
        }
      );
    });
  }
}

main().catch(async (err: unknown) => {
  console.error("Fatal error:", err);
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000);
  process.exit(1);
});
