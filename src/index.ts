// src/index.ts
import { createApp } from "./app";
import { loadEnvFromProcess, type Env } from "./lib/env";
import { logger } from "./lib/logger";
import { createUpdater } from "./services";

/* -------------------------------------------------------------------------- */
/* Startup: missing secrets are fatal here, never per request                 */
/* -------------------------------------------------------------------------- */

let env: Env;
try {
  env = loadEnvFromProcess();
} catch (err) {
  logger.fatal({ err }, "invalid configuration");
  process.exit(1);
}

const app = createApp({ env, updater: createUpdater(env) });

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT }, `listening on :${env.PORT}`);
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info({ signal }, "shutting down");
    server.close(() => process.exit(0));
  });
}
