// src/app.ts
import path from "node:path";
import express from "express";
import cors from "cors";
import type { Env } from "./lib/env";
import {
  installAbortOnDisconnect,
  installJsonErrorHandler,
  installRequestLog,
  installTimeoutGuard,
  requireApiToken,
} from "./lib/http";
import { updateRoutes } from "./routes/update";
import type { RepoUpdater } from "./services/updater";

export interface AppOptions {
  env: Env;
  updater: RepoUpdater;
}

const VERSION = process.env.npm_package_version || "1.0.0";
const OPENAPI_PATH = path.join(__dirname, "..", "openapi.yaml");

/* -------------------------------------------------------------------------- */
/* App bootstrap                                                              */
/* -------------------------------------------------------------------------- */

export function createApp({ env, updater }: AppOptions): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  installRequestLog(app);
  installAbortOnDisconnect(app);
  installTimeoutGuard(app, env.REQUEST_TIMEOUT_MS);

  /* ------------------------------------------------------------------------ */
  /* Endpoints                                                                */
  /* ------------------------------------------------------------------------ */

  app.get("/", (_req, res) => {
    res.json({
      message: "AI Branch Updater API",
      version: VERSION,
      routes: ["POST /api/update-repo", "POST /api/preview-changes", "GET /health", "GET /openapi.yaml"],
    });
  });

  // Health (no auth). Reports whether secrets are present, never their values.
  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      github_token_set: Boolean(env.GITHUB_TOKEN),
      anthropic_key_set: Boolean(env.ANTHROPIC_API_KEY),
      uptimeSec: Math.round(process.uptime()),
    });
  });

  app.get("/openapi.yaml", (_req, res) => {
    res.type("application/yaml").sendFile(OPENAPI_PATH);
  });

  app.use("/api", requireApiToken(env.UPDATER_API_TOKEN), updateRoutes(updater));

  app.use((req, res) => {
    res.status(404).json({ success: false, error: "not_found", message: `No route for ${req.method} ${req.path}` });
  });

  installJsonErrorHandler(app);
  return app;
}
