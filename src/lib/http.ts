// src/lib/http.ts
import type express from "express";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { createLogger } from "./logger";
import { UpdaterError, isAbortError } from "./errors";

const log = createLogger("http");

const controllers = new WeakMap<Request, AbortController>();

/* -------------------------------------------------------------------------- */
/* Helpers: hardening + middleware                                            */
/* -------------------------------------------------------------------------- */

// Wrap async route handlers so thrown errors become JSON (no hangs)
export const asyncHandler =
  (fn: RequestHandler): RequestHandler =>
  (req, res, next) =>
    Promise.resolve(fn(req, res, next)).catch(next);

/** Signal aborted when the client goes away or the request times out. */
export function requestSignal(req: Request): AbortSignal | undefined {
  return controllers.get(req)?.signal;
}

// One AbortController per request; fires if the connection closes before we reply.
export function installAbortOnDisconnect(app: express.Express) {
  app.use((req, res, next) => {
    const controller = new AbortController();
    controllers.set(req, controller);
    res.on("close", () => {
      if (!res.writableFinished) {
        log.info({ method: req.method, path: req.path }, "client disconnected; aborting request");
        controller.abort();
      }
    });
    next();
  });
}

// Per-request timeout guard. If something hangs, reply 504 JSON and abort upstream calls.
export function installTimeoutGuard(app: express.Express, ms: number) {
  app.use((req, res, next) => {
    let finished = false;
    res.on("finish", () => (finished = true));
    res.setTimeout(ms, () => {
      if (!finished && !res.headersSent) {
        log.error({ path: req.path, ms }, "request timeout");
        res.status(504).json({ success: false, error: "timeout", message: `Request exceeded ${ms}ms` });
      }
      controllers.get(req)?.abort();
    });
    next();
  });
}

// Request log
export function installRequestLog(app: express.Express) {
  app.use((req, res, next) => {
    const t0 = Date.now();
    res.on("finish", () => {
      log.info(
        { method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - t0 },
        `${req.method} ${req.path} -> ${res.statusCode}`
      );
    });
    next();
  });
}

// Require the API token when one is configured; reply 401 JSON if missing/invalid
export function requireApiToken(expected: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) return next();
    const hdr = req.header("X-Updater-Token") || "";
    if (hdr !== expected) {
      res.status(401).json({ success: false, error: "unauthorized", message: "Missing or invalid X-Updater-Token" });
      return;
    }
    next();
  };
}

function bodyParserType(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") return err.type;
  return undefined;
}

// Global JSON error handler (put AFTER routes)
export function installJsonErrorHandler(app: express.Express) {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (res.headersSent) {
      log.debug({ path: req.path, err }, "error after response was sent");
      return;
    }
    if (err instanceof UpdaterError) {
      const level = err.status >= 500 ? "error" : "warn";
      log[level]({ path: req.path, code: err.code, err }, err.message);
      res.status(err.status).json(err.toJSON());
      return;
    }
    if (isAbortError(err)) {
      log.info({ path: req.path }, "request aborted");
      res.status(499).json({ success: false, error: "aborted", message: "Request aborted" });
      return;
    }
    const parserType = bodyParserType(err);
    if (parserType === "entity.parse.failed") {
      res.status(400).json({ success: false, error: "invalid_input", message: "Request body is not valid JSON" });
      return;
    }
    if (parserType === "entity.too.large") {
      res.status(413).json({ success: false, error: "invalid_input", message: "Request body too large" });
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    log.error({ path: req.path, err }, "unhandled route error");
    res.status(500).json({ success: false, error: "internal_error", message });
  });
}
