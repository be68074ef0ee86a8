import express from "express";
import { createHealthRouter } from "./routes/health.js";
import { createDraftsRouter } from "./routes/drafts.js";
import type { DraftEngine } from "./services/drafting/draftEngine.js";
import type { SlidingWindowRateLimiter } from "./utils/rateLimiter.js";
import { AppError, errorBody, internalError } from "./errors.js";
import { buildRequestLog, deriveDraftContext, isTestRuntime, log } from "./logger.js";

export const DEFAULT_CORS_ORIGINS = ["http://localhost:5173", "http://127.0.0.1:5173"];

const REDACTED_KEY = /password|token|secret|authorization/i;

/** Copy of a request body safe to log; credential-like keys are masked at any depth. */
export function sanitizeBody(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sanitizeBody);
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, val]) => [
        key,
        REDACTED_KEY.test(key) ? "[REDACTED]" : sanitizeBody(val)
      ])
    );
  }
  return value;
}

export type ServerDeps = {
  engine: DraftEngine;
  authSecret: string;
  corsAllowedOrigins?: string[];
  pickLimiter?: SlidingWindowRateLimiter;
  clock?: () => Date;
};

function corsMiddleware(origins: string[]): express.RequestHandler {
  return (req, res, next) => {
    const origin = req.headers.origin;
    if (origin && origins.some((allowed) => origin.startsWith(allowed))) {
      res.header("Access-Control-Allow-Origin", origin);
      res.header("Access-Control-Allow-Credentials", "true");
      res.header("Access-Control-Allow-Headers", "Content-Type, Authorization");
      res.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    }
    res.header("Vary", "Origin");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  };
}

function requestLogMiddleware(): express.RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      log(
        buildRequestLog({
          method: req.method,
          path: req.originalUrl ?? req.url,
          status: res.statusCode,
          duration_ms: Date.now() - start,
          body: sanitizeBody(req.body)
        })
      );
    });
    next();
  };
}

function isJsonParseFailure(err: unknown): boolean {
  return err instanceof SyntaxError && "status" in err && err.status === 400;
}

/** Maps anything thrown by a handler onto the error the client will see. */
function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (isJsonParseFailure(err)) return new AppError("VALIDATION_ERROR", 400, "Malformed JSON body");
  return internalError();
}

const errorHandler: express.ErrorRequestHandler = (err: unknown, req, res, _next) => {
  void _next;
  const appErr = toAppError(err);
  const showStack =
    (appErr.status >= 500 && !isTestRuntime()) || process.env.LOG_STACK === "1";
  log({
    level: appErr.status >= 500 ? "error" : "warn",
    msg: "request_error",
    method: req.method,
    path: req.originalUrl ?? req.url,
    status: appErr.status,
    code: appErr.code,
    error: err instanceof Error ? err.message : appErr.message,
    error_name: err instanceof Error ? err.name : undefined,
    error_stack: showStack && err instanceof Error ? err.stack : undefined,
    ...deriveDraftContext(sanitizeBody(req.body))
  });
  res.status(appErr.status).json(errorBody(appErr));
};

export function createServer(deps: ServerDeps) {
  const app = express();
  app.use(express.json());
  app.use(
    corsMiddleware(
      deps.corsAllowedOrigins && deps.corsAllowedOrigins.length > 0
        ? deps.corsAllowedOrigins
        : DEFAULT_CORS_ORIGINS
    )
  );
  app.use(requestLogMiddleware());

  const health = createHealthRouter({ clock: deps.clock });
  app.use("/health", health);
  app.use(
    "/drafts",
    createDraftsRouter(deps.engine, deps.authSecret, { pickLimiter: deps.pickLimiter })
  );
  app.use("/", health);
  app.use((_req, res) => {
    res.status(404).json(errorBody(new AppError("NOT_FOUND", 404, "Not found")));
  });
  app.use(errorHandler);
  return app;
}
