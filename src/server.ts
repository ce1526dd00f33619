/**
 * Express API Server — chart overlay backend
 *
 * Stateless endpoints; every request carries the bars it needs:
 *   GET  /api/health          — liveness
 *   POST /api/overlays        — indicator overlays for a bar series
 *   POST /api/formula         — evaluate a custom formula overlay
 *   POST /api/events          — corporate events inside a date window
 *   POST /api/metrics         — key metrics for one ticker
 *   POST /api/export/bars     — bars as CSV
 *
 * Start: npm start
 */

import express, { type NextFunction, type Request, type Response } from "express";
import { createHandlers, type HandlerResult } from "./api/handlers.js";
import { config, type Config } from "./config/index.js";
import { moduleLogger } from "./utils/logger.js";

const log = moduleLogger("server");

function send(res: Response, result: HandlerResult): void {
  if (result.contentType === "text/csv") {
    res.status(result.status).type("text/csv").send(result.body);
    return;
  }
  res.status(result.status).json(result.body);
}

export function createApp(appConfig: Config = config): express.Express {
  const app = express();
  const handlers = createHandlers({ formula: { maxLength: appConfig.formula.maxLength } });

  app.use(express.json({ limit: appConfig.jsonBodyLimit }));

  // ── CORS for local development ──────────────────────────────
  app.use((_req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "Content-Type");
    next();
  });

  app.get("/api/health", (_req, res) => send(res, handlers.health()));
  app.post("/api/overlays", (req, res) => send(res, handlers.overlays(req.body)));
  app.post("/api/formula", (req, res) => send(res, handlers.formula(req.body)));
  app.post("/api/events", (req, res) => send(res, handlers.events(req.body)));
  app.post("/api/metrics", (req, res) => send(res, handlers.metrics(req.body)));
  app.post("/api/export/bars", (req, res) => send(res, handlers.exportBars(req.body)));

  // Malformed JSON and oversized bodies surface here from express.json()
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, error: "Malformed JSON body" });
      return;
    }
    if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" && err.status < 500) {
      res.status(err.status).json({ success: false, error: "Request body rejected" });
      return;
    }
    log.error("Unhandled request error", { error: String(err) });
    res.status(500).json({ success: false, error: "Internal error" });
  });

  return app;
}

function startServer(): void {
  const app = createApp();
  app.listen(config.port, () => {
    log.info(`═══════════════════════════════════════════`);
    log.info(`  Price overlay API`);
    log.info(`  http://localhost:${config.port}`);
    log.info(`  Environment: ${config.nodeEnv}`);
    log.info(`═══════════════════════════════════════════`);
  });
}

startServer();
