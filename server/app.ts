import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { randomUUID } from "crypto";
import { ScheduleAgent } from "./agents/scheduleAgent";
import { withSource } from "./logger";
import { registerRoutes } from "./routes";
import { createErrorResponse, logError } from "./types/errors";

const log = withSource("http");

export function createApp(agent: ScheduleAgent = new ScheduleAgent()): Express {
  const app = express();

  // Attach a per-request ID early for structured logging and tracing
  app.use((_req: Request, res: Response, next: NextFunction) => {
    const id = randomUUID();
    res.locals.requestId = id;
    res.setHeader("X-Request-Id", id);
    next();
  });

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        log.info(
          { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - start },
          `${req.method} ${req.path} ${res.statusCode}`
        );
      }
    });
    next();
  });

  registerRoutes(app, agent);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = typeof res.locals.requestId === "string" ? res.locals.requestId : undefined;
    logError(log, err, { operation: "unhandled", requestId });
    res.status(500).json(createErrorResponse(err, requestId));
  });

  return app;
}
