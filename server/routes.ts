import type { Express, Request, Response, NextFunction } from "express";
import { toPublicGame } from "@shared/schema";
import type { ScheduleAgent } from "./agents/scheduleAgent";
import { withSource } from "./logger";
import { createErrorResponse, isScheduleError, logError, type ErrorContext } from "./types/errors";
import { validateScheduleRequest } from "./middleware/validateRequest";

const log = withSource("routes");

/**
 * Centralized error handling for API endpoints
 */
function handleApiError(error: unknown, res: Response, operation: string, context?: ErrorContext): void {
  const requestId = typeof res.locals.requestId === "string" ? res.locals.requestId : undefined;
  logError(log, error, { operation, requestId, ...context });

  const status = isScheduleError(error) ? error.statusCode : 500;
  res.status(status).json(createErrorResponse(error, requestId));
}

export function registerRoutes(app: Express, agent: ScheduleAgent): Express {
  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.get(
    "/api/schedule/:year/:week",
    validateScheduleRequest,
    async (req: Request, res: Response, next: NextFunction) => {
      const schedule = req.validated?.schedule;
      if (!schedule) {
        return next(new Error("schedule request was not validated"));
      }
      const { year, week, format, links, quality, records } = schedule;

      try {
        if (format === "json") {
          const games = await agent.getWeek(year, week);
          res.json({ year, week, games: games.map(toPublicGame) });
          return;
        }

        const body = await agent.renderWeek(year, week, {
          format,
          includeDeepLinks: links,
          includeQuality: quality,
          includeRecords: records,
        });
        res.type(format === "html" ? "text/html" : "text/plain").send(body);
      } catch (err) {
        handleApiError(err, res, "getSchedule", { year, week });
      }
    }
  );

  return app;
}
