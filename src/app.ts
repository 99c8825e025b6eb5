import compression from "compression";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import pinoHttp from "pino-http";

import { AlertsController } from "./controllers/alerts.controller";
import { ChatController } from "./controllers/chat.controller";
import { FeedbackController } from "./controllers/feedback.controller";
import { SentimentController } from "./controllers/sentiment.controller";
import { StudentsController } from "./controllers/students.controller";
import { InvalidInputError, MalformedSentimentResultError } from "./errors";
import { createAlertsRouter } from "./routes/alerts.route";
import { createChatRouter } from "./routes/chat.route";
import { createFeedbackRouter } from "./routes/feedback.route";
import { createSentimentRouter } from "./routes/sentiment.route";
import { createStudentsRouter } from "./routes/students.route";
import type { Services } from "./services";
import type { Logger } from "./utils/logger";

export class HttpError extends Error {
  public readonly status: number;
  public readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.details = details;
  }
}

export interface AppOptions {
  services: Services;
  logger: Logger;
  corsOrigins: string[] | null;
  rateLimitPerMinute?: number;
}

const toHttpError = (err: unknown): HttpError | null => {
  if (err instanceof HttpError) return err;
  if (err instanceof InvalidInputError) return new HttpError(400, err.message, { issues: err.issues });
  if (err instanceof MalformedSentimentResultError) {
    return new HttpError(422, err.message, { index: err.index, issues: err.issues });
  }
  if (err instanceof SyntaxError && "body" in err) return new HttpError(400, "Malformed JSON body");
  return null;
};

export const createApp = ({ services, logger, corsOrigins, rateLimitPerMinute = 60 }: AppOptions) => {
  const app = express();

  app.disable("x-powered-by");

  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === "/health"
      }
    })
  );

  app.use(helmet());

  app.use(
    cors({
      origin: (origin, cb) => {
        if (!corsOrigins) return cb(null, true);
        if (!origin) return cb(null, true);
        return cb(null, corsOrigins.includes(origin));
      },
      credentials: true
    })
  );

  app.use(compression());
  app.use(express.json({ limit: "1mb" }));

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false
    })
  );

  app.get("/health", (_req, res) => res.status(200).json({ ok: true }));

  app.use("/api/sentiment", createSentimentRouter(new SentimentController(services.analyzer)));
  app.use("/api/feedback", createFeedbackRouter(new FeedbackController(services.feedback)));
  app.use("/api/chat", createChatRouter(new ChatController(services.chatbot)));
  app.use("/api/students", createStudentsRouter(new StudentsController(services.evaluator)));
  app.use("/api/alerts", createAlertsRouter(new AlertsController(services.alertSink)));

  app.use((_req, _res, next) => {
    next(new HttpError(404, "Not found"));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = req.id ?? req.header("x-request-id") ?? undefined;
    const httpError = toHttpError(err);

    if (httpError) {
      req.log.warn({ err, requestId }, "request_error");

      return res.status(httpError.status).json({
        ok: false,
        error: {
          message: httpError.message,
          status: httpError.status,
          details: httpError.details,
          request_id: requestId
        }
      });
    }

    req.log.error({ err, requestId }, "unhandled_error");

    return res.status(500).json({
      ok: false,
      error: {
        message: "Internal server error",
        status: 500,
        request_id: requestId
      }
    });
  });

  return app;
};
