import { Router } from "express";

import type { SentimentController } from "../controllers/sentiment.controller";

export const createSentimentRouter = (controller: SentimentController): Router => {
  const router = Router();

  router.post("/analyze", (req, res, next) => {
    controller.analyze(req, res).catch(next);
  });

  router.post("/batch", (req, res, next) => {
    controller.analyzeBatch(req, res).catch(next);
  });

  router.post("/trends", (req, res, next) => {
    controller.trends(req, res).catch(next);
  });

  return router;
};
