import { Router } from "express";

import type { FeedbackController } from "../controllers/feedback.controller";

export const createFeedbackRouter = (controller: FeedbackController): Router => {
  const router = Router();

  router.post("/", (req, res, next) => {
    controller.submit(req, res).catch(next);
  });

  return router;
};
