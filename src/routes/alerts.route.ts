import { Router } from "express";

import type { AlertsController } from "../controllers/alerts.controller";

export const createAlertsRouter = (controller: AlertsController): Router => {
  const router = Router();

  router.get("/", (req, res, next) => {
    controller.list(req, res).catch(next);
  });

  return router;
};
