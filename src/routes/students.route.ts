import { Router } from "express";

import type { StudentsController } from "../controllers/students.controller";

export const createStudentsRouter = (controller: StudentsController): Router => {
  const router = Router();

  router.post("/evaluate", (req, res, next) => {
    controller.evaluate(req, res).catch(next);
  });

  router.post("/evaluate-batch", (req, res, next) => {
    controller.evaluateBatch(req, res).catch(next);
  });

  router.post("/recommendations", (req, res, next) => {
    controller.recommendations(req, res).catch(next);
  });

  return router;
};
