import { Router } from "express";

import type { ChatController } from "../controllers/chat.controller";

export const createChatRouter = (controller: ChatController): Router => {
  const router = Router();

  router.post("/", (req, res, next) => {
    controller.handleChat(req, res).catch(next);
  });

  router.post("/summary", (req, res, next) => {
    controller.summarize(req, res).catch(next);
  });

  router.get("/:sessionId", (req, res, next) => {
    controller.getSession(req, res).catch(next);
  });

  return router;
};
