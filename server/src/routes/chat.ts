import { Router } from "express";
import { chatController } from "../controllers/chat";
import type { PlanningChat } from "../services/chat";

export function chatRoutes(chat: PlanningChat): Router {
  const router = Router();
  const handlers = chatController(chat);

  router.post("/init", handlers.init);
  router.post("/message", handlers.message);

  return router;
}
