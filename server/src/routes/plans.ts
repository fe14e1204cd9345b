import { Router } from "express";
import { plansController } from "../controllers/plans";
import type { GenerationService } from "../services/generation";
import type { HouseRequestStore } from "../services/houseRequests";

export function planRoutes(generation: GenerationService, requests: HouseRequestStore): Router {
  const router = Router();
  const handlers = plansController(generation, requests);

  router.get("/", handlers.list);
  router.post("/generate", handlers.generate);
  router.get("/:id", handlers.show);
  router.get("/:id/glb", handlers.glb);
  router.get("/:id/svg", handlers.svg);

  return router;
}
