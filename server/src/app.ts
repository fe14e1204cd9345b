import express, { Express, Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { chatRoutes } from "./routes/chat";
import { healthRoutes } from "./routes/health";
import { planRoutes } from "./routes/plans";
import rateRoutes from "./routes/rates";
import { PlanningChat, type ChatModel } from "./services/chat";
import { GenerationService } from "./services/generation";
import type { HouseRequestStore } from "./services/houseRequests";
import type { PlanModel } from "./services/planner";
import type { ChatSessionStore } from "./services/sessions";
import { HttpError } from "./utils/httpError";
import { log } from "./utils/logger";

export interface AppDeps {
  requests: HouseRequestStore;
  sessions: ChatSessionStore;
  chatModel: ChatModel;
  planModel: PlanModel;
  isDBConnected: () => Promise<boolean>;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const chat = new PlanningChat(deps.sessions, deps.chatModel);
  const generation = new GenerationService(deps.sessions, deps.requests, deps.planModel);

  // ---------------------------------------------------------------------------
  // Middleware
  // ---------------------------------------------------------------------------

  app.use(express.json({ limit: "1mb" }));

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.use("/rates", rateRoutes);
  app.use("/chat", chatRoutes(chat));
  app.use("/plans", planRoutes(generation, deps.requests));
  app.use("/health", healthRoutes(deps.isDBConnected));

  // ---------------------------------------------------------------------------
  // Global error handler
  // ---------------------------------------------------------------------------

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // Zod validation errors → 400
    if (err instanceof ZodError) {
      res.status(400).json({
        success: false,
        error: "Validation failed",
        details: err.errors,
      });
      return;
    }

    if (err instanceof HttpError) {
      res.status(err.status).json({ success: false, error: err.message });
      return;
    }

    // Generic errors → 500
    const message = err instanceof Error ? err.message : "Internal server error";
    log.error("server", "Unhandled error", err);
    res.status(500).json({ success: false, error: message });
  });

  return app;
}
