import { Router, Request, Response } from "express";

export function healthRoutes(isDBConnected: () => Promise<boolean>): Router {
  const router = Router();

  router.get("/", async (_req: Request, res: Response) => {
    const dbConnected = await isDBConnected();
    res.json({ status: "ok", dbConnected });
  });

  return router;
}
