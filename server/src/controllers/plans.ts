import { Request, Response, NextFunction, RequestHandler } from "express";
import { generateSchema, requestIdSchema } from "../validation/house";
import type { GenerationService } from "../services/generation";
import { toSummary, type HouseRequestStore } from "../services/houseRequests";
import type { HouseRequest } from "../types/house";
import { HttpError } from "../utils/httpError";

const RECENT_LIMIT = 50;

type PlanHandlers = "generate" | "show" | "glb" | "svg" | "list";

export function plansController(
  generation: GenerationService,
  requests: HouseRequestStore
): Record<PlanHandlers, RequestHandler> {
  async function load(req: Request): Promise<HouseRequest> {
    const { id } = requestIdSchema.parse(req.params);
    const request = await requests.findById(id);
    if (!request) {
      throw new HttpError(404, `Request ${id} not found`);
    }
    return request;
  }

  return {
    // POST /plans/generate — LLM plan → 3D house + floor plan, persisted
    async generate(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { sessionId } = generateSchema.parse(req.body);
        const result = await generation.generateFinal(sessionId);
        res.status(201).json({ success: true, data: result });
      } catch (err) {
        next(err);
      }
    },

    // GET /plans/:id — result summary with asset links
    async show(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const request = await load(req);
        res.json({
          success: true,
          data: {
            ...toSummary(request),
            glbUrl: `/plans/${request.id}/glb`,
            svgUrl: `/plans/${request.id}/svg`,
          },
        });
      } catch (err) {
        next(err);
      }
    },

    // GET /plans/:id/glb — binary glTF download
    async glb(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const request = await load(req);
        res
          .attachment(`house_${request.id}.glb`)
          .type("model/gltf-binary")
          .send(Buffer.from(request.glb));
      } catch (err) {
        next(err);
      }
    },

    // GET /plans/:id/svg — floor plan
    async svg(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const request = await load(req);
        res.type("image/svg+xml").send(request.svg);
      } catch (err) {
        next(err);
      }
    },

    // GET /plans — latest requests, newest first
    async list(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const recent = await requests.listRecent(RECENT_LIMIT);
        res.json({ success: true, data: recent });
      } catch (err) {
        next(err);
      }
    },
  };
}
