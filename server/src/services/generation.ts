import { buildScene } from "../geometry/assembler";
import { renderFloorPlan } from "../geometry/floorPlan";
import { exportGlb } from "../geometry/glb";
import { HttpError } from "../utils/httpError";
import { log } from "../utils/logger";
import type { HouseRequestStore } from "./houseRequests";
import { buildPlanPrompt, fallbackPlanText, requestPlan, type PlanModel } from "./planner";
import type { ChatSessionStore } from "./sessions";

export interface GenerationResult {
  requestId: string;
  redirectUrl: string;
}

export class GenerationService {
  constructor(
    private readonly sessions: ChatSessionStore,
    private readonly requests: HouseRequestStore,
    private readonly planModel: PlanModel
  ) {}

  /**
   * Final step of a chat: ask for a structured plan, build the house from it
   * (or from the template), render the floor plan and persist everything.
   * Nothing is stored if the scene or its export fails.
   */
  async generateFinal(sessionId: string): Promise<GenerationResult> {
    const session = await this.sessions.get(sessionId);
    if (!session) {
      throw new HttpError(404, `Chat session ${sessionId} not found`);
    }
    const { params, history } = session;

    const prompt = buildPlanPrompt(params, history);
    const plan = await requestPlan(this.planModel, prompt);
    const planText = plan ? JSON.stringify(plan, null, 2) : fallbackPlanText(params);

    const built = buildScene({ roomCount: params.bhk, totalAreaSqFt: params.sqft, layout: plan });
    const glb = await exportGlb(built.scene, {
      roomCount: built.roomCount,
      totalAreaSqFt: built.totalAreaSqFt,
      category: built.category,
      path: built.path,
    });
    const svg = renderFloorPlan(params.bhk);

    const requestId = await this.requests.insert({
      ...params,
      chatHistory: history,
      finalPrompt: prompt,
      planText,
      scenePath: built.path,
      glb,
      svg,
    });
    await this.sessions.delete(sessionId);
    log.plan(`Request ${requestId} stored (${built.path} scene, ${glb.byteLength} bytes)`);

    return { requestId, redirectUrl: `/plans/${requestId}` };
  }
}
