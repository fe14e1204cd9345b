/**
 * Plan Generator
 *
 * Turns the chat transcript into a prompt asking Gemini for a JSON room
 * layout, and parses whatever comes back. Any failure yields `null` so the
 * caller renders the template house instead.
 */

import { GoogleGenerativeAI } from "@google/generative-ai";
import { log } from "../utils/logger";
import type { ChatMessage, PlanParams } from "../types/house";

export interface PlanModel {
  /** Raw model text for the prompt */
  generate(prompt: string): Promise<string>;
}

export class GeminiPlanModel implements PlanModel {
  constructor(
    private readonly apiKey: string | undefined,
    private readonly modelName: string
  ) {}

  async generate(prompt: string): Promise<string> {
    if (!this.apiKey) {
      throw new Error("GOOGLE_API_KEY not set");
    }
    const genAI = new GoogleGenerativeAI(this.apiKey);
    const model = genAI.getGenerativeModel({
      model: this.modelName,
      generationConfig: { temperature: 0.4, responseMimeType: "application/json" },
    });
    const result = await model.generateContent(prompt);
    return result.response.text();
  }
}

const CONTEXT_TURNS = 6;

export function buildPlanPrompt(params: PlanParams, history: readonly ChatMessage[]): string {
  const conversation = history
    .slice(-CONTEXT_TURNS)
    .map((msg) => `${msg.role}: ${msg.content}`)
    .join("\n");

  return `Generate a detailed 3D house plan specification in JSON format.

USER REQUIREMENTS:
- BHK: ${params.bhk}
- Total Area: ${params.sqft} sq ft
- Facing: ${params.facing}
- Style: ${params.style}

CONVERSATION CONTEXT:
${conversation}

Generate a JSON structure with:
{
  "rooms": [
    {
      "name": "Master Bedroom",
      "dimensions": {"length": 14, "width": 12, "height": 10},
      "position": {"x": 0, "y": 0, "z": 0},
      "features": ["attached_bathroom", "balcony"]
    },
    ...
  ],
  "vastu_compliance": "...",
  "materials": [...],
  "cost_breakdown": {...}
}

All lengths and positions are in feet; position is the centre of the room.

Consider:
1. Room proportions for ${params.bhk} BHK
2. ${params.facing} facing Vastu principles
3. User preferences from conversation
4. ${params.style} architectural style
5. Tamil Nadu climate considerations

Return ONLY valid JSON, no explanations.`;
}

/** Strips markdown fences and parses; anything but a JSON object gives null. */
export function parsePlanResponse(text: string): Record<string, unknown> | null {
  const cleaned = text.trim().replace(/^```(?:json)?\s*/i, "").replace(/```\s*$/i, "").trim();
  try {
    const parsed: unknown = JSON.parse(cleaned);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;
    return Object.fromEntries(Object.entries(parsed));
  } catch {
    log.warn("plan", "Plan response was not valid JSON");
    return null;
  }
}

export function fallbackPlanText(params: PlanParams): string {
  return (
    `${params.bhk} BHK House Plan\nArea: ${params.sqft} sqft\nFacing: ${params.facing}\nStyle: ${params.style}\n\n` +
    `Based on your conversation, we've designed a custom layout.`
  );
}

/** Prompt → model → parsed plan; null on any failure */
export async function requestPlan(model: PlanModel, prompt: string): Promise<Record<string, unknown> | null> {
  try {
    const text = await model.generate(prompt);
    const plan = parsePlanResponse(text);
    if (plan) log.plan("Gemini returned a structured plan");
    return plan;
  } catch (err) {
    log.error("plan", "Gemini call failed", err);
    return null;
  }
}
