import { randomUUID } from "crypto";
import { z } from "zod";
import { HttpError } from "../utils/httpError";
import { log } from "../utils/logger";
import type { ChatMessage, ChatSession, PlanParams } from "../types/house";
import type { ChatSessionStore } from "./sessions";
import { formatRupees, lookupRate } from "./rates";

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

export interface ChatModel {
  complete(messages: Array<{ role: "system" | "user" | "assistant"; content: string }>): Promise<string>;
}

const OPENROUTER_URL = "https://openrouter.ai/api/v1/chat/completions";

const openRouterResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .default([]),
});

/** OpenRouter chat-completions with a bounded wait */
export class OpenRouterChatModel implements ChatModel {
  constructor(
    private readonly apiKey: string | undefined,
    private readonly model: string,
    private readonly timeoutMs: number
  ) {}

  async complete(messages: Parameters<ChatModel["complete"]>[0]): Promise<string> {
    if (!this.apiKey) {
      throw new Error("OPENROUTER_API_KEY not set");
    }

    const res = await fetch(OPENROUTER_URL, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({ model: this.model, messages }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      throw new Error(`OpenRouter ${res.status} - ${await res.text()}`);
    }

    const body = openRouterResponseSchema.parse(await res.json());
    const content = body.choices[0]?.message?.content;
    if (typeof content !== "string") {
      throw new Error("OpenRouter response had no message content");
    }
    return content;
  }
}

// ---------------------------------------------------------------------------
// Smart chips
// ---------------------------------------------------------------------------

export const SMART_CHIPS = {
  initial: [
    "Modern minimalist design",
    "Traditional Tamil Nadu style",
    "Open kitchen layout",
    "Vastu-compliant design",
    "Add a pooja room",
    "Include a balcony",
  ],
  rooms: [
    "Master bedroom with attached bathroom",
    "Walk-in closet in master bedroom",
    "Large living room",
    "Separate dining area",
    "Modular kitchen",
    "Study room / home office",
  ],
  features: [
    "Natural lighting focus",
    "Cross ventilation",
    "Rainwater harvesting setup",
    "Solar panel ready",
    "Garden space",
    "Car parking area",
  ],
} as const;

export function chipsFor(historyLength: number): readonly string[] {
  if (historyLength > 4) return SMART_CHIPS.features;
  if (historyLength > 2) return SMART_CHIPS.rooms;
  return SMART_CHIPS.initial;
}

const READY_PHRASE = "ready to generate";
const MAX_TURNS_BEFORE_READY = 8;

export function isReadyToGenerate(reply: string, historyLength: number): boolean {
  return reply.toLowerCase().includes(READY_PHRASE) || historyLength > MAX_TURNS_BEFORE_READY;
}

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

export function systemPrompt(params: PlanParams): string {
  return (
    `You are a helpful house planning assistant.\n\n` +
    `User wants to build a ${params.bhk} BHK house with ${params.sqft} sqft area, ${params.facing} facing.\n` +
    `Estimated cost: ${formatRupees(params.costEstimate)}\n\n` +
    `Your job:\n` +
    `1. Ask clarifying questions about room preferences\n` +
    `2. Understand their style and functional needs\n` +
    `3. Suggest smart improvements\n` +
    `4. Keep responses concise (2-3 sentences max)\n` +
    `5. After gathering enough info, say "Ready to generate your house plan!"\n\n` +
    `Current conversation context available. Be conversational and helpful.`
  );
}

export function greeting(params: PlanParams): string {
  return (
    `Great! I'll help you design your ${params.bhk} BHK house (${params.sqft} sqft, ${params.facing} facing).\n\n` +
    `What's most important to you? Room sizes, natural lighting, privacy, or something else?`
  );
}

// ---------------------------------------------------------------------------
// Conversation
// ---------------------------------------------------------------------------

export interface StartParams {
  bhk: number;
  sqft: number;
  facing: string;
  style: string;
  pincode: string;
}

export interface ChatReply {
  response: string;
  smartChips: readonly string[];
  readyToGenerate: boolean;
}

export class PlanningChat {
  constructor(
    private readonly sessions: ChatSessionStore,
    private readonly model: ChatModel
  ) {}

  async start(input: StartParams): Promise<{ sessionId: string; message: string; smartChips: readonly string[] }> {
    const { rate } = lookupRate(input.pincode);
    const params: PlanParams = { ...input, rate, costEstimate: input.sqft * rate };
    const message = greeting(params);
    const now = new Date();

    const session: ChatSession = {
      id: randomUUID(),
      params,
      history: [{ role: "assistant", content: message }],
      createdAt: now,
      updatedAt: now,
    };
    await this.sessions.save(session);
    log.chat(`Session ${session.id} started (${params.bhk} BHK, ${params.sqft} sqft)`);

    return { sessionId: session.id, message, smartChips: SMART_CHIPS.initial };
  }

  async send(sessionId: string, text: string): Promise<ChatReply> {
    const session = await this.sessions.get(sessionId);
    if (!session) {
      throw new HttpError(404, `Chat session ${sessionId} not found`);
    }

    const history: ChatMessage[] = [...session.history, { role: "user", content: text }];
    const reply = await this.ask(session.params, history);
    history.push({ role: "assistant", content: reply });

    await this.sessions.save({ ...session, history, updatedAt: new Date() });

    return {
      response: reply,
      smartChips: chipsFor(history.length),
      readyToGenerate: isReadyToGenerate(reply, history.length),
    };
  }

  /** Model failures become an apology in the transcript rather than a failed request */
  private async ask(params: PlanParams, history: ChatMessage[]): Promise<string> {
    try {
      return await this.model.complete([{ role: "system", content: systemPrompt(params) }, ...history]);
    } catch (err) {
      log.error("chat", "Chat model call failed", err);
      const reason = err instanceof Error ? err.message : String(err);
      return `Sorry, I couldn't reach the planning assistant (${reason}). Please try again.`;
    }
  }
}
