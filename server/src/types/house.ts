import { Binary, ObjectId } from "mongodb";
import type { ScenePath } from "../geometry/assembler";

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

/** What the user asked for, plus the cost worked out when the chat started */
export interface PlanParams {
  bhk: number;
  sqft: number;
  facing: string;
  style: string;
  pincode: string;
  rate: number;
  costEstimate: number;
}

export interface ChatSession {
  id: string;
  params: PlanParams;
  history: ChatMessage[];
  createdAt: Date;
  updatedAt: Date;
}

export interface HouseRequest extends PlanParams {
  id: string;
  chatHistory: ChatMessage[];
  finalPrompt: string;
  planText: string;
  scenePath: ScenePath;
  glb: Uint8Array;
  svg: string;
  createdAt: Date;
}

export type NewHouseRequest = Omit<HouseRequest, "id" | "createdAt">;

export type HouseRequestSummary = Omit<HouseRequest, "chatHistory" | "finalPrompt" | "glb" | "svg">;

// ---------------------------------------------------------------------------
// MongoDB documents
// ---------------------------------------------------------------------------

export interface HouseRequestDocument extends Omit<HouseRequest, "id" | "glb"> {
  _id?: ObjectId;
  glb: Binary;
}

export interface ChatSessionDocument extends Omit<ChatSession, "id"> {
  _id: string;
}
