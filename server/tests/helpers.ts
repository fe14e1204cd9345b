import { expect } from "@jest/globals";
import { Box3, Mesh, Scene, Vector3 } from "three";
import { sceneMeshes } from "../src/geometry/primitives";
import type { ChatModel } from "../src/services/chat";
import { toSummary, type HouseRequestStore } from "../src/services/houseRequests";
import type { PlanModel } from "../src/services/planner";
import type { ChatSessionStore } from "../src/services/sessions";
import type { ChatSession, HouseRequest, HouseRequestSummary, NewHouseRequest } from "../src/types/house";

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

export interface Extent {
  min: Vector3;
  max: Vector3;
  center: Vector3;
  size: Vector3;
}

export function extentOf(mesh: Mesh): Extent {
  const box = new Box3().setFromObject(mesh);
  return {
    min: box.min,
    max: box.max,
    center: box.getCenter(new Vector3()),
    size: box.getSize(new Vector3()),
  };
}

export function expectVec(actual: Vector3, x: number, y: number, z: number): void {
  expect(actual.x).toBeCloseTo(x, 5);
  expect(actual.y).toBeCloseTo(y, 5);
  expect(actual.z).toBeCloseTo(z, 5);
}

export function meshNamed(meshes: Mesh[] | Scene, name: string): Mesh {
  const list = meshes instanceof Scene ? sceneMeshes(meshes) : meshes;
  const found = list.find((m) => m.name === name);
  if (!found) throw new Error(`no mesh named ${name}`);
  return found;
}

export function namesOf(scene: Scene): string[] {
  return sceneMeshes(scene).map((m) => m.name);
}

/** Name + rounded extent per node, for comparing two scenes */
export function describeScene(scene: Scene): Array<[string, number[]]> {
  const r = (n: number) => Math.round(n * 1e6) / 1e6;
  return sceneMeshes(scene).map((m) => {
    const { min, max } = extentOf(m);
    return [m.name, [min.x, min.y, min.z, max.x, max.y, max.z].map(r)];
  });
}

export function firstColor(mesh: Mesh): number[] {
  const color = mesh.geometry.attributes.color;
  return [color.getX(0), color.getY(0), color.getZ(0), color.getW(0)].map((c) => Math.round(c * 255));
}

// ---------------------------------------------------------------------------
// In-process stand-ins for MongoDB and the LLMs
// ---------------------------------------------------------------------------

export class InMemoryHouseRequestStore implements HouseRequestStore {
  readonly rows: HouseRequest[] = [];

  async insert(request: NewHouseRequest): Promise<string> {
    const id = `req-${this.rows.length + 1}`;
    this.rows.push({ ...request, id, createdAt: new Date() });
    return id;
  }

  async findById(id: string): Promise<HouseRequest | null> {
    return this.rows.find((r) => r.id === id) ?? null;
  }

  async listRecent(limit: number): Promise<HouseRequestSummary[]> {
    return [...this.rows].reverse().slice(0, limit).map(toSummary);
  }
}

export class InMemoryChatSessionStore implements ChatSessionStore {
  readonly sessions = new Map<string, ChatSession>();

  async get(id: string): Promise<ChatSession | null> {
    return this.sessions.get(id) ?? null;
  }

  async save(session: ChatSession): Promise<void> {
    this.sessions.set(session.id, session);
  }

  async delete(id: string): Promise<void> {
    this.sessions.delete(id);
  }
}

/** Replies from a queue; the last reply repeats. A queued Error is thrown. */
export class ScriptedChatModel implements ChatModel {
  readonly calls: Array<Parameters<ChatModel["complete"]>[0]> = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(messages: Parameters<ChatModel["complete"]>[0]): Promise<string> {
    this.calls.push(messages);
    const next = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (next === undefined) return "";
    if (next instanceof Error) throw next;
    return next;
  }
}

export class FixedPlanModel implements PlanModel {
  readonly prompts: string[] = [];

  constructor(private readonly reply: string | Error) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}
