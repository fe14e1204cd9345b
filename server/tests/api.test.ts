import { describe, it, expect, beforeAll, afterAll } from "@jest/globals";
import type { Server } from "http";
import { z } from "zod";
import { createApp } from "../src/app";
import {
  FixedPlanModel,
  InMemoryChatSessionStore,
  InMemoryHouseRequestStore,
  ScriptedChatModel,
} from "./helpers";

const structuredReply = "```json\n" + JSON.stringify({
  rooms: [
    {
      name: "Hall",
      dimensions: { length: 16.4, width: 13.12, height: 9.84 },
      position: { x: 0, y: 0, z: 0 },
    },
  ],
}) + "\n```";

const envelope = <T extends z.ZodTypeAny>(data: T) => z.object({ success: z.literal(true), data });

interface Harness {
  server: Server;
  baseUrl: string;
  requests: InMemoryHouseRequestStore;
}

async function startApp(planModel: FixedPlanModel): Promise<Harness> {
  const requests = new InMemoryHouseRequestStore();
  const app = createApp({
    requests,
    sessions: new InMemoryChatSessionStore(),
    chatModel: new ScriptedChatModel(["Sounds good. Ready to generate your house plan!"]),
    planModel,
    isDBConnected: async () => false,
  });

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  return { server, baseUrl: `http://127.0.0.1:${address.port}`, requests };
}

function stopApp({ server }: Harness): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

async function post(h: Harness, path: string, body: unknown): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`${h.baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  return { status: res.status, body: await res.json() };
}

async function startChat(h: Harness): Promise<string> {
  const init = await post(h, "/chat/init", { bhk: 2, sqft: 1200, facing: "East", style: "Modern", pincode: "641035" });
  expect(init.status).toBe(201);
  return envelope(z.object({ sessionId: z.string() })).parse(init.body).data.sessionId;
}

describe("HTTP API", () => {
  let h: Harness;
  const planModel = new FixedPlanModel(structuredReply);

  beforeAll(async () => {
    h = await startApp(planModel);
  });

  afterAll(async () => {
    await stopApp(h);
  });

  it("reports health without a database", async () => {
    const res = await fetch(`${h.baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", dbConnected: false });
  });

  it("calculates cost from area, unit and pincode", async () => {
    const res = await post(h, "/rates/calculate", { plotSize: 100, unit: "sqm", pincode: "641035" });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      data: {
        sqft: 1076,
        rate: 7000,
        costEstimate: 7532000,
        formattedCost: "₹7,532,000",
        district: "Coimbatore",
      },
    });
  });

  it("rejects an unknown area unit", async () => {
    const res = await post(h, "/rates/calculate", { plotSize: 100, unit: "acre" });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ success: false, error: "Validation failed" });
  });

  it("prices pincodes outside the district table at the default rate", async () => {
    const res = await post(h, "/rates/calculate", { plotSize: 1000, unit: "sqft", pincode: "XYZ-1" });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ success: true, data: { rate: 1500, district: "Unknown", costEstimate: 1500000 } });
  });

  it("accepts the seven-digit Chennai codes", async () => {
    const res = await post(h, "/rates/calculate", { plotSize: 1000, pincode: "6000100" });
    expect(res.body).toMatchObject({ success: true, data: { rate: 15000, district: "Chennai" } });
  });

  it("rejects a blank pincode", async () => {
    const res = await post(h, "/rates/calculate", { plotSize: 1000, pincode: "  " });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ success: false, details: [{ message: "pincode is required" }] });
  });

  it("returns 404 for a message to an unknown session", async () => {
    const res = await post(h, "/chat/message", { sessionId: "nope", message: "hi" });
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, error: "Chat session nope not found" });
  });

  it("runs a chat through to a stored, downloadable house", async () => {
    const sessionId = await startChat(h);

    const message = await post(h, "/chat/message", { sessionId, message: "Two bedrooms facing the garden" });
    expect(message.status).toBe(200);
    expect(message.body).toMatchObject({ success: true, data: { readyToGenerate: true } });

    const generated = await post(h, "/plans/generate", { sessionId });
    expect(generated.status).toBe(201);
    const { requestId, redirectUrl } = envelope(
      z.object({ requestId: z.string(), redirectUrl: z.string() })
    ).parse(generated.body).data;
    expect(redirectUrl).toBe(`/plans/${requestId}`);
    expect(planModel.prompts.at(-1)).toContain("user: Two bedrooms facing the garden");

    const show = await fetch(`${h.baseUrl}/plans/${requestId}`);
    const shown = envelope(z.object({}).passthrough()).parse(await show.json()).data;
    expect(shown).toMatchObject({
      id: requestId,
      bhk: 2,
      sqft: 1200,
      rate: 7000,
      costEstimate: 8400000,
      scenePath: "structured",
      glbUrl: `/plans/${requestId}/glb`,
      svgUrl: `/plans/${requestId}/svg`,
    });
    expect(Object.keys(shown)).not.toContain("glb");
    expect(Object.keys(shown)).not.toContain("chatHistory");

    const glb = await fetch(`${h.baseUrl}/plans/${requestId}/glb`);
    expect(glb.status).toBe(200);
    expect(glb.headers.get("content-type")).toBe("model/gltf-binary");
    expect(glb.headers.get("content-disposition")).toBe(`attachment; filename="house_${requestId}.glb"`);
    const bytes = new Uint8Array(await glb.arrayBuffer());
    expect(Buffer.from(bytes.subarray(0, 4)).toString("ascii")).toBe("glTF");

    const svg = await fetch(`${h.baseUrl}/plans/${requestId}/svg`);
    expect(svg.headers.get("content-type")).toMatch(/^image\/svg\+xml/);
    expect(await svg.text()).toBe(h.requests.rows[0].svg);

    const list = await fetch(`${h.baseUrl}/plans`);
    const listed = envelope(z.array(z.object({ id: z.string() }).passthrough())).parse(await list.json()).data;
    expect(listed.map((r) => r.id)).toEqual([requestId]);

    const again = await post(h, "/plans/generate", { sessionId });
    expect(again.status).toBe(404);
  });

  it("returns 404 for an unknown plan", async () => {
    const res = await fetch(`${h.baseUrl}/plans/does-not-exist/glb`);
    expect(res.status).toBe(404);
  });
});

describe("HTTP API without a usable plan model", () => {
  let h: Harness;

  beforeAll(async () => {
    h = await startApp(new FixedPlanModel(new Error("model unavailable")));
  });

  afterAll(async () => {
    await stopApp(h);
  });

  it("still builds the template house", async () => {
    const sessionId = await startChat(h);
    const generated = await post(h, "/plans/generate", { sessionId });
    expect(generated.status).toBe(201);

    expect(h.requests.rows).toHaveLength(1);
    expect(h.requests.rows[0].scenePath).toBe("template");
    expect(h.requests.rows[0].planText).toBe(
      "2 BHK House Plan\nArea: 1200 sqft\nFacing: East\nStyle: Modern\n\nBased on your conversation, we've designed a custom layout."
    );
  });
});
