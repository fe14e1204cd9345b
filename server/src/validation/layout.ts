import { z } from "zod";

const finite = () => z.number().finite();

/** One room of an LLM-produced layout; all lengths in feet */
export const structuredRoomSchema = z.object({
  name: z.string().min(1, "room name is required"),
  dimensions: z.object({
    length: finite().positive(),
    width: finite().positive(),
    height: finite().positive(),
  }),
  position: z.object({
    x: finite(),
    y: finite(),
    z: finite().default(0),
  }),
  features: z.array(z.string()).default([]),
});

/** Only `rooms` is read; the plan may carry other keys (materials, cost breakdown, …) */
export const structuredLayoutSchema = z
  .object({
    rooms: z.array(structuredRoomSchema),
  })
  .passthrough();

export type StructuredRoom = z.infer<typeof structuredRoomSchema>;
export type StructuredLayout = z.infer<typeof structuredLayoutSchema>;
