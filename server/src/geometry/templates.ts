import { z } from "zod";
import layoutData from "../../data/layouts.json";
import type { PlanRoom, RoomRect, TemplateCategory } from "./types";

// ---------------------------------------------------------------------------
// Template tables — validated once at load, read-only afterwards
// ---------------------------------------------------------------------------

const roomRectSchema = z.object({
  name: z.string().min(1),
  x: z.number(),
  y: z.number(),
  w: z.number().positive(),
  d: z.number().positive(),
});

const planRoomSchema = z.object({
  name: z.string().min(1),
  x: z.number().int(),
  y: z.number().int(),
  w: z.number().int().positive(),
  h: z.number().int().positive(),
});

function byCategory<T extends z.ZodTypeAny>(room: T) {
  const list = z.array(room).nonempty();
  return z.object({ "1": list, "2": list, "3": list, "4-plus": list });
}

const layoutFileSchema = z.object({
  house: byCategory(roomRectSchema),
  floorPlan: byCategory(planRoomSchema),
});

const tables = layoutFileSchema.parse(layoutData);

const HOUSE_TEMPLATES: Readonly<Record<TemplateCategory, readonly RoomRect[]>> = Object.freeze(tables.house);
const PLAN_TEMPLATES: Readonly<Record<TemplateCategory, readonly PlanRoom[]>> = Object.freeze(tables.floorPlan);

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

/** Maps any room count onto a template category; counts ≤1 use the 1-room layout. */
export function templateCategory(roomCount: number): TemplateCategory {
  const count = Math.trunc(roomCount);
  if (Number.isNaN(count) || count <= 1) return "1";
  if (count === 2) return "2";
  if (count === 3) return "3";
  return "4-plus";
}

/** Room footprints (meters) for the 3D template scene */
export function getLayout(roomCount: number): RoomRect[] {
  return HOUSE_TEMPLATES[templateCategory(roomCount)].map((room) => ({ ...room }));
}

/** Room boxes (pixels) for the 2D floor plan; not coordinate-compatible with getLayout */
export function getPlanLayout(roomCount: number): PlanRoom[] {
  return PLAN_TEMPLATES[templateCategory(roomCount)].map((room) => ({ ...room }));
}
