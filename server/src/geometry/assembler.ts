import { Scene } from "three";
import { log } from "../utils/logger";
import { structuredLayoutSchema, type StructuredRoom } from "../validation/layout";
import { furnitureFor } from "./furniture";
import { driveway, ground, trees } from "./landscaping";
import { PALETTE, roomColor } from "./palette";
import { box } from "./primitives";
import { getLayout, templateCategory } from "./templates";
import type { TemplateCategory } from "./types";
import { footprintBounds, internalWalls, perimeterWalls } from "./walls";

export const FEET_PER_METER = 3.28;
const ROOM_FLOOR_THICKNESS = 0.05;
/** Total overhang added to the slab under a structured layout (half per side) */
const SLAB_MARGIN = 2;

export interface SceneRequest {
  roomCount: number;
  totalAreaSqFt: number;
  /** Parsed LLM plan, or anything else; only a valid non-empty `rooms` list is used */
  layout?: unknown;
}

export type ScenePath = "structured" | "template";

export interface BuiltScene {
  scene: Scene;
  path: ScenePath;
  category: TemplateCategory;
  roomCount: number;
  totalAreaSqFt: number;
}

// ---------------------------------------------------------------------------
// Template path — floors, furniture, walls, landscaping
// ---------------------------------------------------------------------------

export function buildTemplateScene(roomCount: number): Scene {
  const scene = new Scene();
  const rooms = getLayout(roomCount);

  for (const room of rooms) {
    scene.add(box(`${room.name}_floor`,
      { x: room.w, y: room.d, z: ROOM_FLOOR_THICKNESS },
      { x: room.x + room.w / 2, y: room.y + room.d / 2, z: ROOM_FLOOR_THICKNESS / 2 },
      PALETTE.roomFloor));

    const origin = { x: room.x, y: room.y, z: ROOM_FLOOR_THICKNESS };
    for (const item of furnitureFor(room.name, origin, room.w, room.d)) {
      scene.add(item);
    }
  }

  const bounds = footprintBounds(rooms);
  scene.add(ground(bounds));
  scene.add(...perimeterWalls(bounds));

  const partitions = internalWalls(rooms);
  if (partitions.length > 0) scene.add(...partitions);

  scene.add(...trees(bounds));
  scene.add(driveway(bounds));
  return scene;
}

// ---------------------------------------------------------------------------
// Structured path — one box per supplied room plus a slab under them all
// ---------------------------------------------------------------------------

export function buildStructuredScene(rooms: readonly StructuredRoom[]): Scene {
  if (rooms.length === 0) throw new Error("structured layout has no rooms");

  const scene = new Scene();
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;

  for (const room of rooms) {
    const length = room.dimensions.length / FEET_PER_METER;
    const width = room.dimensions.width / FEET_PER_METER;
    const height = room.dimensions.height / FEET_PER_METER;
    const x = room.position.x / FEET_PER_METER;
    const y = room.position.y / FEET_PER_METER;

    // Centred on its position, resting on the ground
    scene.add(box(room.name,
      { x: length, y: width, z: height },
      { x, y, z: height / 2 },
      roomColor(room.name)));

    minX = Math.min(minX, x - length / 2);
    minY = Math.min(minY, y - width / 2);
    maxX = Math.max(maxX, x + length / 2);
    maxY = Math.max(maxY, y + width / 2);
  }

  scene.add(box("floor",
    { x: maxX - minX + SLAB_MARGIN, y: maxY - minY + SLAB_MARGIN, z: 0.1 },
    { x: (minX + maxX) / 2, y: (minY + maxY) / 2, z: -0.05 },
    PALETTE.slab));
  return scene;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Builds the house scene for one request. A usable structured layout is
 * rendered directly; anything else (null, wrong shape, empty room list, or a
 * failure while building) falls back to the template for `roomCount`.
 */
export function buildScene(req: SceneRequest): BuiltScene {
  const category = templateCategory(req.roomCount);
  const meta = { category, roomCount: req.roomCount, totalAreaSqFt: req.totalAreaSqFt };

  if (req.layout != null) {
    const parsed = structuredLayoutSchema.safeParse(req.layout);
    if (!parsed.success) {
      log.warn("geometry", "Structured layout rejected — using template", parsed.error.issues.map((i) => i.message));
    } else if (parsed.data.rooms.length === 0) {
      log.warn("geometry", "Structured layout has no rooms — using template");
    } else {
      try {
        const scene = buildStructuredScene(parsed.data.rooms);
        log.geometry(`Built structured scene (${parsed.data.rooms.length} rooms)`);
        return { scene, path: "structured", ...meta };
      } catch (err) {
        log.error("geometry", "Structured scene failed — using template", err);
      }
    }
  }

  const scene = buildTemplateScene(req.roomCount);
  log.geometry(`Built template scene (${category}, ${req.totalAreaSqFt} sqft)`);
  return { scene, path: "template", ...meta };
}
