import type { Mesh } from "three";
import { box } from "./primitives";
import { PALETTE } from "./palette";
import type { Bounds, RoomRect } from "./types";

export const WALL_HEIGHT = 3.5;
export const EXTERIOR_WALL_THICKNESS = 0.25;
export const INTERIOR_WALL_THICKNESS = 0.15;
/** Max gap between two edges that still counts as a shared wall */
export const ADJACENCY_TOLERANCE = 0.1;

export function footprintBounds(rooms: readonly RoomRect[]): Bounds {
  return {
    maxX: Math.max(...rooms.map((r) => r.x + r.w)),
    maxY: Math.max(...rooms.map((r) => r.y + r.d)),
  };
}

// ---------------------------------------------------------------------------
// Perimeter
// ---------------------------------------------------------------------------

/** Four exterior walls hugging the outside of (0,0)–(maxX,maxY). North is −y, west is −x. */
export function perimeterWalls({ maxX, maxY }: Bounds): Mesh[] {
  const t = EXTERIOR_WALL_THICKNESS;
  const h = WALL_HEIGHT;
  const color = PALETTE.exteriorWall;
  return [
    box("Wall_North", { x: maxX + 2 * t, y: t, z: h }, { x: maxX / 2, y: -t / 2, z: h / 2 }, color),
    box("Wall_South", { x: maxX + 2 * t, y: t, z: h }, { x: maxX / 2, y: maxY + t / 2, z: h / 2 }, color),
    box("Wall_West", { x: t, y: maxY, z: h }, { x: -t / 2, y: maxY / 2, z: h / 2 }, color),
    box("Wall_East", { x: t, y: maxY, z: h }, { x: maxX + t / 2, y: maxY / 2, z: h / 2 }, color),
  ];
}

// ---------------------------------------------------------------------------
// Shared walls between rooms
// ---------------------------------------------------------------------------

export interface SharedEdge {
  /** vertical: the wall runs along y at x = `at`; horizontal: along x at y = `at` */
  orientation: "vertical" | "horizontal";
  at: number;
  from: number;
  to: number;
}

export interface Adjacency extends SharedEdge {
  /** Indices into the room list, first < second */
  rooms: [number, number];
}

function overlap(a1: number, a2: number, b1: number, b2: number): [number, number] | null {
  const lo = Math.max(a1, b1);
  const hi = Math.min(a2, b2);
  return hi > lo ? [lo, hi] : null;
}

/**
 * The wall two rooms share, if any. Side-by-side rooms are checked before
 * stacked ones; the wall sits on the far edge of the left (or lower) room.
 * Symmetric in its arguments.
 */
export function sharedEdge(a: RoomRect, b: RoomRect): SharedEdge | null {
  const ySpan = overlap(a.y, a.y + a.d, b.y, b.y + b.d);
  if (ySpan) {
    const [left, right] = a.x <= b.x ? [a, b] : [b, a];
    if (Math.abs(left.x + left.w - right.x) < ADJACENCY_TOLERANCE) {
      return { orientation: "vertical", at: left.x + left.w, from: ySpan[0], to: ySpan[1] };
    }
  }

  const xSpan = overlap(a.x, a.x + a.w, b.x, b.x + b.w);
  if (xSpan) {
    const [lower, upper] = a.y <= b.y ? [a, b] : [b, a];
    if (Math.abs(lower.y + lower.d - upper.y) < ADJACENCY_TOLERANCE) {
      return { orientation: "horizontal", at: lower.y + lower.d, from: xSpan[0], to: xSpan[1] };
    }
  }

  return null;
}

/** Pairwise scan; at most one adjacency per unordered pair */
export function findAdjacencies(rooms: readonly RoomRect[]): Adjacency[] {
  const found: Adjacency[] = [];
  for (let i = 0; i < rooms.length; i++) {
    for (let j = i + 1; j < rooms.length; j++) {
      const edge = sharedEdge(rooms[i], rooms[j]);
      if (edge) found.push({ ...edge, rooms: [i, j] });
    }
  }
  return found;
}

export function internalWalls(rooms: readonly RoomRect[]): Mesh[] {
  const t = INTERIOR_WALL_THICKNESS;
  const h = WALL_HEIGHT;
  return findAdjacencies(rooms).map(({ orientation, at, from, to, rooms: [i, j] }) => {
    const mid = (from + to) / 2;
    return orientation === "vertical"
      ? box(`Wall_internal_${i}_${j}`, { x: t, y: to - from, z: h }, { x: at, y: mid, z: h / 2 }, PALETTE.interiorWall)
      : box(`Wall_internal_${i}_${j}_h`, { x: to - from, y: t, z: h }, { x: mid, y: at, z: h / 2 }, PALETTE.interiorWall);
  });
}
