/** RGBA colour, 0–255 per channel */
export type Rgba = readonly [number, number, number, number];

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Axis-aligned room footprint on the ground plane (meters).
 * `x`/`y` is the minimum corner; `w` runs along x, `d` along y.
 */
export interface RoomRect {
  name: string;
  x: number;
  y: number;
  w: number;
  d: number;
}

/** Building envelope, always anchored at the origin */
export interface Bounds {
  maxX: number;
  maxY: number;
}

export type TemplateCategory = "1" | "2" | "3" | "4-plus";

/** Room box on the 2D floor-plan canvas (pixels) */
export interface PlanRoom {
  name: string;
  x: number;
  y: number;
  w: number;
  h: number;
}
