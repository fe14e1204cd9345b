import type { Rgba } from "./types";

// ---------------------------------------------------------------------------
// Room categories — matched by case-insensitive substring, first rule wins
// ---------------------------------------------------------------------------

export type RoomCategory = "bedroom" | "living" | "kitchen" | "dining" | "bathroom";

export interface KeywordRule {
  keyword: string;
  category: RoomCategory;
}

/** Order used when furnishing template rooms */
export const FURNITURE_RULES: readonly KeywordRule[] = [
  { keyword: "bedroom", category: "bedroom" },
  { keyword: "living", category: "living" },
  { keyword: "kitchen", category: "kitchen" },
  { keyword: "dining", category: "dining" },
  { keyword: "bathroom", category: "bathroom" },
];

/** Order used when tinting rooms from a structured layout */
export const COLOR_RULES: readonly KeywordRule[] = [
  { keyword: "bedroom", category: "bedroom" },
  { keyword: "living", category: "living" },
  { keyword: "kitchen", category: "kitchen" },
  { keyword: "bathroom", category: "bathroom" },
  { keyword: "dining", category: "dining" },
];

export function classifyRoom(name: string, rules: readonly KeywordRule[]): RoomCategory | null {
  const lower = name.toLowerCase();
  for (const rule of rules) {
    if (lower.includes(rule.keyword)) return rule.category;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Colours
// ---------------------------------------------------------------------------

export const ROOM_COLORS: Readonly<Record<RoomCategory, Rgba>> = {
  bedroom: [200, 150, 150, 255],
  living: [150, 200, 150, 255],
  kitchen: [150, 150, 200, 255],
  bathroom: [200, 200, 150, 255],
  dining: [180, 150, 200, 255],
};

export const DEFAULT_ROOM_COLOR: Rgba = [180, 180, 180, 255];

export function roomColor(name: string): Rgba {
  const category = classifyRoom(name, COLOR_RULES);
  return category ? ROOM_COLORS[category] : DEFAULT_ROOM_COLOR;
}

export const PALETTE = {
  roomFloor: [245, 245, 220, 255],
  slab: [220, 220, 220, 255],
  exteriorWall: [210, 180, 140, 255],
  interiorWall: [220, 220, 220, 255],
  grass: [144, 238, 144, 255],
  concrete: [128, 128, 128, 255],
  trunk: [101, 67, 33, 255],
  foliage: [34, 139, 34, 255],
  wood: [139, 69, 19, 255],
  darkWood: [160, 82, 45, 255],
  upholstery: [70, 130, 180, 255],
  steel: [192, 192, 192, 255],
  porcelain: [255, 255, 255, 255],
} as const satisfies Record<string, Rgba>;
