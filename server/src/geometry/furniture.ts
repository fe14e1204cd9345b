import type { Mesh } from "three";
import { box, cylinder } from "./primitives";
import { classifyRoom, FURNITURE_RULES, PALETTE, type RoomCategory } from "./palette";
import type { Vec3 } from "./types";

interface RoomFrame {
  name: string;
  /** Minimum corner of the room; z is the top of its floor */
  origin: Vec3;
  width: number;
  depth: number;
}

type Furnisher = (room: RoomFrame) => Mesh[];

// Offsets are relative to the room origin: x along width, y along depth, z up from the floor.
const FURNISHERS: Readonly<Record<RoomCategory, Furnisher>> = {
  bedroom: ({ name, origin: o, width, depth }) => [
    box(`${name}_Bed`, { x: 1.8, y: 2.0, z: 0.5 },
      { x: o.x + width / 2, y: o.y + depth / 2, z: o.z + 0.25 }, PALETTE.wood),
    box(`${name}_Nightstand`, { x: 0.4, y: 0.4, z: 0.5 },
      { x: o.x + width / 2 + 1.2, y: o.y + depth / 2, z: o.z + 0.25 }, PALETTE.darkWood),
  ],

  living: ({ name, origin: o, width }) => [
    box(`${name}_Sofa`, { x: 2.0, y: 0.8, z: 0.7 },
      { x: o.x + width / 2, y: o.y + 1.0, z: o.z + 0.35 }, PALETTE.upholstery),
    box(`${name}_Table`, { x: 1.0, y: 0.6, z: 0.4 },
      { x: o.x + width / 2, y: o.y + 2.2, z: o.z + 0.2 }, PALETTE.wood),
  ],

  // counter runs along the back wall, 0.25 short of each side
  kitchen: ({ name, origin: o, width }) => [
    box(`${name}_Counter`, { x: width - 0.5, y: 0.6, z: 0.9 },
      { x: o.x + width / 2, y: o.y + 0.5, z: o.z + 0.45 }, PALETTE.steel),
  ],

  dining: ({ name, origin: o, width, depth }) => [
    box(`${name}_Dining_Table`, { x: 1.5, y: 1.0, z: 0.75 },
      { x: o.x + width / 2, y: o.y + depth / 2, z: o.z + 0.375 }, PALETTE.wood),
  ],

  bathroom: ({ name, origin: o }) => [
    cylinder(`${name}_Toilet`, 0.25, 0.4,
      { x: o.x + 0.5, y: o.y + 0.5, z: o.z + 0.2 }, PALETTE.porcelain),
  ],
};

/**
 * Furniture for one room, chosen by the first keyword in its name.
 * Unrecognised room types get nothing. Mesh names are `<room>_<item>`.
 */
export function furnitureFor(roomName: string, origin: Vec3, roomWidth: number, roomDepth: number): Mesh[] {
  const category = classifyRoom(roomName, FURNITURE_RULES);
  if (!category) return [];
  return FURNISHERS[category]({ name: roomName, origin, width: roomWidth, depth: roomDepth });
}
