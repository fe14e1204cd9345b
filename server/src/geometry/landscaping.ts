import type { Mesh } from "three";
import { box, cone, cylinder } from "./primitives";
import { PALETTE } from "./palette";
import type { Bounds } from "./types";

const TRUNK = { radius: 0.15, height: 1.5 };
const CROWN = { radius: 0.8, height: 1.5 };
/** Ground slab overhang past the building on each side */
const GROUND_MARGIN = 2;

/** A tree just outside each corner of the footprint: trunk plus a cone resting on it */
export function trees({ maxX, maxY }: Bounds): Mesh[] {
  const spots: Array<[number, number]> = [
    [-1.5, 2],
    [-1.5, maxY - 2],
    [maxX + 1.5, 2],
    [maxX + 1.5, maxY - 2],
  ];

  return spots.flatMap(([x, y], i) => {
    const name = `Tree_${i + 1}`;
    return [
      cylinder(`${name}_trunk`, TRUNK.radius, TRUNK.height, { x, y, z: TRUNK.height / 2 }, PALETTE.trunk),
      cone(`${name}_foliage`, CROWN.radius, CROWN.height,
        { x, y, z: TRUNK.height + CROWN.height / 2 }, PALETTE.foliage),
    ];
  });
}

export function ground({ maxX, maxY }: Bounds): Mesh {
  return box("Ground",
    { x: maxX + 2 * GROUND_MARGIN, y: maxY + 2 * GROUND_MARGIN, z: 0.1 },
    { x: maxX / 2, y: maxY / 2, z: -0.05 },
    PALETTE.grass);
}

/** Concrete strip along the west side, running the full depth of the ground */
export function driveway({ maxY }: Bounds): Mesh {
  return box("Driveway",
    { x: 2, y: maxY + 2 * GROUND_MARGIN, z: 0.08 },
    { x: -2, y: maxY / 2, z: 0.04 },
    PALETTE.concrete);
}
