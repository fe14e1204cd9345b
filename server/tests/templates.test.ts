import { describe, it, expect } from "@jest/globals";
import { getLayout, getPlanLayout, templateCategory } from "../src/geometry/templates";
import type { RoomRect } from "../src/geometry/types";

function overlapArea(a: RoomRect, b: RoomRect): number {
  const dx = Math.min(a.x + a.w, b.x + b.w) - Math.max(a.x, b.x);
  const dy = Math.min(a.y + a.d, b.y + b.d) - Math.max(a.y, b.y);
  return dx > 0 && dy > 0 ? dx * dy : 0;
}

describe("templateCategory", () => {
  it("clamps counts of one or less to the 1-room template", () => {
    expect(templateCategory(1)).toBe("1");
    expect(templateCategory(0)).toBe("1");
    expect(templateCategory(-3)).toBe("1");
    expect(templateCategory(Number.NaN)).toBe("1");
  });

  it("maps 2 and 3 to their own templates and larger counts to 4-plus", () => {
    expect(templateCategory(2)).toBe("2");
    expect(templateCategory(3)).toBe("3");
    expect(templateCategory(4)).toBe("4-plus");
    expect(templateCategory(9)).toBe("4-plus");
  });
});

describe("getLayout", () => {
  it.each([1, 2, 3, 4])("returns non-overlapping rooms for %i BHK", (count) => {
    const rooms = getLayout(count);
    expect(rooms.length).toBeGreaterThan(0);
    for (let i = 0; i < rooms.length; i++) {
      expect(rooms[i].w).toBeGreaterThan(0);
      expect(rooms[i].d).toBeGreaterThan(0);
      for (let j = i + 1; j < rooms.length; j++) {
        expect(overlapArea(rooms[i], rooms[j])).toBe(0);
      }
    }
  });

  it("lists the 2 BHK rooms in template order", () => {
    expect(getLayout(2).map((r) => r.name)).toEqual([
      "Living Room", "Bedroom 1", "Bedroom 2", "Kitchen", "Bathroom", "Dining",
    ]);
  });

  it("uses the 4-plus template for large counts", () => {
    expect(getLayout(6)).toEqual(getLayout(4));
    expect(getLayout(4)).toHaveLength(9);
  });

  it("hands out copies the caller may change", () => {
    const first = getLayout(1);
    first[0].w = 99;
    expect(getLayout(1)[0]).toEqual({ name: "Living Room", x: 0, y: 0, w: 4, d: 5 });
  });
});

describe("getPlanLayout", () => {
  it("has its own pixel coordinates per category", () => {
    expect(getPlanLayout(3).map((r) => r.name)).toEqual([
      "Living", "Bedroom 1", "Bedroom 2", "Bedroom 3", "Kitchen", "Bath 1",
    ]);
    expect(getPlanLayout(1)[0]).toEqual({ name: "Living", x: 50, y: 50, w: 300, h: 250 });
  });
});
