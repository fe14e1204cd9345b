import { describe, it, expect } from "@jest/globals";
import { renderFloorPlan } from "../src/geometry/floorPlan";

const count = (text: string, needle: string) => text.split(needle).length - 1;

describe("renderFloorPlan", () => {
  it("draws a background plus one rectangle per room", () => {
    const svg = renderFloorPlan(1);
    expect(svg.startsWith('<svg width="800" height="600" xmlns="http://www.w3.org/2000/svg">')).toBe(true);
    expect(svg.endsWith("</svg>")).toBe(true);
    expect(count(svg, "<rect")).toBe(5);
    expect(count(svg, '<rect width="100%" height="100%" fill="#f5f5f5"/>')).toBe(1);
    expect(count(svg, "<text")).toBe(4);
  });

  it("labels each room at the centre of its box", () => {
    expect(renderFloorPlan(1)).toContain(
      '<rect x="50" y="50" width="300" height="250" fill="white" stroke="#333" stroke-width="2"/>' +
      '<text x="200" y="175" text-anchor="middle" font-size="14" fill="#333">Living</text>'
    );
    expect(renderFloorPlan(3)).toContain(
      '<text x="540" y="345" text-anchor="middle" font-size="14" fill="#333">Bath 1</text>'
    );
  });

  it("is a pure function of the template category", () => {
    expect(renderFloorPlan(2)).toBe(renderFloorPlan(2));
    expect(renderFloorPlan(0)).toBe(renderFloorPlan(1));
    expect(renderFloorPlan(7)).toBe(renderFloorPlan(4));
    expect(renderFloorPlan(4)).not.toBe(renderFloorPlan(3));
  });

  it("draws six rooms for the 4-plus template", () => {
    expect(count(renderFloorPlan(5), "<text")).toBe(6);
  });
});
