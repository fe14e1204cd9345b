import { getPlanLayout } from "./templates";

export const PLAN_WIDTH = 800;
export const PLAN_HEIGHT = 600;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Top-down SVG of the template for `roomCount`: one labelled box per room. */
export function renderFloorPlan(roomCount: number): string {
  let svg = `<svg width="${PLAN_WIDTH}" height="${PLAN_HEIGHT}" xmlns="http://www.w3.org/2000/svg">`;
  svg += '<rect width="100%" height="100%" fill="#f5f5f5"/>';

  for (const room of getPlanLayout(roomCount)) {
    svg += `<rect x="${room.x}" y="${room.y}" width="${room.w}" height="${room.h}" fill="white" stroke="#333" stroke-width="2"/>`;
    const textX = room.x + Math.floor(room.w / 2);
    const textY = room.y + Math.floor(room.h / 2);
    svg += `<text x="${textX}" y="${textY}" text-anchor="middle" font-size="14" fill="#333">${escapeXml(room.name)}</text>`;
  }

  return svg + "</svg>";
}
