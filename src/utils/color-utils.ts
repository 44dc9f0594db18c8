import { ALIVE_COLOR, DEAD_COLOR } from "../constants";

/** Tint for a cell square. */
export function cellColor(alive: boolean): number {
  return alive ? ALIVE_COLOR : DEAD_COLOR;
}

/** Convert a 0xRRGGBB number to a CSS hex color string. */
export function hexColor(c: number): string {
  return `#${c.toString(16).padStart(6, "0")}`;
}

