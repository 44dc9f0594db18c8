import type { Coordinate } from "../types/grid-types";
import type { LifeGrid } from "./grid";

export type PatternPreset =
  "empty" | "block" | "blinker" | "glider" | "r-pentomino" | "lightweight-spaceship";

/** Cell offsets for each preset, with y growing upward. */
const PATTERN_CELLS: Record<PatternPreset, readonly (readonly [number, number])[]> = {
  "empty": [],
  "block": [[0, 0], [1, 0], [0, 1], [1, 1]],
  "blinker": [[0, 0], [1, 0], [2, 0]],
  "glider": [[1, 2], [2, 1], [0, 0], [1, 0], [2, 0]],
  "r-pentomino": [[1, 2], [2, 2], [0, 1], [1, 1], [1, 0]],
  "lightweight-spaceship": [
    [1, 3], [4, 3],
    [0, 2],
    [0, 1], [4, 1],
    [0, 0], [1, 0], [2, 0], [3, 0],
  ],
};

/** Returns the cells of a preset, relative to its bottom-left corner. */
export function patternCells(preset: PatternPreset): Coordinate[] {
  return PATTERN_CELLS[preset].map(([x, y]) => ({ x, y }));
}

/** Sets the preset's cells alive, offset by `origin`. Cells already alive stay alive. */
export function placePattern(grid: LifeGrid, preset: PatternPreset, origin: Coordinate = { x: 0, y: 0 }): void {
  for (const { x, y } of patternCells(preset)) {
    grid.setAlive({ x: origin.x + x, y: origin.y + y });
  }
}
