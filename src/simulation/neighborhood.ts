import { MOORE_OFFSETS } from "../constants";
import type { CellKey, Coordinate, IGrid } from "../types/grid-types";
import { cellKey, coordKey } from "../utils/grid-utils";

export interface NeighborScore {
  readonly coord: Coordinate;
  /** Number of live cells in the Moore neighborhood. */
  score: number;
}

/**
 * Count live neighbors for every coordinate that is either alive or adjacent
 * to a live cell. Coordinates missing from the result have no live neighbors
 * and are dead.
 *
 * Cost is 9 map touches per live cell, independent of how far apart the live
 * cells are.
 */
export function scoreNeighborhoods(grid: IGrid): Map<CellKey, NeighborScore> {
  const scores = new Map<CellKey, NeighborScore>();

  for (const cell of grid.liveCells()) {
    for (const [dx, dy] of MOORE_OFFSETS) {
      const x = cell.x + dx;
      const y = cell.y + dy;
      const key = cellKey(x, y);
      const entry = scores.get(key);
      if (entry) {
        entry.score++;
      } else {
        scores.set(key, { coord: { x, y }, score: 1 });
      }
    }

    // A live cell with no live neighbors still needs evaluating, so it can die
    const ownKey = coordKey(cell);
    if (!scores.has(ownKey)) {
      scores.set(ownKey, { coord: cell, score: 0 });
    }
  }

  return scores;
}
