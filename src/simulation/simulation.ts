import { LifeGrid } from "./grid";
import { scoreNeighborhoods } from "./neighborhood";
import { nextCellState } from "./rules";
import type { CellKey, Coordinate, IGrid } from "../types/grid-types";

/**
 * Compute the generation after `grid` without modifying it.
 *
 * 1. Score the Moore neighborhood of every live cell (live cells score themselves too, at 0)
 * 2. Apply B3/S23 to every scored coordinate against the current generation
 * 3. Collect the survivors and births into a fresh map
 */
export function nextGeneration(grid: IGrid): Map<CellKey, Coordinate> {
  const next = new Map<CellKey, Coordinate>();
  for (const [key, { coord, score }] of scoreNeighborhoods(grid)) {
    if (nextCellState(grid.isAlive(coord), score)) {
      next.set(key, coord);
    }
  }
  return next;
}

export class Simulation {
  readonly grid = new LifeGrid();

  /** Generations stepped since creation or the last reset. */
  generation = 0;

  /** Advance one generation. The new live set replaces the old one in a single swap. */
  step(): void {
    this.grid.replaceAll(nextGeneration(this.grid));
    this.generation++;
  }

  /** Kill every cell and restart the generation count. */
  reset(): void {
    this.grid.clear();
    this.generation = 0;
  }
}
