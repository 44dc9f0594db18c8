import type { CellKey, Coordinate, IGrid } from "../types/grid-types";
import { coordKey } from "../utils/grid-utils";

/**
 * Sparse live cell store on an unbounded lattice.
 *
 * Only live cells are stored; a coordinate absent from the map is dead.
 * Keys are `"x,y"` strings so that equal coordinates share one entry.
 */
export class LifeGrid implements IGrid {
  private cells = new Map<CellKey, Coordinate>();

  get size(): number {
    return this.cells.size;
  }

  setAlive(coord: Coordinate): void {
    const key = coordKey(coord);
    if (!this.cells.has(key)) {
      this.cells.set(key, { x: coord.x, y: coord.y });
    }
  }

  setDead(coord: Coordinate): void {
    this.cells.delete(coordKey(coord));
  }

  isAlive(coord: Coordinate): boolean {
    return this.cells.has(coordKey(coord));
  }

  /** Live coordinates. Each call returns a fresh iterator over the current generation. */
  liveCells(): Iterable<Coordinate> {
    return this.cells.values();
  }

  clear(): void {
    this.cells = new Map();
  }

  /**
   * Swap in a whole generation at once. The map is taken over, not copied;
   * callers must not keep mutating it.
   */
  replaceAll(next: Map<CellKey, Coordinate>): void {
    this.cells = next;
  }
}
