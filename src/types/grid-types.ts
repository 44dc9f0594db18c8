/** A cell position on the unbounded integer lattice. */
export interface Coordinate {
  readonly x: number;
  readonly y: number;
}

/** Structural key for a coordinate: `"x,y"`. */
export type CellKey = `${number},${number}`;

/**
 * Read-only interface for the live cell store.
 * Used by rendering and utility code that reads grid state without modifying it.
 */
export interface IGrid {
  readonly size: number;
  isAlive(coord: Coordinate): boolean;
  liveCells(): Iterable<Coordinate>;
}
