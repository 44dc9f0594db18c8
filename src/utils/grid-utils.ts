import { CELL_PITCH } from "../constants";
import type { CellKey, Coordinate } from "../types/grid-types";
import type { CameraState, CellBounds, Viewport } from "../types/renderer-types";

/** Returns the map key for a coordinate. */
export function cellKey(x: number, y: number): CellKey {
  return `${x},${y}`;
}

/** Returns the key for a coordinate object. */
export function coordKey(coord: Coordinate): CellKey {
  return cellKey(coord.x, coord.y);
}

/**
 * Returns the cell under a screen position (pixels from the canvas top-left).
 * World y grows upward while screen y grows downward.
 */
export function screenToCell(camera: CameraState, viewport: Viewport, screenX: number, screenY: number): Coordinate {
  const worldX = camera.x - 0.5 * viewport.width * camera.scale + screenX * camera.scale;
  const worldY = camera.y + 0.5 * viewport.height * camera.scale - screenY * camera.scale;
  return {
    x: Math.floor(worldX / CELL_PITCH),
    y: Math.floor(worldY / CELL_PITCH),
  };
}

/** Returns the screen position of the center of a cell. */
export function cellToScreen(camera: CameraState, viewport: Viewport, coord: Coordinate): { x: number; y: number } {
  const worldX = coord.x * CELL_PITCH + CELL_PITCH / 2;
  const worldY = coord.y * CELL_PITCH + CELL_PITCH / 2;
  return {
    x: (worldX - camera.x) / camera.scale + viewport.width / 2,
    y: (camera.y - worldY) / camera.scale + viewport.height / 2,
  };
}

/**
 * Cells that may appear on screen, padded by one cell on every side so that
 * partially visible cells at the edges are included.
 */
export function visibleCellBounds(camera: CameraState, viewport: Viewport): CellBounds {
  const halfW = 0.5 * viewport.width * camera.scale;
  const halfH = 0.5 * viewport.height * camera.scale;
  return {
    left: Math.floor((camera.x - halfW - CELL_PITCH) / CELL_PITCH),
    right: Math.floor((camera.x + halfW + CELL_PITCH) / CELL_PITCH),
    bottom: Math.floor((camera.y - halfH - CELL_PITCH) / CELL_PITCH),
    top: Math.floor((camera.y + halfH + CELL_PITCH) / CELL_PITCH),
  };
}

/** Number of cells covered by a bounds range. */
export function boundsCellCount(bounds: CellBounds): number {
  return Math.max(0, bounds.right - bounds.left) * Math.max(0, bounds.top - bounds.bottom);
}
