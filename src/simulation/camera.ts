import { CAMERA_MOVE_SPEED, MIN_ZOOM, MAX_ZOOM } from "../constants";
import type { CameraState } from "../types/renderer-types";

/** Which pan keys are held this frame. */
export interface PanKeys {
  up: boolean;
  left: boolean;
  down: boolean;
  right: boolean;
}

/**
 * 2D orthographic camera over the cell plane. Position is the world point at
 * the center of the viewport; scale is world units per screen pixel.
 */
export class Camera implements CameraState {
  x = 0;
  y = 0;
  scale = MIN_ZOOM;
  moveSpeed = CAMERA_MOVE_SPEED;

  /** Pan with held keys. Diagonals move at the same speed as straight lines. */
  moveByKeys(keys: PanKeys, dtSeconds: number): void {
    let dx = 0;
    let dy = 0;
    if (keys.up) dy += 1;
    if (keys.left) dx -= 1;
    if (keys.down) dy -= 1;
    if (keys.right) dx += 1;

    const len = Math.hypot(dx, dy);
    if (len === 0) return;

    this.x += (dx / len) * this.moveSpeed * dtSeconds;
    this.y += (dy / len) * this.moveSpeed * dtSeconds;
  }

  /** Pan by a pointer movement in screen pixels, keeping the grabbed point under the pointer. */
  dragBy(screenDx: number, screenDy: number): void {
    this.x -= screenDx * this.scale;
    this.y += screenDy * this.scale;
  }

  /** Positive steps zoom in. Scale stays within [MIN_ZOOM, MAX_ZOOM]. */
  zoomBy(steps: number): void {
    this.scale = Math.max(MIN_ZOOM, Math.min(MAX_ZOOM, this.scale - steps));
  }

  snapshot(): CameraState {
    return { x: this.x, y: this.y, scale: this.scale };
  }
}
