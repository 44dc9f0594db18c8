import type { Camera } from "../simulation/camera";
import type { LifeGrid } from "../simulation/grid";
import type { Viewport } from "../types/renderer-types";
import { screenToCell } from "../utils/grid-utils";
import type { InputState } from "./input-state";

/**
 * Apply the input gathered since the last frame: pan with held keys, then
 * pan, paint or erase with the held buttons at the pointer, then zoom.
 * Consumes the accumulated pointer and wheel movement.
 */
export function applyFrameInput(
  input: InputState, camera: Camera, grid: LifeGrid, viewport: Viewport, dtSeconds: number,
): void {
  camera.moveByKeys(input.panKeys(), dtSeconds);

  const action = input.pointerAction();
  if (action === "pan") {
    camera.dragBy(input.dragDx, input.dragDy);
  } else if (input.pointer && action !== "none") {
    const cell = screenToCell(camera, viewport, input.pointer.x, input.pointer.y);
    if (action === "paint-alive") {
      grid.setAlive(cell);
    } else {
      grid.setDead(cell);
    }
  }

  camera.zoomBy(input.wheelSteps);
  input.endFrame();
}
