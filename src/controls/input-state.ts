import type { PanKeys } from "../simulation/camera";

/** Mouse buttons, numbered as in `MouseEvent.button`. */
export const PRIMARY_BUTTON = 0;
export const MIDDLE_BUTTON = 1;
export const SECONDARY_BUTTON = 2;

export type PointerAction = "paint-alive" | "paint-dead" | "pan" | "none";

/**
 * Held keys, held mouse buttons and pointer movement, collected from DOM
 * events between frames. The frame loop reads it once per frame and calls
 * `endFrame()` to consume the accumulated pointer and wheel movement.
 */
export class InputState {
  private readonly keys = new Set<string>();
  private readonly buttons = new Set<number>();

  /** Pointer position in canvas pixels, or null when outside the canvas. */
  pointer: { x: number; y: number } | null = null;

  /** Pointer movement since the last frame, in screen pixels. */
  dragDx = 0;
  dragDy = 0;

  /** Wheel notches since the last frame; positive zooms in. */
  wheelSteps = 0;

  keyDown(code: string): void {
    this.keys.add(code);
  }

  keyUp(code: string): void {
    this.keys.delete(code);
  }

  isKeyDown(code: string): boolean {
    return this.keys.has(code);
  }

  buttonDown(button: number): void {
    this.buttons.add(button);
  }

  buttonUp(button: number): void {
    this.buttons.delete(button);
  }

  isButtonDown(button: number): boolean {
    return this.buttons.has(button);
  }

  pointerMove(x: number, y: number, movementX: number, movementY: number): void {
    this.pointer = { x, y };
    this.dragDx += movementX;
    this.dragDy += movementY;
  }

  pointerLeave(): void {
    this.pointer = null;
  }

  /** One notch per wheel event, in the direction of scrolling up. */
  wheel(deltaY: number): void {
    this.wheelSteps -= Math.sign(deltaY);
  }

  /** Release everything, e.g. when the window loses focus and key-up events would be missed. */
  releaseAll(): void {
    this.keys.clear();
    this.buttons.clear();
  }

  panKeys(): PanKeys {
    return {
      up: this.isKeyDown("KeyW"),
      left: this.isKeyDown("KeyA"),
      down: this.isKeyDown("KeyS"),
      right: this.isKeyDown("KeyD"),
    };
  }

  /**
   * What the held buttons do this frame. Shift+primary and middle pan the
   * camera; primary paints live cells; secondary erases.
   */
  pointerAction(): PointerAction {
    const shift = this.isKeyDown("ShiftLeft");
    const primary = this.isButtonDown(PRIMARY_BUTTON);
    if ((primary && shift) || this.isButtonDown(MIDDLE_BUTTON)) return "pan";
    if (primary) return "paint-alive";
    if (this.isButtonDown(SECONDARY_BUTTON)) return "paint-dead";
    return "none";
  }

  endFrame(): void {
    this.dragDx = 0;
    this.dragDy = 0;
    this.wheelSteps = 0;
  }
}
