import type { IGrid } from "./grid-types";

export interface CameraState {
  x: number;
  y: number;
  /** World units per screen pixel. */
  scale: number;
}

export interface Viewport {
  width: number;
  height: number;
}

/** Half-open range of cell columns [left, right) and rows [bottom, top). */
export interface CellBounds {
  left: number;
  right: number;
  bottom: number;
  top: number;
}

export interface RendererOptions {
  width: number;
  height: number;
  camera: CameraState;
  generation: number;
  stepTimeMs: number;
  actualStepsPerSecond: number;
}

export interface RendererMetrics {
  fps: number;
  sceneUpdateTimeMs: number;
  stepTimeMs: number;
  actualStepsPerSecond: number;
  generation: number;
  liveCells: number;
  /** Number of cell squares drawn this frame (visible window, dead and alive). */
  drawnCells: number;
  zoom: number;
}

export interface Renderer {
  update(grid: IGrid, opts: RendererOptions): RendererMetrics;
  resize(width: number, height: number): void;
  destroy(): void;
  readonly canvas: HTMLCanvasElement;
}
