import { Application, Graphics, GraphicsContext, Container } from "pixi.js";
import { BACKGROUND_COLOR, CELL_SIZE } from "../constants";
import type { IGrid } from "../types/grid-types";
import type { Renderer, RendererOptions, RendererMetrics } from "../types/renderer-types";
import { boundsCellCount, cellToScreen, visibleCellBounds } from "../utils/grid-utils";
import { cellColor } from "../utils/color-utils";

export async function createCellRenderer(canvas: HTMLCanvasElement, width: number, height: number):
    Promise<Renderer> {
  const app = new Application();
  await app.init({ canvas, width, height, background: BACKGROUND_COLOR });
  app.ticker.stop();

  const cellContainer = new Container();
  app.stage.addChild(cellContainer);

  // Shared cell shape — a CELL_SIZE white square centered at the origin.
  // Each Graphics instance shares this context and varies only by transform + tint.
  const cellContext = new GraphicsContext();
  cellContext.rect(-CELL_SIZE / 2, -CELL_SIZE / 2, CELL_SIZE, CELL_SIZE).fill({ color: 0xffffff });

  // Pool grows to the largest visible window seen so far; unused squares are hidden.
  const pool: Graphics[] = [];

  function ensurePool(count: number): void {
    while (pool.length < count) {
      const g = new Graphics(cellContext);
      g.visible = false;
      cellContainer.addChild(g);
      pool.push(g);
    }
  }

  // Scene-update timing tracked internally via EMA
  let sceneUpdateTimeMs = 0;
  const emaAlpha = 0.05;

  function update(grid: IGrid, opts: RendererOptions): RendererMetrics {
    const sceneT0 = performance.now();
    const viewport = { width: opts.width, height: opts.height };
    const bounds = visibleCellBounds(opts.camera, viewport);
    const squareScale = 1 / opts.camera.scale;

    ensurePool(boundsCellCount(bounds));

    let drawn = 0;
    for (let x = bounds.left; x < bounds.right; x++) {
      for (let y = bounds.bottom; y < bounds.top; y++) {
        const coord = { x, y };
        const pos = cellToScreen(opts.camera, viewport, coord);
        const g = pool[drawn++];
        g.position.set(pos.x, pos.y);
        g.scale.set(squareScale);
        g.tint = cellColor(grid.isAlive(coord));
        g.visible = true;
      }
    }
    for (let i = drawn; i < pool.length; i++) {
      pool[i].visible = false;
    }

    app.render();

    const rawSceneMs = performance.now() - sceneT0;
    sceneUpdateTimeMs = emaAlpha * rawSceneMs + (1 - emaAlpha) * sceneUpdateTimeMs;

    return {
      fps: 0,
      sceneUpdateTimeMs,
      stepTimeMs: opts.stepTimeMs,
      actualStepsPerSecond: opts.actualStepsPerSecond,
      generation: opts.generation,
      liveCells: grid.size,
      drawnCells: drawn,
      zoom: opts.camera.scale,
    };
  }

  return {
    canvas: app.canvas as unknown as HTMLCanvasElement,
    update,
    resize(w: number, h: number) {
      app.renderer.resize(w, h);
    },
    destroy() {
      cellContext.destroy();
      app.destroy();
    },
  };
}
