import React, { useRef, useEffect } from "react";
import { createCellRenderer } from "../rendering/cell-renderer";
import type { Renderer, RendererMetrics } from "../types/renderer-types";
import { Simulation } from "../simulation/simulation";
import { SimulationStepper } from "../simulation/simulation-stepper";
import { Camera } from "../simulation/camera";
import { PatternPreset, placePattern } from "../simulation/patterns";
import { InputState } from "../controls/input-state";
import { applyFrameInput } from "../controls/apply-input";
import { MAX_FRAME_DELTA_MS, TARGET_FPS } from "../constants";

/** A request to reset the plane to a preset. A new object triggers a reset even for the same preset. */
export interface PatternRequest {
  preset: PatternPreset;
}

interface Props {
  width: number;
  height: number;
  paused: boolean;
  patternRequest: PatternRequest;
  onMetrics?: (metrics: RendererMetrics) => void;
}

export const SimulationCanvas: React.FC<Props> = ({
  width, height, paused, patternRequest, onMetrics,
}) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const rendererRef = useRef<Renderer | null>(null);
  const simRef = useRef(new Simulation());
  const cameraRef = useRef(new Camera());
  const pausedRef = useRef(paused);
  pausedRef.current = paused;
  const sizeRef = useRef({ width, height });
  sizeRef.current = { width, height };
  const onMetricsRef = useRef(onMetrics);
  onMetricsRef.current = onMetrics;

  // Create the renderer and frame loop once; destroy on unmount.
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;
    let rafId = 0;
    const sim = simRef.current;
    const camera = cameraRef.current;
    const stepper = new SimulationStepper(() => sim.step());
    const input = new InputState();

    const onKeyDown = (e: KeyboardEvent) => input.keyDown(e.code);
    const onKeyUp = (e: KeyboardEvent) => input.keyUp(e.code);
    const onBlur = () => input.releaseAll();
    const onPointerDown = (e: PointerEvent) => {
      container.setPointerCapture(e.pointerId);
      input.buttonDown(e.button);
      const rect = container.getBoundingClientRect();
      input.pointerMove(e.clientX - rect.left, e.clientY - rect.top, 0, 0);
    };
    const onPointerUp = (e: PointerEvent) => {
      container.releasePointerCapture(e.pointerId);
      input.buttonUp(e.button);
    };
    const onPointerMove = (e: PointerEvent) => {
      const rect = container.getBoundingClientRect();
      input.pointerMove(e.clientX - rect.left, e.clientY - rect.top, e.movementX, e.movementY);
    };
    const onPointerLeave = () => input.pointerLeave();
    const onWheel = (e: WheelEvent) => {
      e.preventDefault();
      input.wheel(e.deltaY);
    };
    const onContextMenu = (e: MouseEvent) => e.preventDefault();

    window.addEventListener("keydown", onKeyDown);
    window.addEventListener("keyup", onKeyUp);
    window.addEventListener("blur", onBlur);
    container.addEventListener("pointerdown", onPointerDown);
    container.addEventListener("pointerup", onPointerUp);
    container.addEventListener("pointermove", onPointerMove);
    container.addEventListener("pointerleave", onPointerLeave);
    container.addEventListener("wheel", onWheel, { passive: false });
    container.addEventListener("contextmenu", onContextMenu);

    function startRafLoop(renderer: Renderer): void {
      // Subtract 1ms tolerance so rAF timestamp jitter doesn't cause
      // occasional double-interval frames when elapsed ≈ 1000/TARGET_FPS.
      const minFrameInterval = 1000 / TARGET_FPS - 1;
      let lastFrameTime = -1;

      function tick(timestamp: number): void {
        if (destroyed) return;

        // Initialize lastFrameTime on the first frame
        if (lastFrameTime < 0) {
          lastFrameTime = timestamp;
        }

        // Frame rate capping: skip if not enough time has passed
        const elapsed = timestamp - lastFrameTime;
        if (elapsed < minFrameInterval) {
          rafId = requestAnimationFrame(tick);
          return;
        }
        lastFrameTime = timestamp;

        const fps = elapsed > 0 ? 1000 / elapsed : 0;
        const deltaMs = Math.min(Math.max(elapsed, 0), MAX_FRAME_DELTA_MS);

        applyFrameInput(input, camera, sim.grid, sizeRef.current, deltaMs / 1000);

        if (stepper.paused !== pausedRef.current) {
          stepper.toggle();
        }
        stepper.advance(deltaMs);

        const metrics = renderer.update(sim.grid, {
          width: sizeRef.current.width,
          height: sizeRef.current.height,
          camera: camera.snapshot(),
          generation: sim.generation,
          stepTimeMs: stepper.stepTimeMs,
          actualStepsPerSecond: stepper.actualStepsPerSecond,
        });

        metrics.fps = fps;
        onMetricsRef.current?.(metrics);

        rafId = requestAnimationFrame(tick);
      }

      rafId = requestAnimationFrame(tick);
    }

    (async () => {
      const canvas = document.createElement("canvas");
      container.appendChild(canvas);
      const renderer = await createCellRenderer(canvas, sizeRef.current.width, sizeRef.current.height);

      if (destroyed) {
        renderer.destroy();
        return;
      }

      rendererRef.current = renderer;
      renderer.resize(sizeRef.current.width, sizeRef.current.height);
      startRafLoop(renderer);
    })().catch((err) => {
      console.error("Failed to initialize renderer:", err);
    });

    return () => {
      destroyed = true;
      cancelAnimationFrame(rafId);

      window.removeEventListener("keydown", onKeyDown);
      window.removeEventListener("keyup", onKeyUp);
      window.removeEventListener("blur", onBlur);
      container.removeEventListener("pointerdown", onPointerDown);
      container.removeEventListener("pointerup", onPointerUp);
      container.removeEventListener("pointermove", onPointerMove);
      container.removeEventListener("pointerleave", onPointerLeave);
      container.removeEventListener("wheel", onWheel);
      container.removeEventListener("contextmenu", onContextMenu);

      rendererRef.current?.destroy();
      rendererRef.current = null;

      // Remove any child canvases from the container
      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }
    };
  }, []);

  // Reset the plane when a pattern is requested
  useEffect(() => {
    const sim = simRef.current;
    sim.reset();
    placePattern(sim.grid, patternRequest.preset);
  }, [patternRequest]);

  // Resize the renderer when dimensions change (no destroy/recreate)
  useEffect(() => {
    rendererRef.current?.resize(width, height);
  }, [width, height]);

  return <div className="simulation-canvas" ref={containerRef} />;
};
