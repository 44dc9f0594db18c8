import React, { useState, useEffect, useRef, useCallback } from "react";
import { SimulationCanvas, PatternRequest } from "./simulation-canvas";
import { PatternPreset } from "../simulation/patterns";
import { ALIVE_COLOR, DEAD_COLOR } from "../constants";
import { hexColor } from "../utils/color-utils";
import type { RendererMetrics } from "../types/renderer-types";

import "./app.scss";

const PATTERN_OPTIONS: { value: PatternPreset; label: string }[] = [
  { value: "empty", label: "Empty" },
  { value: "block", label: "Block" },
  { value: "blinker", label: "Blinker" },
  { value: "glider", label: "Glider" },
  { value: "r-pentomino", label: "R-pentomino" },
  { value: "lightweight-spaceship", label: "Lightweight spaceship" },
];

function isPatternPreset(value: string): value is PatternPreset {
  return PATTERN_OPTIONS.some(o => o.value === value);
}

export const App = () => {
  const [paused, setPaused] = useState(true);
  const [pattern, setPattern] = useState<PatternPreset>("glider");
  const [patternRequest, setPatternRequest] = useState<PatternRequest>({ preset: "empty" });
  const [metrics, setMetrics] = useState<RendererMetrics | null>(null);

  const controlsRef = useRef<HTMLDivElement>(null);
  const [canvasSize, setCanvasSize] = useState({ width: 800, height: 600 });

  const updateCanvasSize = useCallback(() => {
    const controlsHeight = controlsRef.current?.offsetHeight ?? 0;
    setCanvasSize({
      width: window.innerWidth,
      height: window.innerHeight - controlsHeight,
    });
  }, []);

  useEffect(() => {
    updateCanvasSize();
    window.addEventListener("resize", updateCanvasSize);
    return () => window.removeEventListener("resize", updateCanvasSize);
  }, [updateCanvasSize]);

  // Space toggles the simulation from anywhere on the page
  useEffect(() => {
    const onKeyDown = (e: KeyboardEvent) => {
      if (e.code !== "Space" || e.repeat) return;
      e.preventDefault();
      setPaused(p => !p);
    };
    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, []);

  // Build performance metrics string
  const perfParts: string[] = [];
  if (metrics) {
    const fps = metrics.fps;
    const frameMs = fps > 0 ? 1000 / fps : 0;
    const stepPct = frameMs > 0 ? (metrics.stepTimeMs / frameMs * 100).toFixed(0) : "0";
    const drawPct = frameMs > 0 ? (metrics.sceneUpdateTimeMs / frameMs * 100).toFixed(0) : "0";
    perfParts.push(`${Math.round(fps)} fps`);
    perfParts.push(`${metrics.actualStepsPerSecond.toFixed(1)} steps/s`);
    perfParts.push(`step ${metrics.stepTimeMs.toFixed(1)}ms (${stepPct}%)`);
    perfParts.push(`draw ${metrics.sceneUpdateTimeMs.toFixed(1)}ms (${drawPct}%)`);
  }

  return (
    <div className="app">
      <div className="controls" ref={controlsRef}>
        <button onClick={() => setPaused(p => !p)}>{paused ? "Play" : "Pause"}</button>
        <span className="status">{paused ? "Paused" : "Simulating"}</span>
        <label>
          Pattern:
          <select value={pattern} onChange={e => {
            const value = e.target.value;
            if (isPatternPreset(value)) setPattern(value);
          }}>
            {PATTERN_OPTIONS.map(o => <option key={o.value} value={o.value}>{o.label}</option>)}
          </select>
        </label>
        <button onClick={() => setPatternRequest({ preset: pattern })}>Load</button>
        <button onClick={() => setPatternRequest({ preset: "empty" })}>Clear</button>
        <span className="hint">
          Left click: draw · Right click: erase · Shift+drag / middle drag / WASD: pan · Wheel: zoom · Space: play/pause
        </span>
      </div>
      <div className="canvas-container">
        <SimulationCanvas
          width={canvasSize.width}
          height={canvasSize.height}
          paused={paused}
          patternRequest={patternRequest}
          onMetrics={setMetrics}
        />
        {/* Legend overlay */}
        <div className="legend-overlay">
          <div>
            <span className="swatch" style={{ background: hexColor(ALIVE_COLOR) }} /> alive
            {" "}
            <span className="swatch" style={{ background: hexColor(DEAD_COLOR) }} /> dead
          </div>
          {metrics && <div>Generation: {metrics.generation} | Live cells: {metrics.liveCells}</div>}
          {metrics && <div>Zoom: {metrics.zoom}x | Drawn: {metrics.drawnCells}</div>}
          {perfParts.length > 0 && <div>{perfParts.join(" | ")}</div>}
        </div>
      </div>
    </div>
  );
};
