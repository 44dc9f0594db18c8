import { TICK_INTERVAL_MS } from "../constants";

/**
 * Gates simulation steps on accumulated wall-clock time, independent of
 * frame rate. Runs at most one step per frame: once the accumulator exceeds
 * the tick interval, one step runs and the accumulator restarts from zero,
 * however far past the interval it was. Tracks performance metrics.
 *
 * Starts paused. While paused the accumulator is frozen, so resuming never
 * fires a step for time spent paused.
 */
export class SimulationStepper {
  readonly tickIntervalMs = TICK_INTERVAL_MS;

  /** EMA-smoothed actual steps per second. */
  actualStepsPerSecond = 0;

  /** EMA-smoothed time spent in step() calls per frame, in ms. */
  stepTimeMs = 0;

  /** Steps run by the most recent advance() call: 0 or 1. */
  lastStepsThisFrame = 0;

  private accumulatorMs = 0;
  private isPaused = true;
  private readonly stepFn: () => void;

  /** EMA smoothing factor — ~0.05 at 60fps gives a ~330ms time constant. */
  private readonly emaAlpha = 0.05;

  constructor(stepFn: () => void) {
    this.stepFn = stepFn;
  }

  get paused(): boolean {
    return this.isPaused;
  }

  /** Time accumulated toward the next step, in ms. */
  get elapsedSinceLastTickMs(): number {
    return this.accumulatorMs;
  }

  /** Switch between running and paused. Returns the new paused state. */
  toggle(): boolean {
    this.isPaused = !this.isPaused;
    return this.isPaused;
  }

  /**
   * Called once per frame. Adds the frame time to the accumulator and runs
   * one step if it has crossed the tick interval.
   *
   * @param deltaMs — milliseconds since the last frame; non-finite or non-positive values are ignored
   */
  advance(deltaMs: number): void {
    this.lastStepsThisFrame = 0;

    if (this.isPaused) {
      this.stepTimeMs = 0;
      // Don't update actualStepsPerSecond — keep last value frozen while paused
      return;
    }

    if (!Number.isFinite(deltaMs) || deltaMs <= 0) return;

    this.accumulatorMs += deltaMs;
    let rawStepTimeMs = 0;
    if (this.accumulatorMs > this.tickIntervalMs) {
      this.accumulatorMs = 0;
      const t0 = performance.now();
      this.stepFn();
      rawStepTimeMs = performance.now() - t0;
      this.lastStepsThisFrame = 1;
    }

    this.stepTimeMs =
      this.emaAlpha * rawStepTimeMs +
      (1 - this.emaAlpha) * this.stepTimeMs;

    const instantStepsPerSecond = this.lastStepsThisFrame / (deltaMs / 1000);
    this.actualStepsPerSecond =
      this.emaAlpha * instantStepsPerSecond +
      (1 - this.emaAlpha) * this.actualStepsPerSecond;
  }
}
