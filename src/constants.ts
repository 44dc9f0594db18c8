// ── Grid ──

/** Distance between neighboring cell origins, in world units. */
export const CELL_PITCH = 30;

/** Side length of a drawn cell square, in world units. Leaves a gap between cells. */
export const CELL_SIZE = 20;

/** Moore neighborhood offsets: the 8 cells horizontally, vertically and diagonally adjacent. */
export const MOORE_OFFSETS: readonly (readonly [number, number])[] = [
  [-1, -1], [0, -1], [1, -1],
  [-1,  0],          [1,  0],
  [-1,  1], [0,  1], [1,  1],
];

// ── Simulation ──

/** Wall-clock time that must be exceeded between two generations, in ms. */
export const TICK_INTERVAL_MS = 100;

/** Neighbor count at which a dead cell is born. */
export const BIRTH_SCORE = 3;

/** Neighbor counts at which a live cell survives. */
export const SURVIVAL_SCORES: readonly number[] = [2, 3];

// ── Camera ──

/** Keyboard pan speed in world units per second. */
export const CAMERA_MOVE_SPEED = 500;

/** Closest zoom: one screen pixel per world unit. */
export const MIN_ZOOM = 1;

/** Farthest zoom, in world units per screen pixel. */
export const MAX_ZOOM = 5;

// ── Rendering ──

/** Target rendering frame rate, used for rAF frame-rate capping. */
export const TARGET_FPS = 60;

/** Longest frame delta fed to the stepper and camera, in ms. Longer gaps (tab in background) are clamped. */
export const MAX_FRAME_DELTA_MS = 250;

/** Tint for live cells. */
export const ALIVE_COLOR = 0x00ff00;

/** Tint for dead cells inside the visible window. */
export const DEAD_COLOR = 0xff0000;

/** Canvas background color behind the cell squares. */
export const BACKGROUND_COLOR = 0x111111;
