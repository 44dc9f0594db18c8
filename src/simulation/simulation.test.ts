import { Simulation, nextGeneration } from "./simulation";
import { LifeGrid } from "./grid";
import { cellKey } from "../utils/grid-utils";

function seed(sim: Simulation, cells: [number, number][]): void {
  for (const [x, y] of cells) sim.grid.setAlive({ x, y });
}

function liveKeys(sim: Simulation): string[] {
  return Array.from(sim.grid.liveCells(), c => cellKey(c.x, c.y)).sort();
}

function sortedKeys(cells: [number, number][]): string[] {
  return cells.map(([x, y]) => cellKey(x, y)).sort();
}

describe("Simulation", () => {
  it("creates a simulation with an empty grid at generation 0", () => {
    const sim = new Simulation();
    expect(sim.grid.size).toBe(0);
    expect(sim.generation).toBe(0);
  });

  it("stepping an empty grid leaves it empty", () => {
    const sim = new Simulation();
    sim.step();
    expect(sim.grid.size).toBe(0);
    expect(sim.generation).toBe(1);
  });

  it("a 2x2 block is a still life", () => {
    const sim = new Simulation();
    const block: [number, number][] = [[0, 0], [1, 0], [0, 1], [1, 1]];
    seed(sim, block);
    sim.step();
    expect(liveKeys(sim)).toEqual(sortedKeys(block));
    sim.step();
    expect(liveKeys(sim)).toEqual(sortedKeys(block));
  });

  it("a blinker oscillates with period 2", () => {
    const sim = new Simulation();
    seed(sim, [[0, 0], [1, 0], [2, 0]]);

    sim.step();
    expect(liveKeys(sim)).toEqual(sortedKeys([[1, -1], [1, 0], [1, 1]]));

    sim.step();
    expect(liveKeys(sim)).toEqual(sortedKeys([[0, 0], [1, 0], [2, 0]]));
    expect(sim.generation).toBe(2);
  });

  it("a dead cell with exactly 3 live neighbors is born", () => {
    const sim = new Simulation();
    // L-shape around (1,1)
    seed(sim, [[0, 0], [1, 0], [0, 1]]);
    sim.step();
    expect(sim.grid.isAlive({ x: 1, y: 1 })).toBe(true);
  });

  it("a dead cell with 2 live neighbors stays dead", () => {
    const sim = new Simulation();
    seed(sim, [[0, 0], [2, 0]]);
    sim.step();
    expect(sim.grid.isAlive({ x: 1, y: 0 })).toBe(false);
    expect(sim.grid.isAlive({ x: 1, y: 1 })).toBe(false);
    expect(sim.grid.size).toBe(0);
  });

  it("a dead cell with 4 live neighbors stays dead", () => {
    const sim = new Simulation();
    // Four corners around (0,0); each corner has no live neighbors of its own
    seed(sim, [[-1, -1], [1, -1], [-1, 1], [1, 1]]);
    sim.step();
    expect(sim.grid.isAlive({ x: 0, y: 0 })).toBe(false);
  });

  it("an isolated live cell dies", () => {
    const sim = new Simulation();
    seed(sim, [[10, -10]]);
    sim.step();
    expect(sim.grid.size).toBe(0);
  });

  it("a live cell with 1 live neighbor dies", () => {
    const sim = new Simulation();
    seed(sim, [[0, 0], [1, 0]]);
    sim.step();
    expect(sim.grid.size).toBe(0);
  });

  it("a live cell with 4 live neighbors dies", () => {
    const sim = new Simulation();
    // Plus shape: the center has 4 neighbors
    seed(sim, [[0, 0], [1, 0], [-1, 0], [0, 1], [0, -1]]);
    sim.step();
    expect(sim.grid.isAlive({ x: 0, y: 0 })).toBe(false);
    // Arms survive with 3 neighbors each; diagonals are born with 3
    expect(liveKeys(sim)).toEqual(sortedKeys([
      [1, 0], [-1, 0], [0, 1], [0, -1],
      [1, 1], [-1, 1], [1, -1], [-1, -1],
    ]));
  });

  it("a glider moves one cell diagonally every 4 generations", () => {
    const sim = new Simulation();
    const glider: [number, number][] = [[1, 2], [2, 1], [0, 0], [1, 0], [2, 0]];
    seed(sim, glider);
    for (let i = 0; i < 4; i++) sim.step();
    expect(liveKeys(sim)).toEqual(sortedKeys(glider.map(([x, y]) => [x + 1, y - 1])));
  });

  it("works across negative coordinates", () => {
    const sim = new Simulation();
    seed(sim, [[-101, -50], [-100, -50], [-99, -50]]);
    sim.step();
    expect(liveKeys(sim)).toEqual(sortedKeys([[-100, -51], [-100, -50], [-100, -49]]));
  });

  it("is deterministic regardless of insertion order", () => {
    const cells: [number, number][] = [[0, 0], [1, 0], [2, 0], [2, 1], [1, 2], [5, 5], [5, 6], [6, 5]];
    const a = new Simulation();
    const b = new Simulation();
    seed(a, cells);
    seed(b, [...cells].reverse());
    for (let i = 0; i < 10; i++) {
      a.step();
      b.step();
      expect(liveKeys(a)).toEqual(liveKeys(b));
    }
  });

  it("reset clears the grid and the generation count", () => {
    const sim = new Simulation();
    seed(sim, [[0, 0], [1, 0], [2, 0]]);
    sim.step();
    sim.reset();
    expect(sim.grid.size).toBe(0);
    expect(sim.generation).toBe(0);
  });
});

describe("nextGeneration", () => {
  it("does not modify the grid it reads", () => {
    const grid = new LifeGrid();
    grid.setAlive({ x: 0, y: 0 });
    grid.setAlive({ x: 1, y: 0 });
    grid.setAlive({ x: 2, y: 0 });
    const next = nextGeneration(grid);
    expect(Array.from(next.keys()).sort()).toEqual(["1,-1", "1,0", "1,1"]);
    expect(grid.size).toBe(3);
    expect(grid.isAlive({ x: 0, y: 0 })).toBe(true);
    expect(grid.isAlive({ x: 1, y: 1 })).toBe(false);
  });
});
