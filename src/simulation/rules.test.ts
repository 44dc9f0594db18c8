import { nextCellState } from "./rules";

describe("nextCellState", () => {
  it("a dead cell with exactly 3 neighbors is born", () => {
    expect(nextCellState(false, 3)).toBe(true);
  });

  it("a dead cell with any other count stays dead", () => {
    for (const score of [0, 1, 2, 4, 5, 6, 7, 8]) {
      expect(nextCellState(false, score)).toBe(false);
    }
  });

  it("a live cell with 2 or 3 neighbors survives", () => {
    expect(nextCellState(true, 2)).toBe(true);
    expect(nextCellState(true, 3)).toBe(true);
  });

  it("a live cell with fewer than 2 or more than 3 neighbors dies", () => {
    for (const score of [0, 1, 4, 5, 6, 7, 8]) {
      expect(nextCellState(true, score)).toBe(false);
    }
  });
});
