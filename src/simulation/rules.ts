import { BIRTH_SCORE, SURVIVAL_SCORES } from "../constants";

/** B3/S23: whether a cell is alive in the next generation, given its state and live neighbor count. */
export function nextCellState(alive: boolean, score: number): boolean {
  if (alive) return SURVIVAL_SCORES.includes(score);
  return score === BIRTH_SCORE;
}
