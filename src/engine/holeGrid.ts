// src/engine/holeGrid.ts
import type { BlastPlanInput, BlastPlanResult, HolePoint } from "../models/types";

/**
 * Hole collar positions on a rectangular grid, row by row. Column j sits at j·S,
 * row i at i·B. Staggered patterns are not modelled.
 */
export function holeGrid(input: BlastPlanInput, result: BlastPlanResult): HolePoint[] {
  const points: HolePoint[] = [];
  for (let row = 0; row < input.rows; row++) {
    for (let column = 0; column < input.holesPerRow; column++) {
      points.push({
        row,
        column,
        xM: column * result.spacingM,
        yM: row * input.pattern.burdenM,
      });
    }
  }
  return points;
}
