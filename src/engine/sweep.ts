// src/engine/sweep.ts
import { REFERENCE_TABLES } from "../models/referenceTables";
import type { BlastPlanInput, FragmentationCurve, ReferenceTables, SievePoint } from "../models/types";
import { evaluate, powderFactor } from "./blastPlan";
import { meanFragmentSize, percentPassing, spacing } from "./formulas";

export const SIEVE_POINT_COUNT = 100;

/** `count` values from 10^startExp to 10^endExp, evenly spaced in log10. */
export function logSpace(startExp: number, endExp: number, count: number): number[] {
  if (count === 1) return [10 ** startExp];
  const span = endExp - startExp;
  return Array.from({ length: count }, (_, k) => 10 ** (startExp + (span * k) / (count - 1)));
}

/** Sieve openings used for every curve: 1 mm to 10 000 mm. */
export function sieveOpeningsMm(): number[] {
  return logSpace(0, 4, SIEVE_POINT_COUNT);
}

export function curveLabel(patternClassName: string): string {
  return `Malha ${patternClassName}`;
}

/**
 * One Rosin-Rammler curve per pattern class, in catalog order.
 *
 * Only the burden changes between curves. Charge mass Qe and the uniformity index n come
 * from the primary evaluation and are held fixed; X50 is recomputed from each pattern's
 * powder factor.
 */
export function sweep(input: BlastPlanInput, tables: ReferenceTables = REFERENCE_TABLES): FragmentationCurve[] {
  const primary = evaluate(input);
  const H = input.benchHeightM;
  const openings = sieveOpeningsMm();

  return [...tables.patterns.values()].map((pattern) => {
    const spacingM = spacing(H, pattern.burdenM);
    const K = powderFactor(primary.chargeMassPerHoleKg, spacingM, pattern.burdenM, H);
    const x50Mm = meanFragmentSize(input.rockMass.coefficientA, K, primary.chargeMassPerHoleKg) * 10;

    const points: SievePoint[] = openings.map((openingMm) => ({
      openingMm,
      percentPassing: percentPassing(openingMm, x50Mm, primary.uniformityIndex),
    }));

    return {
      patternClassName: pattern.name,
      label: curveLabel(pattern.name),
      points,
    };
  });
}
