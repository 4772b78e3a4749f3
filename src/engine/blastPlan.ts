// src/engine/blastPlan.ts
import { BLAST_CONSTANTS, INPUT_DOMAINS } from "../models/defaultBlastPlan";
import { REFERENCE_TABLES } from "../models/referenceTables";
import type {
  BlastPlanInput,
  BlastPlanResult,
  BlastPlanSelection,
  CatalogName,
  ReferenceTables,
} from "../models/types";
import { BlastPlanError, ComputationError, UnknownCategoryError, ValidationError } from "./errors";
import { chargeMass, meanFragmentSize, spacing, uniformityIndex } from "./formulas";

/* =========================
   Public exports
   ========================= */

export type EvaluationOutcome =
  | { ok: true; input: BlastPlanInput; result: BlastPlanResult }
  | { ok: false; error: BlastPlanError };

/** Resolves catalog keys and fills the fixed constants. Throws on unknown keys or bad numbers. */
export function createBlastPlanInput(
  selection: BlastPlanSelection,
  tables: ReferenceTables = REFERENCE_TABLES
): BlastPlanInput {
  const input: BlastPlanInput = Object.freeze({
    explosive: lookup(tables.explosives, "explosive", selection.explosive),
    rockMass: lookup(tables.rockMasses, "rockMass", selection.rockMass),
    pattern: lookup(tables.patterns, "pattern", selection.pattern),

    benchHeightM: selection.benchHeightM,
    holeDiameterMm: selection.holeDiameterMm ?? BLAST_CONSTANTS.holeDiameterMm,
    subdrillM: selection.subdrillM ?? BLAST_CONSTANTS.subdrillM,
    inclinationDeg: selection.inclinationDeg ?? BLAST_CONSTANTS.inclinationDeg,
    holeDeviationM: selection.holeDeviationM ?? BLAST_CONSTANTS.holeDeviationM,

    holesPerRow: selection.holesPerRow,
    rows: selection.rows,
  });

  validateBlastPlanInput(input);
  return input;
}

/**
 * Full evaluation of one blast plan. Every field is recomputed from the input; there is
 * no partial or incremental path. Catalog values arrive already resolved on the input.
 */
export function evaluate(input: BlastPlanInput): BlastPlanResult {
  validateBlastPlanInput(input);

  const H = input.benchHeightM;
  const B = input.pattern.burdenM;
  const D = input.holeDiameterMm;

  // 1. drilled length, inclined and with subdrill
  const inclinationRad = (input.inclinationDeg * Math.PI) / 180;
  const holeLengthTotalM = (H + input.subdrillM) / Math.cos(inclinationRad);

  // 2-4. geometry and charge
  const spacingM = spacing(H, B);
  const chargeMassPerHoleKg = chargeMass(input.explosive.densityGPerCm3, D, holeLengthTotalM);
  const holeCount = input.holesPerRow * input.rows;
  const totalExplosiveMassKg = chargeMassPerHoleKg * holeCount;

  // 5. powder factor over the rock volume broken by one hole
  const powderFactorKgPerM3 = powderFactor(chargeMassPerHoleKg, spacingM, B, H);

  // 6-7. fragmentation
  const x50Mm = meanFragmentSize(input.rockMass.coefficientA, powderFactorKgPerM3, chargeMassPerHoleKg) * 10;
  const n = uniformityIndex(B, spacingM, D, input.holeDeviationM, holeLengthTotalM, H);

  const result: BlastPlanResult = {
    holeLengthTotalM,
    spacingM,
    chargeMassPerHoleKg,
    holeCount,
    totalExplosiveMassKg,
    powderFactorKgPerM3,
    x50Mm,
    uniformityIndex: n,
  };

  assertFiniteResult(result);
  return Object.freeze(result);
}

/** Selection → input → result, with failures returned instead of thrown. */
export function tryEvaluate(
  selection: BlastPlanSelection,
  tables: ReferenceTables = REFERENCE_TABLES
): EvaluationOutcome {
  try {
    const input = createBlastPlanInput(selection, tables);
    return { ok: true, input, result: evaluate(input) };
  } catch (e) {
    if (e instanceof BlastPlanError) return { ok: false, error: e };
    throw e;
  }
}

/**
 * K = Qe / (S · B · H). Shared with the sweep, which varies B and S but keeps Qe.
 * Throws ComputationError when the volume is not strictly positive.
 */
export function powderFactor(chargeMassKg: number, spacingM: number, burdenM: number, benchHeightM: number): number {
  const volumeM3 = spacingM * burdenM * benchHeightM;
  if (!(volumeM3 > 0)) {
    throw new ComputationError(`rock volume per hole is ${volumeM3} m³ (burden ${burdenM} m)`);
  }
  return chargeMassKg / volumeM3;
}

/* =========================
   Validation & invariants
   ========================= */

export function validateBlastPlanInput(input: BlastPlanInput): void {
  const h = INPUT_DOMAINS.benchHeightM;
  requireFinite("benchHeightM", input.benchHeightM);
  if (input.benchHeightM < h.min || input.benchHeightM > h.max) {
    throw new ValidationError("benchHeightM", `must be between ${h.min} and ${h.max} m`);
  }

  requireFinite("holeDiameterMm", input.holeDiameterMm);
  if (input.holeDiameterMm <= 0) throw new ValidationError("holeDiameterMm", "must be > 0");

  requireFinite("subdrillM", input.subdrillM);
  if (input.subdrillM < 0) throw new ValidationError("subdrillM", "must be >= 0");

  requireFinite("inclinationDeg", input.inclinationDeg);
  if (input.inclinationDeg < 0 || input.inclinationDeg >= 90) {
    throw new ValidationError("inclinationDeg", "must be in [0, 90) degrees");
  }

  requireFinite("holeDeviationM", input.holeDeviationM);
  if (input.holeDeviationM < 0) throw new ValidationError("holeDeviationM", "must be >= 0");

  for (const k of ["holesPerRow", "rows"] as const) {
    const v = input[k];
    if (!Number.isInteger(v) || v < 1) throw new ValidationError(k, "must be an integer >= 1");
  }
}

function requireFinite(field: string, v: number): void {
  if (!Number.isFinite(v)) throw new ValidationError(field, "must be a finite number");
}

const RESULT_FIELDS: readonly (keyof BlastPlanResult)[] = [
  "holeLengthTotalM",
  "spacingM",
  "chargeMassPerHoleKg",
  "holeCount",
  "totalExplosiveMassKg",
  "powderFactorKgPerM3",
  "x50Mm",
  "uniformityIndex",
];

function assertFiniteResult(r: BlastPlanResult): void {
  for (const k of RESULT_FIELDS) {
    if (!Number.isFinite(r[k])) throw new ComputationError(`${k} is ${r[k]}`);
  }
}

/* =========================
   Helpers
   ========================= */

function lookup<T>(table: ReadonlyMap<string, T>, catalog: CatalogName, key: string): T {
  const entry = table.get(key);
  if (entry === undefined) throw new UnknownCategoryError(catalog, key, [...table.keys()]);
  return entry;
}
