// src/models/types.ts

export interface ExplosiveType {
  readonly name: string;
  /** Bulk density of the loaded explosive (g/cm³). */
  readonly densityGPerCm3: number;
}

export interface RockMassClass {
  readonly name: string;
  /** Empirical blastability index A of the Kuz-Ram model. */
  readonly coefficientA: number;
}

export interface PatternClass {
  readonly name: string;
  /** Distance between rows of holes (metres). */
  readonly burdenM: number;
}

/** Static catalogs keyed by display name. Map order is the catalog order. */
export interface ReferenceTables {
  readonly explosives: ReadonlyMap<string, ExplosiveType>;
  readonly rockMasses: ReadonlyMap<string, RockMassClass>;
  readonly patterns: ReadonlyMap<string, PatternClass>;
}

export type CatalogName = "explosive" | "rockMass" | "pattern";

/** What the input form hands over: catalog keys plus the numeric controls. */
export interface BlastPlanSelection {
  explosive: string;
  rockMass: string;
  pattern: string;

  benchHeightM: number;
  holesPerRow: number;
  rows: number;

  holeDiameterMm?: number;
  subdrillM?: number;
  inclinationDeg?: number;
  holeDeviationM?: number;
}

export interface BlastPlanInput {
  readonly explosive: ExplosiveType;
  readonly rockMass: RockMassClass;
  readonly pattern: PatternClass;

  /** Bench height H (m). */
  readonly benchHeightM: number;
  /** Hole diameter D (mm). */
  readonly holeDiameterMm: number;
  /** Extra depth drilled below grade (m). */
  readonly subdrillM: number;
  /** Hole inclination from vertical (degrees). */
  readonly inclinationDeg: number;
  /** Mean drilling deviation W (m), used only by the uniformity index. */
  readonly holeDeviationM: number;

  readonly holesPerRow: number;
  readonly rows: number;
}

export interface BlastPlanResult {
  readonly holeLengthTotalM: number;
  readonly spacingM: number;
  readonly chargeMassPerHoleKg: number;
  readonly holeCount: number;
  readonly totalExplosiveMassKg: number;
  readonly powderFactorKgPerM3: number;
  readonly x50Mm: number;
  readonly uniformityIndex: number;
}

export interface SievePoint {
  readonly openingMm: number;
  readonly percentPassing: number;
}

export interface FragmentationCurve {
  readonly patternClassName: string;
  /** Legend text, "Malha {name}". */
  readonly label: string;
  readonly points: readonly SievePoint[];
}

export interface HolePoint {
  readonly row: number;
  readonly column: number;
  readonly xM: number;
  readonly yM: number;
}

export type ReadoutKey = keyof BlastPlanResult;

export interface Readout {
  readonly key: ReadoutKey;
  readonly label: string;
  readonly value: number;
  readonly unit: string;
  /** Rounded value with its unit, e.g. "5.29 m". */
  readonly display: string;
  /** Ready-to-display line, e.g. "Espaçamento calculado: 5.29 m". */
  readonly text: string;
}
