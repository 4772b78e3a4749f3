// src/engine/formulas.ts
//
// Empirical blasting relations. Inputs are not validated here: callers own the domain
// checks, and out-of-range values simply produce out-of-range (or NaN) results.

/** Spacing between holes of a row (m): S = 0.23 · (H + 2B). */
export function spacing(benchHeightM: number, burdenM: number): number {
  return 0.23 * (benchHeightM + 2 * burdenM);
}

/**
 * Explosive mass in one hole (kg), treating the whole hole length as a cylindrical column
 * of explosive (no stemming).
 */
export function chargeMass(densityGPerCm3: number, diameterMm: number, holeLengthM: number): number {
  const diameterCm = diameterMm / 10;
  const areaCm2 = (Math.PI / 4) * diameterCm ** 2;
  const linearMassGPerCm = areaCm2 * densityGPerCm3;
  const lengthCm = holeLengthM * 100;
  const massG = linearMassGPerCm * lengthCm;
  return massG / 1000;
}

/** Kuz-Ram mean fragment size X50 in **cm**: A · K^-0.8 · Qe^(1/6). */
export function meanFragmentSize(coefficientA: number, powderFactorKgPerM3: number, chargeMassKg: number): number {
  return coefficientA * powderFactorKgPerM3 ** -0.8 * chargeMassKg ** (1 / 6);
}

/**
 * Rosin-Rammler uniformity index n.
 *
 * Known quirk: `diameterMm` is in millimetres while every other length is in metres.
 * The published curves depend on this mix, so it is kept as is.
 */
export function uniformityIndex(
  burdenM: number,
  spacingM: number,
  diameterMm: number,
  holeDeviationM: number,
  chargeLengthM: number,
  benchHeightM: number
): number {
  return (
    (2.2 - 14 * (burdenM / diameterMm)) *
    Math.sqrt(1 + spacingM / burdenM / 2) *
    ((1 - holeDeviationM / burdenM) * (chargeLengthM / benchHeightM))
  );
}

/** Rosin-Rammler cumulative % passing at a sieve opening. */
export function percentPassing(openingMm: number, x50Mm: number, n: number): number {
  if (openingMm === 0) return 0;
  const retained = Math.exp(-0.693 * (openingMm / x50Mm) ** n);
  return 100 * (1 - retained);
}
