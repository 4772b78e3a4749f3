// src/engine/readouts.ts
import type { BlastPlanResult, Readout, ReadoutKey } from "../models/types";

type ReadoutSpec = {
  key: ReadoutKey;
  label: string;
  unit: string;
  digits: number;
};

// Display order and precision of the results panel.
const READOUTS: readonly ReadoutSpec[] = [
  { key: "holeLengthTotalM", label: "Comprimento real do furo", unit: "m", digits: 2 },
  // 2 decimals, unlike total mass: per-hole charge was always shown this way in the plan readout
  { key: "chargeMassPerHoleKg", label: "Carga por furo estimada", unit: "kg", digits: 2 },
  { key: "spacingM", label: "Espaçamento calculado", unit: "m", digits: 2 },
  { key: "holeCount", label: "Quantidade total de furos", unit: "", digits: 0 },
  { key: "totalExplosiveMassKg", label: "Massa total de explosivo", unit: "kg", digits: 1 },
  { key: "powderFactorKgPerM3", label: "Razão de carga (K)", unit: "kg/m³", digits: 2 },
  { key: "x50Mm", label: "Tamanho médio estimado dos fragmentos (X50)", unit: "mm", digits: 1 },
  { key: "uniformityIndex", label: "Índice de uniformidade (n)", unit: "", digits: 2 },
];

export function fmt(n: number, digits = 2): string {
  if (!Number.isFinite(n)) return "—";
  return n.toFixed(digits);
}

export function blastPlanReadouts(result: BlastPlanResult): Readout[] {
  return READOUTS.map(({ key, label, unit, digits }) => {
    const value = result[key];
    const display = unit ? `${fmt(value, digits)} ${unit}` : fmt(value, digits);
    return { key, label, value, unit, display, text: `${label}: ${display}` };
  });
}
