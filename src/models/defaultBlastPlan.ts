// src/models/defaultBlastPlan.ts
import type { BlastPlanSelection } from "./types";

/** Fixed assumptions of the current plan model. Each one can be overridden per selection. */
export const BLAST_CONSTANTS = {
  holeDiameterMm: 76.2,
  subdrillM: 0.6, // ~8 × diameter
  inclinationDeg: 15,
  holeDeviationM: 0.1,
} as const;

export interface NumericDomain {
  min: number;
  max: number;
  step: number;
}

/** Ranges offered by the input form. Bench height is also enforced by validation. */
export const INPUT_DOMAINS = {
  benchHeightM: { min: 2, max: 15, step: 0.1 },
  holesPerRow: { min: 1, max: 8, step: 1 },
  rows: { min: 1, max: 5, step: 1 },
} as const satisfies Record<string, NumericDomain>;

export const REPORT_TITLE = "Relatório Técnico - Plano de Fogo";
export const REPORT_FRAGMENTATION_HEADER = "Distribuição Granulométrica (Rosin-Rammler):";
export const REPORT_FILE_NAME = "relatorio_plano_fogo.pdf";

export const defaultBlastPlan: BlastPlanSelection = {
  explosive: "ANFO",
  rockMass: "Rocha friável de baixa dureza",
  pattern: "Aberta",

  benchHeightM: 10,
  holesPerRow: 5,
  rows: 4,
};
