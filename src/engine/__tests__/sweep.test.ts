import { describe, expect, it } from "vitest";
import { createBlastPlanInput, evaluate } from "../blastPlan";
import { ComputationError } from "../errors";
import { percentPassing } from "../formulas";
import { curveLabel, logSpace, sieveOpeningsMm, sweep } from "../sweep";
import { REFERENCE_TABLES } from "../../models/referenceTables";
import type { PatternClass, ReferenceTables } from "../../models/types";

const input = createBlastPlanInput({
  explosive: "ANFO",
  rockMass: "Rocha dura e altamente fraturada",
  pattern: "Aberta",
  benchHeightM: 10,
  holesPerRow: 5,
  rows: 4,
});

describe("logSpace", () => {
  it("spans the exponents inclusively", () => {
    expect(logSpace(0, 2, 3)).toEqual([1, 10, 100]);
    expect(logSpace(1, 1, 1)).toEqual([10]);
  });

  it("gives 100 sieve openings from 1 to 10000 mm", () => {
    const xs = sieveOpeningsMm();
    expect(xs).toHaveLength(100);
    expect(xs[0]).toBe(1);
    expect(xs[99]).toBe(10000);
    expect(xs[50]).toBeCloseTo(104.761575, 5);
  });
});

describe("sweep", () => {
  const curves = sweep(input, REFERENCE_TABLES);

  it("returns one curve per pattern class in catalog order", () => {
    expect(curves.map((c) => c.patternClassName)).toEqual(["Aberta", "Fechada"]);
    expect(curves.map((c) => c.label)).toEqual(["Malha Aberta", "Malha Fechada"]);
    expect(curveLabel("Aberta")).toBe("Malha Aberta");
    for (const c of curves) {
      expect(c.points).toHaveLength(100);
      expect(c.points[0].openingMm).toBe(1);
      expect(c.points[99].openingMm).toBe(10000);
    }
  });

  it("varies X50 with each burden while holding Qe and n", () => {
    const [open, closed] = curves;
    const x = open.points[50].openingMm;

    expect(open.points[50].percentPassing).toBeCloseTo(3.913317, 5);
    expect(closed.points[50].percentPassing).toBeCloseTo(12.087011, 5);

    // Closed pattern: K = Qe / (3.68 · 3 · 10) gives X50 ≈ 386.449 mm, shape n from the primary plan.
    const n = evaluate(input).uniformityIndex;
    expect(closed.points[50].percentPassing).toBeCloseTo(percentPassing(x, 386.4492413, n), 6);
  });

  it("reproduces the primary X50 on the selected pattern's curve", () => {
    const primary = evaluate(input);
    const open = curves[0];
    const at = open.points.map((p) => percentPassing(p.openingMm, primary.x50Mm, primary.uniformityIndex));
    expect(open.points.map((p) => p.percentPassing)).toEqual(at);
  });

  it("produces monotone curves inside [0, 100]", () => {
    for (const c of curves) {
      for (let i = 1; i < c.points.length; i++) {
        expect(c.points[i].percentPassing).toBeGreaterThanOrEqual(c.points[i - 1].percentPassing);
      }
      expect(c.points[0].percentPassing).toBeGreaterThanOrEqual(0);
      expect(c.points[99].percentPassing).toBeLessThanOrEqual(100);
    }
  });

  it("reports a degenerate catalog burden", () => {
    const tables: ReferenceTables = {
      ...REFERENCE_TABLES,
      patterns: new Map<string, PatternClass>([...REFERENCE_TABLES.patterns, ["Nula", { name: "Nula", burdenM: 0 }]]),
    };
    expect(() => sweep(input, tables)).toThrow(ComputationError);
  });
});
