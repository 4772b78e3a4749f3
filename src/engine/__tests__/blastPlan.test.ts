import { describe, expect, it } from "vitest";
import { createBlastPlanInput, evaluate, tryEvaluate } from "../blastPlan";
import { ComputationError, UnknownCategoryError, ValidationError } from "../errors";
import { REFERENCE_TABLES } from "../../models/referenceTables";
import type { BlastPlanSelection, PatternClass, ReferenceTables } from "../../models/types";

const selection: BlastPlanSelection = {
  explosive: "ANFO",
  rockMass: "Rocha dura e altamente fraturada",
  pattern: "Aberta",
  benchHeightM: 10,
  holesPerRow: 5,
  rows: 4,
};

describe("createBlastPlanInput", () => {
  it("resolves catalog keys and fills the fixed constants", () => {
    const input = createBlastPlanInput(selection);

    expect(input.explosive).toEqual({ name: "ANFO", densityGPerCm3: 0.9 });
    expect(input.rockMass.coefficientA).toBe(10);
    expect(input.pattern.burdenM).toBe(6.5);
    expect(input.holeDiameterMm).toBe(76.2);
    expect(input.subdrillM).toBe(0.6);
    expect(input.inclinationDeg).toBe(15);
    expect(input.holeDeviationM).toBe(0.1);
  });

  it("fails fast on an unknown category", () => {
    try {
      createBlastPlanInput({ ...selection, explosive: "Emulsão" });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(UnknownCategoryError);
      if (!(e instanceof UnknownCategoryError)) return;
      expect(e.catalog).toBe("explosive");
      expect(e.key).toBe("Emulsão");
      expect(e.code).toBe("UNKNOWN_CATEGORY");
      expect(e.message).toBe(
        'unknown category "Emulsão" in explosive (expected one of: ANFO, Dinamite granulada, Dinamite gelatina, Lama encartuchada)'
      );
    }
  });

  it.each([
    [{ benchHeightM: 1.5 }, "benchHeightM"],
    [{ benchHeightM: 15.5 }, "benchHeightM"],
    [{ benchHeightM: Number.NaN }, "benchHeightM"],
    [{ holesPerRow: 0 }, "holesPerRow"],
    [{ holesPerRow: 2.5 }, "holesPerRow"],
    [{ rows: 0 }, "rows"],
    [{ holeDiameterMm: 0 }, "holeDiameterMm"],
    [{ subdrillM: -0.1 }, "subdrillM"],
    [{ inclinationDeg: 90 }, "inclinationDeg"],
    [{ holeDeviationM: -1 }, "holeDeviationM"],
  ] as const)("rejects %o naming %s", (patch, field) => {
    expect(() => createBlastPlanInput({ ...selection, ...patch })).toThrow(ValidationError);
    try {
      createBlastPlanInput({ ...selection, ...patch });
    } catch (e) {
      expect(e instanceof ValidationError && e.field).toBe(field);
    }
  });
});

describe("evaluate", () => {
  const input = createBlastPlanInput(selection);
  const r = evaluate(input);

  it("computes the chain of derived quantities", () => {
    expect(r.holeLengthTotalM).toBeCloseTo(10.973928, 6);
    expect(r.spacingM).toBeCloseTo(5.29, 9);
    expect(r.chargeMassPerHoleKg).toBeCloseTo(45.040626, 6);
    expect(r.powderFactorKgPerM3).toBeCloseTo(0.130989, 6);
    expect(r.x50Mm).toBeCloseTo(958.98634, 4);
    expect(r.uniformityIndex).toBeCloseTo(1.289034, 6);
  });

  it("counts holes and multiplies the charge exactly", () => {
    expect(r.holeCount).toBe(20);
    expect(r.totalExplosiveMassKg).toBe(r.chargeMassPerHoleKg * r.holeCount);
  });

  it("handles a single hole", () => {
    const one = evaluate(createBlastPlanInput({ ...selection, holesPerRow: 1, rows: 1 }));
    expect(one.holeCount).toBe(1);
    expect(one.totalExplosiveMassKg).toBe(one.chargeMassPerHoleKg);
  });

  it("is deterministic", () => {
    const again = evaluate(createBlastPlanInput(selection));
    expect(again).toEqual(r);
    for (const k of ["holeLengthTotalM", "chargeMassPerHoleKg", "powderFactorKgPerM3", "x50Mm", "uniformityIndex"] as const) {
      expect(Object.is(again[k], r[k])).toBe(true);
    }
  });

  it("uses the configured hole deviation", () => {
    const noDeviation = evaluate(createBlastPlanInput({ ...selection, holeDeviationM: 0 }));
    expect(noDeviation.uniformityIndex).toBeCloseTo(1.309175, 6);
    expect(noDeviation.x50Mm).toBe(r.x50Mm);
  });

  it("reports zero burden as a computation error", () => {
    // hand-built: defineReferenceTables refuses a zero burden
    const tables: ReferenceTables = {
      ...REFERENCE_TABLES,
      patterns: new Map<string, PatternClass>([["Degenerada", { name: "Degenerada", burdenM: 0 }]]),
    };
    const degenerate = createBlastPlanInput({ ...selection, pattern: "Degenerada" }, tables);

    expect(() => evaluate(degenerate)).toThrow(ComputationError);
    expect(() => evaluate(degenerate)).toThrow(/^cannot compute: degenerate geometry/);
  });
});

describe("tryEvaluate", () => {
  it("returns the result on success", () => {
    const outcome = tryEvaluate(selection);
    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.result.holeCount).toBe(20);
  });

  it("returns typed errors instead of throwing", () => {
    const outcome = tryEvaluate({ ...selection, rockMass: "Granito" });
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(UnknownCategoryError);
      expect(outcome.error.code).toBe("UNKNOWN_CATEGORY");
    }
  });
});
