// src/models/referenceTables.ts
import { ValidationError } from "../engine/errors";
import type { ExplosiveType, PatternClass, ReferenceTables, RockMassClass } from "./types";

/** Ordered, frozen lookup. Names must be unique and `valueKey` finite and > 0. */
function catalog<K extends string, T extends { name: string } & Record<K, number>>(
  tableName: string,
  entries: readonly T[],
  valueKey: K
): ReadonlyMap<string, T> {
  const map = new Map<string, T>();
  entries.forEach((e, i) => {
    if (map.has(e.name)) throw new ValidationError(tableName, `has a duplicate entry "${e.name}"`);
    const v = e[valueKey];
    if (!Number.isFinite(v) || v <= 0) {
      throw new ValidationError(`${tableName}[${i}].${valueKey}`, `must be > 0 (got ${v} for "${e.name}")`);
    }
    const entry: T = { ...e };
    map.set(e.name, Object.freeze(entry));
  });
  return map;
}

/** Builds a table set from plain entry lists, keeping the given order. */
export function defineReferenceTables(src: {
  explosives: readonly ExplosiveType[];
  rockMasses: readonly RockMassClass[];
  patterns: readonly PatternClass[];
}): ReferenceTables {
  return Object.freeze({
    explosives: catalog("explosives", src.explosives, "densityGPerCm3"),
    rockMasses: catalog("rockMasses", src.rockMasses, "coefficientA"),
    patterns: catalog("patterns", src.patterns, "burdenM"),
  });
}

export const REFERENCE_TABLES: ReferenceTables = defineReferenceTables({
  explosives: [
    { name: "ANFO", densityGPerCm3: 0.9 },
    { name: "Dinamite granulada", densityGPerCm3: 1.1 },
    { name: "Dinamite gelatina", densityGPerCm3: 1.4 },
    { name: "Lama encartuchada", densityGPerCm3: 1.2 },
  ],
  rockMasses: [
    { name: "Rocha friável de baixa dureza", coefficientA: 3 },
    { name: "Rocha branda e pouco fraturada", coefficientA: 5 },
    { name: "Rocha dura e altamente fraturada", coefficientA: 10 },
    { name: "Rocha altamente dura e pouco fraturada", coefficientA: 12 },
  ],
  patterns: [
    { name: "Aberta", burdenM: 6.5 },
    { name: "Fechada", burdenM: 3 },
  ],
});
