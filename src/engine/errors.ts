// src/engine/errors.ts
import type { CatalogName } from "../models/types";

export type BlastPlanErrorCode = "UNKNOWN_CATEGORY" | "VALIDATION" | "COMPUTATION" | "EXPORT";

export class BlastPlanError extends Error {
  readonly code: BlastPlanErrorCode;

  constructor(code: BlastPlanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A catalog key that is not in the reference tables. Raised while building the input. */
export class UnknownCategoryError extends BlastPlanError {
  readonly catalog: CatalogName;
  readonly key: string;

  constructor(catalog: CatalogName, key: string, known: readonly string[]) {
    super("UNKNOWN_CATEGORY", `unknown category "${key}" in ${catalog} (expected one of: ${known.join(", ")})`);
    this.catalog = catalog;
    this.key = key;
  }
}

export class ValidationError extends BlastPlanError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("VALIDATION", `${field} ${message}`);
    this.field = field;
  }
}

export class ComputationError extends BlastPlanError {
  constructor(detail: string) {
    super("COMPUTATION", `cannot compute: degenerate geometry (${detail})`);
  }
}

export class ExportError extends BlastPlanError {
  constructor(message: string, cause?: unknown) {
    super("EXPORT", message, cause === undefined ? undefined : { cause });
  }
}
