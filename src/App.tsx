import { useMemo, useRef, useState } from "react";
import "./App.css";

import { BlastPlanEditor } from "./ui/BlastPlanEditor";
import FragmentationChart from "./ui/FragmentationChart";
import HoleGridChart from "./ui/HoleGridChart";
import ReportExportButton from "./ui/ReportExportButton";
import ResultsPanel from "./ui/ResultsPanel";

import { tryEvaluate } from "./engine/blastPlan";
import { BlastPlanError } from "./engine/errors";
import { holeGrid } from "./engine/holeGrid";
import { sweep } from "./engine/sweep";
import { defaultBlastPlan } from "./models/defaultBlastPlan";
import { REFERENCE_TABLES } from "./models/referenceTables";
import type { BlastPlanSelection, FragmentationCurve, HolePoint } from "./models/types";

type Plots = { holes: HolePoint[]; curves: FragmentationCurve[] } | { error: BlastPlanError };

export default function App() {
  const [selection, setSelection] = useState<BlastPlanSelection>(defaultBlastPlan);
  const holeGridRef = useRef<HTMLDivElement>(null);
  const fragmentationRef = useRef<HTMLDivElement>(null);

  // Whole plan is recomputed on every change.
  const outcome = useMemo(() => tryEvaluate(selection, REFERENCE_TABLES), [selection]);

  const plots: Plots | null = useMemo(() => {
    if (!outcome.ok) return null;
    try {
      return {
        holes: holeGrid(outcome.input, outcome.result),
        curves: sweep(outcome.input, REFERENCE_TABLES),
      };
    } catch (e) {
      if (e instanceof BlastPlanError) return { error: e };
      throw e;
    }
  }, [outcome]);

  return (
    <div style={{ padding: 16, display: "grid", gap: 16 }}>
      <h1 style={{ margin: 0, fontSize: 22 }}>
        MODELAGEM DA INFLUÊNCIA DO PLANO DE FOGO NA FRAGMENTAÇÃO EM DESMONTE DE ROCHAS
      </h1>

      <div style={{ display: "grid", gridTemplateColumns: "minmax(0, 1fr) minmax(0, 1fr)", gap: 16 }}>
        <BlastPlanEditor selection={selection} tables={REFERENCE_TABLES} onChange={setSelection} />
        <ResultsPanel outcome={outcome} />
      </div>

      {plots && "error" in plots ? (
        <div role="alert" style={{ color: "#b91c1c" }}>
          {plots.error.message}
        </div>
      ) : null}

      {plots && !("error" in plots) ? (
        <>
          <div>
            <h3 style={{ margin: "0 0 8px 0" }}>Plano de Fogo (malha)</h3>
            <div ref={holeGridRef}>
              <HoleGridChart holes={plots.holes} />
            </div>
          </div>

          <div>
            <h3 style={{ margin: "0 0 8px 0" }}>Curvas Rosin-Rammler</h3>
            <div ref={fragmentationRef}>
              <FragmentationChart curves={plots.curves} />
            </div>
          </div>

          <ReportExportButton holeGridRef={holeGridRef} fragmentationRef={fragmentationRef} />
        </>
      ) : null}
    </div>
  );
}
