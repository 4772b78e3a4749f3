import type { EvaluationOutcome } from "../engine/blastPlan";
import { blastPlanReadouts } from "../engine/readouts";

type Props = {
  outcome: EvaluationOutcome | null;
};

const tileStyle = { padding: 10, border: "1px solid #ddd", borderRadius: 8 } as const;

export default function ResultsPanel({ outcome }: Props) {
  if (!outcome) {
    return (
      <div style={{ padding: 12 }}>
        <h2 style={{ margin: "0 0 8px 0" }}>Resultados do Plano de Fogo</h2>
        <div style={{ opacity: 0.75 }}>Selecione os parâmetros para calcular o plano.</div>
      </div>
    );
  }

  if (!outcome.ok) {
    return (
      <div style={{ padding: 12 }}>
        <h2 style={{ margin: "0 0 8px 0" }}>Resultados do Plano de Fogo</h2>
        <div role="alert" data-code={outcome.error.code} style={{ color: "#b91c1c" }}>
          {outcome.error.message}
        </div>
      </div>
    );
  }

  const readouts = blastPlanReadouts(outcome.result);

  return (
    <div style={{ padding: 12, display: "grid", gap: 12 }}>
      <h2 style={{ margin: "0 0 4px 0" }}>Resultados do Plano de Fogo</h2>

      <div
        style={{
          display: "grid",
          gridTemplateColumns: "repeat(2, minmax(0, 1fr))",
          gap: 10,
        }}
      >
        {readouts.map((r) => (
          <div key={r.key} data-testid={`readout-${r.key}`} style={tileStyle}>
            <div style={{ opacity: 0.75, marginBottom: 4 }}>{r.label}</div>
            <div style={{ fontSize: 20, fontWeight: 700 }}>{r.display}</div>
          </div>
        ))}
      </div>
    </div>
  );
}
