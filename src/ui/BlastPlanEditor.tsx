import { INPUT_DOMAINS, type NumericDomain } from "../models/defaultBlastPlan";
import type { BlastPlanSelection, ReferenceTables } from "../models/types";

type Props = {
  selection: BlastPlanSelection;
  tables: ReferenceTables;
  onChange: (s: BlastPlanSelection) => void;
};

type CatalogField = "explosive" | "rockMass" | "pattern";
type SliderField = keyof typeof INPUT_DOMAINS;

const fieldStyle = { display: "grid", gap: 6 } as const;

function withField<K extends keyof BlastPlanSelection>(
  s: BlastPlanSelection,
  key: K,
  value: BlastPlanSelection[K]
): BlastPlanSelection {
  const next = { ...s };
  next[key] = value;
  return next;
}

export function BlastPlanEditor({ selection, tables, onChange }: Props) {
  const catalogs: { field: CatalogField; label: string; names: string[] }[] = [
    { field: "explosive", label: "Tipo de Explosivo", names: [...tables.explosives.keys()] },
    { field: "rockMass", label: "Tipo de Maciço Rochoso", names: [...tables.rockMasses.keys()] },
    { field: "pattern", label: "Tipo de Malha", names: [...tables.patterns.keys()] },
  ];

  const sliders: { field: SliderField; label: string; domain: NumericDomain }[] = [
    { field: "benchHeightM", label: "Altura do Banco (m)", domain: INPUT_DOMAINS.benchHeightM },
    { field: "holesPerRow", label: "Nº de Furos por Linha", domain: INPUT_DOMAINS.holesPerRow },
    { field: "rows", label: "Nº de Linhas de Furo", domain: INPUT_DOMAINS.rows },
  ];

  return (
    <div style={{ display: "grid", gap: 12 }}>
      <h2 style={{ margin: 0 }}>Plano de Fogo</h2>

      {catalogs.map(({ field, label, names }) => (
        <div key={field} style={fieldStyle}>
          <label htmlFor={`plan-${field}`} style={{ fontWeight: 600 }}>
            {label}
          </label>
          <select id={`plan-${field}`} value={selection[field]} onChange={(e) => onChange(withField(selection, field, e.target.value))}>
            {names.map((name) => (
              <option key={name} value={name}>
                {name}
              </option>
            ))}
          </select>
        </div>
      ))}

      {sliders.map(({ field, label, domain }) => (
        <div key={field} style={fieldStyle}>
          <label htmlFor={`plan-${field}`} style={{ fontWeight: 600 }}>
            {label}: {selection[field]}
          </label>
          <input
            id={`plan-${field}`}
            type="range"
            min={domain.min}
            max={domain.max}
            step={domain.step}
            value={selection[field]}
            onChange={(e) => {
              const n = Number(e.target.value);
              if (Number.isFinite(n)) onChange(withField(selection, field, n));
            }}
          />
        </div>
      ))}
    </div>
  );
}
