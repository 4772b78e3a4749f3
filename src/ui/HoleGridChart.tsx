import { CartesianGrid, Scatter, ScatterChart, Tooltip, XAxis, YAxis } from "recharts";
import type { HolePoint } from "../models/types";

type Props = {
  holes: HolePoint[];
  width?: number;
  height?: number;
};

export default function HoleGridChart({ holes, width = 520, height = 360 }: Props) {
  if (holes.length === 0) {
    return <div style={{ fontSize: 13, opacity: 0.7 }}>Sem furos.</div>;
  }

  return (
    <ScatterChart width={width} height={height} margin={{ top: 20, right: 30, left: 20, bottom: 30 }}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis
        dataKey="xM"
        type="number"
        name="Espaçamento"
        unit="m"
        label={{ value: "Espaçamento entre furos (m)", position: "insideBottom", offset: -15 }}
      />
      <YAxis
        dataKey="yM"
        type="number"
        name="Afastamento"
        unit="m"
        label={{ value: "Afastamento entre linhas (m)", angle: -90, position: "insideLeft" }}
      />
      <Tooltip cursor={{ strokeDasharray: "3 3" }} />
      <Scatter name="Furos" data={holes} fill="#dc2626" isAnimationActive={false} />
    </ScatterChart>
  );
}
