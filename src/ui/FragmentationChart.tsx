import { CartesianGrid, Customized, Line, LineChart, Tooltip, XAxis, YAxis } from "recharts";
import type { FragmentationCurve } from "../models/types";

// One colour per pattern class, in catalog order.
const CURVE_COLORS = ["#0c77f9", "#fb0707", "#13b54b", "#c1996b", "#5c5b5b"];

const MARGIN = { top: 20, right: 30, left: 20, bottom: 30 };
const Y_AXIS_WIDTH = 60;

function curveColor(i: number): string {
  return CURVE_COLORS[i % CURVE_COLORS.length];
}

/**
 * Legend drawn inside the chart SVG (recharts' <Legend> is HTML), so it survives
 * rasterizing the SVG for the report. Sits in the empty upper-left corner of the plot.
 */
function SvgLegend({ curves }: { curves: FragmentationCurve[] }) {
  const x = MARGIN.left + Y_AXIS_WIDTH + 12;
  return (
    <g className="fragmentation-legend">
      {curves.map((c, i) => {
        const y = MARGIN.top + 16 + i * 18;
        return (
          <g key={c.patternClassName}>
            <line x1={x} x2={x + 18} y1={y} y2={y} stroke={curveColor(i)} strokeWidth={2} />
            <text x={x + 24} y={y + 4} fontSize={12} fill="#111827">
              {c.label}
            </text>
          </g>
        );
      })}
    </g>
  );
}

type Props = {
  curves: FragmentationCurve[];
  width?: number;
  height?: number;
};

export default function FragmentationChart({ curves, width = 620, height = 380 }: Props) {
  if (curves.length === 0) {
    return <div style={{ fontSize: 13, opacity: 0.7 }}>Sem curvas.</div>;
  }

  return (
    <LineChart width={width} height={height} margin={MARGIN}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis
        dataKey="openingMm"
        type="number"
        scale="log"
        domain={[1, 10000]}
        allowDataOverflow
        ticks={[1, 10, 100, 1000, 10000]}
        label={{ value: "Abertura da peneira (mm)", position: "insideBottom", offset: -15 }}
      />
      <YAxis width={Y_AXIS_WIDTH} domain={[0, 100]} unit="%" label={{ value: "% Passante", angle: -90, position: "insideLeft" }} />
      <Tooltip />
      <Customized component={<SvgLegend curves={curves} />} />
      {curves.map((c, i) => (
        <Line
          key={c.patternClassName}
          data={[...c.points]}
          dataKey="percentPassing"
          name={c.label}
          type="monotone"
          dot={false}
          stroke={curveColor(i)}
          isAnimationActive={false}
        />
      ))}
    </LineChart>
  );
}
