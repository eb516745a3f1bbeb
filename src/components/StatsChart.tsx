import type { ReactElement } from "react";
import { CartesianGrid, Line, LineChart, XAxis, YAxis } from "recharts";
import type { MarkerShape } from "@/config/charts";
import type { ChartModel } from "@/lib/charts";
import { formatTick, formatValue } from "@/lib/format";

interface MarkerProps {
  shape: MarkerShape;
  color: string;
  labels: string[];
  // Injected by recharts when it clones the dot element
  cx?: number | null;
  cy?: number | null;
  index?: number;
}

const MARKER_SIZE = 4;

function Marker({ shape, color, labels, cx, cy, index }: MarkerProps) {
  if (typeof cx !== "number" || typeof cy !== "number" || !Number.isFinite(cy)) {
    return <g />;
  }

  const s = MARKER_SIZE;
  let glyph: ReactElement;
  switch (shape) {
    case "square":
      glyph = <rect x={cx - s} y={cy - s} width={s * 2} height={s * 2} fill={color} />;
      break;
    case "cross":
      glyph = (
        <path
          d={`M${cx - s},${cy - s}L${cx + s},${cy + s}M${cx - s},${cy + s}L${cx + s},${cy - s}`}
          stroke={color}
          strokeWidth={2}
          fill="none"
        />
      );
      break;
    default:
      glyph = <circle cx={cx} cy={cy} r={s} fill={color} />;
  }

  return (
    <g className="chart-marker">
      {glyph}
      {index !== undefined && labels[index] ? <title>{labels[index]}</title> : null}
    </g>
  );
}

interface StatsChartProps {
  model: ChartModel;
  width: number;
  height: number;
}

/**
 * Server-rendered line chart for one stats chart. Rendered with react-dom/server,
 * so animation is off and every id is fixed to keep the markup stable.
 */
export default function StatsChart({ model, width, height }: StatsChartProps) {
  const { config, series, points } = model;
  const rotateTicks = config.source === "monthlyUsage";

  return (
    <LineChart
      id={config.id}
      width={width}
      height={height}
      data={points}
      margin={{ top: 8, right: 32, bottom: 8, left: 16 }}
    >
      <CartesianGrid strokeDasharray="3 3" stroke="#e5e7eb" />
      <XAxis
        dataKey="bucket"
        interval={0}
        tick={{ fontSize: 11, fill: "#374151" }}
        angle={rotateTicks ? -45 : 0}
        textAnchor={rotateTicks ? "end" : "middle"}
        height={rotateTicks ? 64 : 40}
        label={{ value: "Date", position: "insideBottom", offset: 0, fontSize: 12, fill: "#374151" }}
      />
      <YAxis
        scale={config.scale === "log" ? "log" : "auto"}
        domain={config.scale === "log" ? ["auto", "auto"] : [0, "auto"]}
        tickFormatter={formatTick}
        tick={{ fontSize: 11, fill: "#374151" }}
        width={64}
        label={{ value: config.yAxisLabel, angle: -90, position: "insideLeft", fontSize: 12, fill: "#374151" }}
      />
      {series.map((s) => (
        <Line
          key={s.key}
          id={`${config.id}-${s.key}`}
          type="linear"
          name={s.label}
          dataKey={(p: (typeof points)[number]) => p.values[s.key]}
          stroke={s.color}
          strokeWidth={2}
          strokeDasharray={s.dash}
          connectNulls
          isAnimationActive={false}
          activeDot={false}
          dot={
            <Marker
              shape={s.marker}
              color={s.color}
              labels={points.map((p) => `${s.label} ${p.bucket}: ${formatValue(p.values[s.key] ?? null)}`)}
            />
          }
        />
      ))}
    </LineChart>
  );
}
