"use client";

import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from "recharts";
import type { ProjectionComparison } from "@/lib/model/projection";

function formatCurrencyShort(value: number): string {
  if (value >= 1_000_000) {
    return `$${(value / 1_000_000).toFixed(1)}M`;
  }
  if (value >= 1_000) {
    return `$${(value / 1_000).toFixed(0)}k`;
  }
  return `$${Math.round(value).toLocaleString()}`;
}

function formatTooltipValue(value: unknown): string {
  return typeof value === "number"
    ? `$${Math.round(value).toLocaleString()}`
    : String(value);
}

interface WealthTrajectoryChartProps {
  comparison: ProjectionComparison;
}

export function WealthTrajectoryChart({ comparison }: WealthTrajectoryChartProps) {
  const data = comparison.withMatch.map((wealth, year) => ({
    year,
    withMatch: wealth,
    withoutMatch: comparison.withoutMatch[year] ?? 0,
  }));

  return (
    <div className="h-80 min-w-0 w-full">
      <ResponsiveContainer width="100%" height="100%" minHeight={320}>
        <LineChart data={data} margin={{ top: 8, right: 8, left: 8, bottom: 8 }}>
          <CartesianGrid strokeDasharray="3 3" className="stroke-border" />
          <XAxis
            dataKey="year"
            tick={{ fontSize: 12 }}
            tickLine={false}
            axisLine={{ stroke: "currentColor", opacity: 0.3 }}
          />
          <YAxis
            tickFormatter={formatCurrencyShort}
            tick={{ fontSize: 12 }}
            tickLine={false}
            axisLine={false}
          />
          <Tooltip
            contentStyle={{
              backgroundColor: "var(--surface-elevated)",
              border: "1px solid var(--border)",
              borderRadius: "6px",
            }}
            labelFormatter={(year) => `Year ${year}`}
            formatter={formatTooltipValue}
          />
          <Legend wrapperStyle={{ fontSize: 12 }} />
          <Line
            type="monotone"
            dataKey="withMatch"
            name="With match"
            stroke="var(--wealth)"
            strokeWidth={3}
            dot={false}
          />
          <Line
            type="monotone"
            dataKey="withoutMatch"
            name="Without match"
            stroke="var(--content-muted)"
            strokeDasharray="5 5"
            strokeWidth={2}
            dot={false}
          />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
