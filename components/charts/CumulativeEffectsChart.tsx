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
import type { ChartPoint } from "@/lib/model/aggregation";

function formatAxisBillions(value: number): string {
  return `$${Math.round(value).toLocaleString()}`;
}

function formatTooltipValue(value: unknown): string {
  return typeof value === "number" ? `$${value.toFixed(1)}bn` : String(value);
}

interface CumulativeEffectsChartProps {
  data: ChartPoint[];
}

/** Cumulative wealth generated vs cumulative cost, billions of dollars. */
export function CumulativeEffectsChart({ data }: CumulativeEffectsChartProps) {
  return (
    <div className="h-80 min-w-0 w-full">
      <ResponsiveContainer width="100%" height="100%" minHeight={320}>
        <LineChart data={data} margin={{ top: 20, right: 20, left: 20, bottom: 20 }}>
          <CartesianGrid strokeDasharray="3 3" className="stroke-border" />
          <XAxis
            dataKey="year"
            tick={{ fontSize: 12 }}
            tickLine={false}
            axisLine={{ stroke: "currentColor", opacity: 0.3 }}
          />
          <YAxis
            tickFormatter={formatAxisBillions}
            tick={{ fontSize: 12 }}
            tickLine={false}
            axisLine={false}
            label={{
              value: "Billions USD",
              angle: -90,
              position: "insideLeft",
              fontSize: 12,
            }}
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
          <Legend verticalAlign="bottom" align="left" wrapperStyle={{ fontSize: 12 }} />
          <Line
            type="monotone"
            dataKey="wealth"
            name="Wealth (bn)"
            stroke="var(--wealth)"
            strokeWidth={4}
            dot={false}
          />
          <Line
            type="monotone"
            dataKey="cost"
            name="Cost (bn)"
            stroke="var(--cost)"
            strokeWidth={4}
            dot={false}
          />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
