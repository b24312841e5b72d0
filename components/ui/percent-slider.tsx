"use client";

import { formatPercent } from "@/lib/utils/format";

interface PercentSliderProps {
  id: string;
  value: number;
  onChange: (value: number) => void;
  min?: number;
  max?: number;
  step?: number;
}

/** Snap to the step grid; scenario lookups compare values exactly. */
function snap(value: number, step: number, min: number): number {
  const steps = Math.round((value - min) / step);
  return Number((min + steps * step).toFixed(6));
}

export function PercentSlider({
  id,
  value,
  onChange,
  min = 0,
  max = 1,
  step = 0.01,
}: PercentSliderProps) {
  return (
    <div className="flex items-center gap-3">
      <input
        id={id}
        type="range"
        min={min}
        max={max}
        step={step}
        value={value}
        onChange={(e) => {
          const v = parseFloat(e.target.value);
          if (!Number.isNaN(v)) onChange(snap(v, step, min));
        }}
        className="w-64 accent-[var(--primary)]"
      />
      <span className="w-14 text-right text-sm tabular-nums text-content">
        {formatPercent(value)}
      </span>
    </div>
  );
}
