"use client";

import { useState } from "react";
import { formatWithCommas, parseAmount } from "@/lib/utils/format";
import { cn } from "@/lib/utils";

interface MoneyInputProps {
  id: string;
  value: number;
  onChange: (value: number) => void;
  className?: string;
}

/** Dollar amount input; reports parsed values, keeps the typed text while editing. */
export function MoneyInput({ id, value, onChange, className }: MoneyInputProps) {
  const [text, setText] = useState(String(value));

  return (
    <div
      className={cn(
        "flex w-48 items-center rounded-md border border-border bg-background px-2",
        className
      )}
    >
      <span className="text-sm text-content-muted">$</span>
      <input
        id={id}
        type="text"
        inputMode="decimal"
        autoComplete="off"
        className="w-full bg-transparent px-1 py-1.5 text-sm tabular-nums outline-none"
        value={formatWithCommas(text)}
        onChange={(e) => {
          const raw = e.target.value.replace(/,/g, "");
          setText(raw);
          const parsed = parseAmount(raw);
          if (parsed != null) onChange(parsed);
        }}
      />
      <span className="text-xs text-content-muted">USD</span>
    </div>
  );
}
