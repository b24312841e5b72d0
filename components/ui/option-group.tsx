"use client";

import { cn } from "@/lib/utils";

export interface Option<T extends string | number> {
  value: T;
  label: string;
}

interface OptionGroupProps<T extends string | number> {
  name: string;
  options: readonly Option<T>[];
  value: T;
  onChange: (value: T) => void;
}

/** Inline radio group. */
export function OptionGroup<T extends string | number>({
  name,
  options,
  value,
  onChange,
}: OptionGroupProps<T>) {
  return (
    <div role="radiogroup" className="flex flex-wrap gap-4">
      {options.map((option) => {
        const checked = option.value === value;
        return (
          <label
            key={String(option.value)}
            className={cn(
              "inline-flex cursor-pointer items-center gap-1.5 text-sm",
              checked ? "text-content" : "text-content-muted"
            )}
          >
            <input
              type="radio"
              name={name}
              checked={checked}
              onChange={() => onChange(option.value)}
              className="accent-[var(--primary)]"
            />
            {option.label}
          </label>
        );
      })}
    </div>
  );
}
