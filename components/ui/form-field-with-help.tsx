"use client";

import { HelpTooltip } from "./help-tooltip";
import { formatHelpContent, type HelpEntry } from "@/lib/copy/help";

const labelBase = "block text-sm font-medium italic text-content-muted";

interface FormFieldWithHelpProps {
  /** id of the control the label points at; omit for grouped controls */
  id?: string;
  help: HelpEntry;
  children: React.ReactNode;
}

export function FormFieldWithHelp({ id, help, children }: FormFieldWithHelpProps) {
  return (
    <div className="space-y-1">
      <div className="mb-1 flex items-center gap-1.5">
        {id ? (
          <label htmlFor={id} className={labelBase}>
            {help.title}
          </label>
        ) : (
          <span className={labelBase}>{help.title}</span>
        )}
        <HelpTooltip content={formatHelpContent(help)} side="top" />
      </div>
      {children}
    </div>
  );
}
