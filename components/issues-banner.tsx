"use client";

import { AlertCircle, TriangleAlert } from "lucide-react";
import type { ValidationIssue } from "@/lib/model/validation";

interface IssuesBannerProps {
  errors: ValidationIssue[];
  warnings?: ValidationIssue[];
  errorTitle?: string;
}

export function IssuesBanner({
  errors,
  warnings = [],
  errorTitle = "Cannot show results. Fix these issues first:",
}: IssuesBannerProps) {
  if (errors.length === 0 && warnings.length === 0) return null;

  return (
    <div className="mt-6 space-y-2">
      {errors.length > 0 && (
        <div
          role="alert"
          className="flex gap-2 rounded-md border border-red-200 bg-red-50 p-4 text-red-800"
        >
          <AlertCircle className="mt-0.5 size-4 shrink-0" />
          <div>
            <p className="text-sm font-medium">{errorTitle}</p>
            <ul className="mt-1 list-disc space-y-1 pl-5 text-sm text-red-700">
              {errors.map((e, i) => (
                <li key={`${e.code}-${i}`}>{e.message}</li>
              ))}
            </ul>
          </div>
        </div>
      )}
      {warnings.length > 0 && errors.length === 0 && (
        <div className="flex gap-2 rounded-md border border-amber-200 bg-amber-50 p-4 text-amber-800">
          <TriangleAlert className="mt-0.5 size-4 shrink-0" />
          <div>
            <p className="text-sm font-medium">Assumptions to note:</p>
            <ul className="mt-1 list-disc space-y-1 pl-5 text-sm text-amber-700">
              {warnings.map((w, i) => (
                <li key={`${w.code}-${i}`}>{w.message}</li>
              ))}
            </ul>
          </div>
        </div>
      )}
    </div>
  );
}
