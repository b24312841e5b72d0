/**
 * Zustand store for the single-earner view. Projection is recomputed
 * synchronously on every input change.
 */

import { create } from "zustand";
import type { ProjectionInputs, ProjectionVariant } from "@/lib/types/zod";
import { DEFAULT_PROJECTION_INPUTS } from "@/lib/model/constants";
import {
  projectComparison,
  type ProjectionComparison,
} from "@/lib/model/projection";
import {
  validateProjectionInputs,
  type ValidationResult,
} from "@/lib/model/validation";

export interface EarnerState {
  inputs: ProjectionInputs;
  variant: ProjectionVariant;
  comparison: ProjectionComparison | null;
  validation: ValidationResult;
}

export interface EarnerActions {
  updateInputs: (patch: Partial<ProjectionInputs>) => void;
  setVariant: (variant: ProjectionVariant) => void;
}

function compute(
  inputs: ProjectionInputs,
  variant: ProjectionVariant
): Pick<EarnerState, "comparison" | "validation"> {
  const validation = validateProjectionInputs(inputs);
  if (validation.errors.length > 0) {
    return { comparison: null, validation };
  }
  return { comparison: projectComparison(inputs, variant), validation };
}

export const useEarnerStore = create<EarnerState & EarnerActions>()(
  (set, get) => ({
    inputs: DEFAULT_PROJECTION_INPUTS,
    variant: "SEPARATE",
    ...compute(DEFAULT_PROJECTION_INPUTS, "SEPARATE"),

    updateInputs: (patch) => {
      const inputs = { ...get().inputs, ...patch };
      set({ inputs, ...compute(inputs, get().variant) });
    },

    setVariant: (variant) => {
      set({ variant, ...compute(get().inputs, variant) });
    },
  })
);
