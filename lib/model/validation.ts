/**
 * Validation and guardrails for policy parameters and projection inputs.
 * Hard errors block calculation; soft warnings allow it.
 */

import type { PolicyParameters, ProjectionInputs } from "@/lib/types/zod";
import { POLICY_PARAMETER_KEYS, ProjectionInputsSchema } from "@/lib/types/zod";
import {
  AGGRESSIVE_ROI_THRESHOLD,
  HIGH_LEAKAGE_THRESHOLD,
  MAX_LEAKAGE_RATE,
  PHASEOUT_PRESETS,
  SCENARIO_GRID,
} from "@/lib/model/constants";
import { PolicyValidationError } from "@/lib/model/errors";
import { formatPercent } from "@/lib/utils/format";

export interface ValidationIssue {
  code: string;
  message: string;
}

export interface ValidationResult {
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

function isFraction(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

function isOneOf(value: number, allowed: readonly number[]): boolean {
  return allowed.includes(value);
}

/**
 * Validate policy parameters against the scenario grid.
 * A value inside [0, 1] but not on the grid is still an error: no precomputed row exists for it.
 */
export function validatePolicyParameters(
  params: PolicyParameters
): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  for (const key of POLICY_PARAMETER_KEYS) {
    if (!isFraction(params[key])) {
      errors.push({
        code: "OUT_OF_RANGE",
        message: `${key} must be between 0 and 1 (got ${params[key]})`,
      });
    }
  }
  if (errors.length > 0) return { errors, warnings };

  if (params.leakageRate > MAX_LEAKAGE_RATE) {
    errors.push({
      code: "LEAKAGE_TOO_HIGH",
      message: `Early withdrawal must be at most ${formatPercent(MAX_LEAKAGE_RATE)} (got ${formatPercent(params.leakageRate)})`,
    });
  }

  if (!isOneOf(params.matchRate, SCENARIO_GRID.matchRate)) {
    errors.push({
      code: "OFF_GRID_MATCH_RATE",
      message: `Matching rate ${formatPercent(params.matchRate)} is not one of ${SCENARIO_GRID.matchRate.map(formatPercent).join(", ")}`,
    });
  }

  const phaseoutKnown = SCENARIO_GRID.phaseout.some((p) => {
    const preset = PHASEOUT_PRESETS[p];
    return (
      preset.start === params.phaseoutStart && preset.rate === params.phaseoutRate
    );
  });
  if (!phaseoutKnown) {
    errors.push({
      code: "OFF_GRID_PHASEOUT",
      message: `Phaseout ${params.phaseoutStart}/${params.phaseoutRate} does not match the slow or fast phaseout`,
    });
  }

  if (!isOneOf(params.takeupRate, SCENARIO_GRID.takeupRate)) {
    errors.push({
      code: "OFF_GRID_TAKEUP_RATE",
      message: `Takeup rate ${formatPercent(params.takeupRate)} is not one of ${SCENARIO_GRID.takeupRate.map(formatPercent).join(", ")}`,
    });
  }

  if (
    params.leakageRate <= MAX_LEAKAGE_RATE &&
    !isOneOf(params.leakageRate, SCENARIO_GRID.leakageRate)
  ) {
    errors.push({
      code: "OFF_GRID_LEAKAGE_RATE",
      message: `Early withdrawal ${formatPercent(params.leakageRate)} is not one of ${SCENARIO_GRID.leakageRate.map(formatPercent).join(", ")}`,
    });
  }

  if (!isOneOf(params.roi, SCENARIO_GRID.roi)) {
    errors.push({
      code: "OFF_GRID_ROI",
      message: `Annual return ${formatPercent(params.roi)} is not one of ${SCENARIO_GRID.roi.map(formatPercent).join(", ")}`,
    });
  }

  if (params.leakageRate >= HIGH_LEAKAGE_THRESHOLD) {
    warnings.push({
      code: "HIGH_LEAKAGE",
      message: `Early withdrawal of ${formatPercent(params.leakageRate)} assumes heavy use of savings before retirement`,
    });
  }

  if (params.roi >= AGGRESSIVE_ROI_THRESHOLD) {
    warnings.push({
      code: "AGGRESSIVE_RETURNS",
      message: `Annual return of ${formatPercent(params.roi)} is the high end of realistic returns`,
    });
  }

  return { errors, warnings };
}

/**
 * Validate single-earner inputs against ProjectionInputsSchema. Rates are continuous
 * here; only bounds apply. Each failing field is reported once, in field order.
 */
export function validateProjectionInputs(
  inputs: ProjectionInputs
): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const parsed = ProjectionInputsSchema.safeParse(inputs);
  const failed = new Set(
    parsed.success ? [] : parsed.error.issues.map((issue) => issue.path[0])
  );

  if (failed.has("income")) {
    errors.push({
      code: "INVALID_INCOME",
      message: `Income must be a non-negative amount (got ${inputs.income})`,
    });
  }

  const rates = ["roi", "contributionRate", "matchRate", "leakageRate"] as const;
  for (const key of rates) {
    if (failed.has(key)) {
      errors.push({
        code: "OUT_OF_RANGE",
        message: `${key} must be between 0 and 1 (got ${inputs[key]})`,
      });
    }
  }

  if (!failed.has("leakageRate") && inputs.leakageRate > MAX_LEAKAGE_RATE) {
    errors.push({
      code: "LEAKAGE_TOO_HIGH",
      message: `Early withdrawal must be at most ${formatPercent(MAX_LEAKAGE_RATE)} (got ${formatPercent(inputs.leakageRate)})`,
    });
  }

  if (
    errors.length === 0 &&
    inputs.contributionRate < inputs.matchRate
  ) {
    warnings.push({
      code: "CONTRIBUTION_BELOW_MATCH",
      message: `Contributing ${formatPercent(inputs.contributionRate)} leaves part of the ${formatPercent(inputs.matchRate)} match unclaimed`,
    });
  }

  return { errors, warnings };
}

/** Throw when the result has blocking errors. */
export function assertValid(result: ValidationResult): void {
  if (result.errors.length > 0) {
    throw new PolicyValidationError(result.errors);
  }
}
