/**
 * Single-earner wealth projection.
 * Annual recurrence over HORIZON_YEARS; no prior savings at program start.
 */

import type {
  ProjectionInputs,
  ProjectionVariant,
  WealthSeries,
} from "@/lib/types/zod";
import { HORIZON_YEARS } from "@/lib/model/constants";

/** Matched contribution rate: the program never matches more than the earner contributes. */
export function matchedRate(contributionRate: number, matchRate: number): number {
  return Math.min(contributionRate, matchRate);
}

/** Dollars added to the account in one year, after leakage. */
export function annualDeposit(
  inputs: ProjectionInputs,
  variant: ProjectionVariant
): number {
  const { income, contributionRate, matchRate, leakageRate } = inputs;
  const matched = matchedRate(contributionRate, matchRate);
  if (variant === "SEPARATE") {
    return matched * income + contributionRate * income * (1 - leakageRate);
  }
  return (matched + contributionRate) * income * (1 - leakageRate);
}

/**
 * Project account wealth for years 0..HORIZON_YEARS.
 * w[t] = w[t-1] * (1 + roi) + deposit; w[0] = 0.
 * Inputs are expected to be validated (see validateProjectionInputs); nothing is clamped.
 */
export function project(
  inputs: ProjectionInputs,
  variant: ProjectionVariant = "SEPARATE"
): WealthSeries {
  const deposit = annualDeposit(inputs, variant);
  const growth = 1 + inputs.roi;
  const series: number[] = [0];
  let wealth = 0;
  for (let t = 1; t <= HORIZON_YEARS; t++) {
    wealth = wealth * growth + deposit;
    series.push(wealth);
  }
  return Object.freeze(series);
}

export interface ProjectionComparison {
  inputs: ProjectionInputs;
  variant: ProjectionVariant;
  withMatch: WealthSeries;
  /** Same earner with no program match. */
  withoutMatch: WealthSeries;
  /** Final-year wealth attributable to the match. */
  matchGain: number;
}

/** Project with and without the match so the dashboard can show the program's effect. */
export function projectComparison(
  inputs: ProjectionInputs,
  variant: ProjectionVariant = "SEPARATE"
): ProjectionComparison {
  const withMatch = project(inputs, variant);
  const withoutMatch = project({ ...inputs, matchRate: 0 }, variant);
  const last = withMatch.length - 1;
  return {
    inputs,
    variant,
    withMatch,
    withoutMatch,
    matchGain: (withMatch[last] ?? 0) - (withoutMatch[last] ?? 0),
  };
}
