/**
 * Error types surfaced by the model. Each carries a stable code for the API and UI.
 */

import type { PolicyParameters, ScenarioMetric } from "@/lib/types/zod";
import type { ValidationIssue } from "@/lib/model/validation";

export type ModelErrorCode =
  | "SCENARIO_NOT_FOUND"
  | "VALIDATION_FAILED"
  | "SCENARIO_TABLE_INVALID";

export class ModelError extends Error {
  readonly code: ModelErrorCode;

  constructor(code: ModelErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No precomputed row matches the requested parameter combination. */
export class ScenarioNotFoundError extends ModelError {
  readonly metric: ScenarioMetric;
  readonly params: PolicyParameters;

  constructor(metric: ScenarioMetric, params: PolicyParameters) {
    super(
      "SCENARIO_NOT_FOUND",
      `No ${metric} scenario for match ${params.matchRate}, phaseout ${params.phaseoutStart}/${params.phaseoutRate}, takeup ${params.takeupRate}, leakage ${params.leakageRate}, roi ${params.roi}`
    );
    this.metric = metric;
    this.params = params;
  }
}

/** Parameters outside their declared domain. Carries every blocking issue. */
export class PolicyValidationError extends ModelError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      "VALIDATION_FAILED",
      issues.length === 1 && issues[0]
        ? issues[0].message
        : `${issues.length} invalid parameters`
    );
    this.issues = issues;
  }
}

/** Malformed scenario data. Fatal at startup. */
export class ScenarioTableError extends ModelError {
  constructor(message: string) {
    super("SCENARIO_TABLE_INVALID", message);
  }
}
