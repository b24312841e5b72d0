/**
 * Query parsing and error mapping for GET /api/scenario.
 * Kept free of Next.js types so it can be exercised directly in tests.
 */

import { z } from "zod";
import type { PolicySelection } from "@/lib/types/zod";
import { PhaseoutScenarioSchema } from "@/lib/types/zod";
import { DEFAULT_POLICY_SELECTION } from "@/lib/model/constants";
import { buildPolicyParameters } from "@/lib/model/policy";
import { runScenario, type ScenarioResult } from "@/lib/model/aggregation";
import type { ScenarioTable } from "@/lib/model/scenario-table";
import type { ValidationIssue } from "@/lib/model/validation";
import {
  PolicyValidationError,
  ScenarioNotFoundError,
} from "@/lib/model/errors";

const RateParamSchema = z.coerce.number().finite();

const ScenarioQuerySchema = z.object({
  match: RateParamSchema.default(DEFAULT_POLICY_SELECTION.matchRate),
  phaseout: PhaseoutScenarioSchema.default(DEFAULT_POLICY_SELECTION.phaseout),
  takeup: RateParamSchema.default(DEFAULT_POLICY_SELECTION.takeupRate),
  leakage: RateParamSchema.default(DEFAULT_POLICY_SELECTION.leakageRate),
  roi: RateParamSchema.default(DEFAULT_POLICY_SELECTION.roi),
});

export type ScenarioResponse =
  | { status: 200; body: ScenarioResult }
  | { status: 400; body: { error: "ValidationError"; issues: ValidationIssue[] } }
  | { status: 404; body: { error: "ScenarioNotFound"; message: string } };

/** Read the policy selection from query parameters; missing ones take the defaults. */
export function parseScenarioQuery(
  searchParams: URLSearchParams
):
  | { success: true; selection: PolicySelection }
  | { success: false; issues: ValidationIssue[] } {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(ScenarioQuerySchema.shape)) {
    const value = searchParams.get(key);
    if (value != null && value !== "") raw[key] = value;
  }
  const parsed = ScenarioQuerySchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) => ({
        code: "INVALID_QUERY",
        message: `${issue.path.join(".")}: ${issue.message}`,
      })),
    };
  }
  const q = parsed.data;
  return {
    success: true,
    selection: {
      matchRate: q.match,
      phaseout: q.phaseout,
      takeupRate: q.takeup,
      leakageRate: q.leakage,
      roi: q.roi,
    },
  };
}

/** Build query parameters for a selection (inverse of parseScenarioQuery). */
export function toScenarioQuery(selection: PolicySelection): URLSearchParams {
  return new URLSearchParams({
    match: String(selection.matchRate),
    phaseout: selection.phaseout,
    takeup: String(selection.takeupRate),
    leakage: String(selection.leakageRate),
    roi: String(selection.roi),
  });
}

/**
 * Map a request to a response. Validation and missing scenarios become 400/404;
 * anything else propagates to the route handler.
 */
export function handleScenarioRequest(
  table: ScenarioTable,
  searchParams: URLSearchParams
): ScenarioResponse {
  const query = parseScenarioQuery(searchParams);
  if (!query.success) {
    return {
      status: 400,
      body: { error: "ValidationError", issues: query.issues },
    };
  }

  try {
    const result = runScenario(table, buildPolicyParameters(query.selection));
    return { status: 200, body: result };
  } catch (err) {
    if (err instanceof PolicyValidationError) {
      return {
        status: 400,
        body: { error: "ValidationError", issues: err.issues },
      };
    }
    if (err instanceof ScenarioNotFoundError) {
      return {
        status: 404,
        body: { error: "ScenarioNotFound", message: err.message },
      };
    }
    throw err;
  }
}
