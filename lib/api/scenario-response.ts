/**
 * Client-side parsing of /api/scenario responses.
 */

import { z } from "zod";
import { PolicyParametersSchema, ScenarioMetricSchema } from "@/lib/types/zod";
import type { ScenarioResult } from "@/lib/model/aggregation";
import type { ValidationIssue } from "@/lib/model/validation";

const IssueSchema = z.object({ code: z.string(), message: z.string() });

const SeriesSchema = z.array(z.number());

function perMetric<T extends z.ZodTypeAny>(schema: T) {
  return z.object({
    BudgetEstimate: schema,
    "WealthGenerated<25p": schema,
    "WealthGenerated25-50p": schema,
    TotalWealthGenerated: schema,
  });
}

export const ScenarioResultSchema = z.object({
  params: PolicyParametersSchema,
  annualTable: z.array(
    z.object({
      metric: ScenarioMetricSchema,
      label: z.string(),
      years: SeriesSchema,
      total: z.number(),
    })
  ),
  cumulative: perMetric(SeriesSchema),
  chart: z.array(
    z.object({ year: z.number(), wealth: z.number(), cost: z.number() })
  ),
  totals: perMetric(z.number()),
  warnings: z.array(IssueSchema),
});

const ErrorBodySchema = z.object({
  error: z.string(),
  message: z.string().optional(),
  issues: z.array(IssueSchema).optional(),
});

export type ParsedScenarioResponse =
  | { ok: true; result: ScenarioResult }
  | { ok: false; issues: ValidationIssue[] };

/** Interpret a response body by status. Unreadable bodies become a single issue. */
export function parseScenarioResponse(
  status: number,
  body: unknown
): ParsedScenarioResponse {
  if (status === 200) {
    const parsed = ScenarioResultSchema.safeParse(body);
    if (parsed.success) return { ok: true, result: parsed.data };
    return {
      ok: false,
      issues: [{ code: "BAD_RESPONSE", message: "Unexpected response from server" }],
    };
  }

  const parsed = ErrorBodySchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      issues: [{ code: "HTTP_ERROR", message: `Request failed (${status})` }],
    };
  }
  const { error, message, issues } = parsed.data;
  if (issues?.length) return { ok: false, issues };
  return {
    ok: false,
    issues: [
      {
        code: error === "ScenarioNotFound" ? "SCENARIO_NOT_FOUND" : "HTTP_ERROR",
        message: message ?? `Request failed (${status})`,
      },
    ],
  };
}
