import { describe, it, expect } from "vitest";
import { parseScenarioResponse } from "./scenario-response";
import { runScenario } from "@/lib/model/aggregation";
import { DEFAULT_PARAMS, getFixtureTable } from "@/fixtures/scenario-table";

describe("parseScenarioResponse", () => {
  it("accepts a serialized scenario result", () => {
    const result = runScenario(getFixtureTable(), DEFAULT_PARAMS);
    const body: unknown = JSON.parse(JSON.stringify(result));
    expect(parseScenarioResponse(200, body)).toEqual({ ok: true, result });
  });

  it("treats a malformed success body as a bad response", () => {
    expect(parseScenarioResponse(200, { chart: [] })).toEqual({
      ok: false,
      issues: [{ code: "BAD_RESPONSE", message: "Unexpected response from server" }],
    });
  });

  it("passes validation issues through", () => {
    const issues = [{ code: "OFF_GRID_ROI", message: "Annual return 6% is not one of 3%, 5%, 7%" }];
    expect(
      parseScenarioResponse(400, { error: "ValidationError", issues })
    ).toEqual({ ok: false, issues });
  });

  it("maps a missing scenario to its message", () => {
    expect(
      parseScenarioResponse(404, { error: "ScenarioNotFound", message: "No row" })
    ).toEqual({
      ok: false,
      issues: [{ code: "SCENARIO_NOT_FOUND", message: "No row" }],
    });
  });

  it("falls back to the status for other failures", () => {
    expect(parseScenarioResponse(500, { error: "InternalError" })).toEqual({
      ok: false,
      issues: [{ code: "HTTP_ERROR", message: "Request failed (500)" }],
    });
    expect(parseScenarioResponse(502, "<html>")).toEqual({
      ok: false,
      issues: [{ code: "HTTP_ERROR", message: "Request failed (502)" }],
    });
  });
});
