import { describe, it, expect } from "vitest";
import {
  handleScenarioRequest,
  parseScenarioQuery,
  toScenarioQuery,
} from "./scenario-request";
import { DEFAULT_POLICY_SELECTION } from "@/lib/model/constants";
import { getFixtureTable } from "@/fixtures/scenario-table";

const table = getFixtureTable();

describe("parseScenarioQuery", () => {
  it("fills missing and empty parameters with defaults", () => {
    expect(parseScenarioQuery(new URLSearchParams("match=&roi="))).toEqual({
      success: true,
      selection: DEFAULT_POLICY_SELECTION,
    });
  });

  it("reads every parameter", () => {
    const sp = new URLSearchParams(
      "match=0.05&phaseout=fast&takeup=1&leakage=0.4&roi=0.07"
    );
    expect(parseScenarioQuery(sp)).toEqual({
      success: true,
      selection: {
        matchRate: 0.05,
        phaseout: "fast",
        takeupRate: 1,
        leakageRate: 0.4,
        roi: 0.07,
      },
    });
  });

  it("round-trips through toScenarioQuery", () => {
    const selection = { ...DEFAULT_POLICY_SELECTION, phaseout: "fast" as const, roi: 0.05 };
    expect(parseScenarioQuery(toScenarioQuery(selection))).toEqual({
      success: true,
      selection,
    });
  });

  it("rejects non-numeric rates", () => {
    const result = parseScenarioQuery(new URLSearchParams("roi=abc"));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0]?.code).toBe("INVALID_QUERY");
      expect(result.issues[0]?.message.startsWith("roi: ")).toBe(true);
    }
  });
});

describe("toScenarioQuery", () => {
  it("writes rates as plain decimals", () => {
    expect(toScenarioQuery(DEFAULT_POLICY_SELECTION).toString()).toBe(
      "match=0.03&phaseout=slow&takeup=0.85&leakage=0.3&roi=0.03"
    );
  });
});

describe("handleScenarioRequest", () => {
  it("returns the default scenario", () => {
    const response = handleScenarioRequest(table, new URLSearchParams());
    expect(response.status).toBe(200);
    if (response.status === 200) {
      expect(response.body.cumulative.TotalWealthGenerated).toEqual([15, 18]);
      expect(response.body.cumulative.BudgetEstimate).toEqual([100, 120]);
      expect(response.body.warnings).toEqual([]);
    }
  });

  it("returns warnings alongside a valid result", () => {
    const response = handleScenarioRequest(
      table,
      new URLSearchParams("match=0.05&phaseout=fast&takeup=1&leakage=0.4&roi=0.07")
    );
    expect(response.status).toBe(200);
    if (response.status === 200) {
      expect(response.body.warnings.map((w) => w.code)).toEqual([
        "HIGH_LEAKAGE",
        "AGGRESSIVE_RETURNS",
      ]);
    }
  });

  it("rejects an off-grid return with 400", () => {
    const response = handleScenarioRequest(table, new URLSearchParams("roi=0.06"));
    expect(response).toEqual({
      status: 400,
      body: {
        error: "ValidationError",
        issues: [
          {
            code: "OFF_GRID_ROI",
            message: "Annual return 6% is not one of 3%, 5%, 7%",
          },
        ],
      },
    });
  });

  it("rejects an unknown phaseout with 400", () => {
    const response = handleScenarioRequest(
      table,
      new URLSearchParams("phaseout=medium")
    );
    expect(response.status).toBe(400);
    if (response.status === 400) {
      expect(response.body.issues.map((i) => i.code)).toEqual(["INVALID_QUERY"]);
      expect(response.body.issues[0]?.message.startsWith("phaseout: ")).toBe(true);
    }
  });

  it("returns 404 for an on-grid combination the table lacks", () => {
    const response = handleScenarioRequest(table, new URLSearchParams("match=0.04"));
    expect(response).toEqual({
      status: 404,
      body: {
        error: "ScenarioNotFound",
        message:
          "No BudgetEstimate scenario for match 0.04, phaseout 0.5/0.03, takeup 0.85, leakage 0.3, roi 0.03",
      },
    });
  });
});
