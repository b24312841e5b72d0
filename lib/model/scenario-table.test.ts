import { describe, it, expect } from "vitest";
import {
  buildScenarioTable,
  lookup,
  lookupAll,
  scenarioCount,
  scenarioKey,
} from "./scenario-table";
import { ScenarioNotFoundError, ScenarioTableError } from "./errors";
import {
  DEFAULT_PARAMS,
  HIGH_PARAMS,
  getFixtureRows,
  getFixtureTable,
  makeRow,
} from "@/fixtures/scenario-table";

describe("scenarioKey", () => {
  it("joins the six parameters in a fixed order", () => {
    expect(scenarioKey(DEFAULT_PARAMS)).toBe("0.03|0.5|0.03|0.85|0.3|0.03");
  });

  it("distinguishes values that only differ by float drift", () => {
    const drifted = { ...DEFAULT_PARAMS, leakageRate: 0.1 + 0.2 };
    expect(scenarioKey(drifted)).not.toBe(scenarioKey(DEFAULT_PARAMS));
  });
});

describe("lookup", () => {
  const table = getFixtureTable();

  it("returns the row whose parameters equal the query", () => {
    const row = lookup(table, "BudgetEstimate", DEFAULT_PARAMS);
    expect(row.params).toEqual(DEFAULT_PARAMS);
    expect(row.years).toEqual([-100, -20]);
    expect(row.total).toBe(-123.456);
  });

  it("matches all six fields, not the closest combination", () => {
    const row = lookup(table, "TotalWealthGenerated", HIGH_PARAMS);
    expect(row.params).toEqual(HIGH_PARAMS);
    expect(row.years).toEqual([30, 6]);
  });

  it("throws ScenarioNotFoundError for a combination outside the table", () => {
    const missing = { ...DEFAULT_PARAMS, matchRate: 0.04 };
    expect(() => lookup(table, "BudgetEstimate", missing)).toThrow(
      ScenarioNotFoundError
    );
  });

  it("does not round drifted values onto the grid", () => {
    const drifted = { ...DEFAULT_PARAMS, leakageRate: 0.1 + 0.2 };
    expect(() => lookup(table, "BudgetEstimate", drifted)).toThrow(
      ScenarioNotFoundError
    );
  });

  it("names the metric on the error", () => {
    const missing = { ...DEFAULT_PARAMS, roi: 0.05 };
    try {
      lookup(table, "WealthGenerated<25p", missing);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ScenarioNotFoundError);
      if (err instanceof ScenarioNotFoundError) {
        expect(err.metric).toBe("WealthGenerated<25p");
        expect(err.params).toEqual(missing);
        expect(err.code).toBe("SCENARIO_NOT_FOUND");
      }
    }
  });
});

describe("lookupAll", () => {
  it("returns one row per metric for the same combination", () => {
    const rows = lookupAll(getFixtureTable(), HIGH_PARAMS);
    expect(rows.BudgetEstimate.years).toEqual([-200, -40]);
    expect(rows["WealthGenerated<25p"].years).toEqual([20, 4]);
    expect(rows["WealthGenerated25-50p"].years).toEqual([10, 2]);
    expect(rows.TotalWealthGenerated.years).toEqual([30, 6]);
  });
});

describe("buildScenarioTable", () => {
  it("records the year count and number of combinations", () => {
    const table = getFixtureTable();
    expect(table.yearCount).toBe(2);
    expect(scenarioCount(table, "BudgetEstimate")).toBe(2);
  });

  it("freezes rows so lookups cannot mutate the table", () => {
    const row = lookup(getFixtureTable(), "BudgetEstimate", DEFAULT_PARAMS);
    expect(Object.isFrozen(row)).toBe(true);
    expect(Object.isFrozen(row.years)).toBe(true);
  });

  it("copies source rows instead of keeping references", () => {
    const years = [-100, -20];
    const rows = getFixtureRows();
    rows.BudgetEstimate[0] = makeRow("BudgetEstimate", DEFAULT_PARAMS, years, -120);
    const table = buildScenarioTable(rows);
    years[0] = 0;
    expect(lookup(table, "BudgetEstimate", DEFAULT_PARAMS).years).toEqual([-100, -20]);
  });

  it("rejects duplicate combinations within a metric", () => {
    const rows = getFixtureRows();
    rows.BudgetEstimate.push(makeRow("BudgetEstimate", DEFAULT_PARAMS, [-1, -1], -2));
    expect(() => buildScenarioTable(rows)).toThrow(/Duplicate BudgetEstimate row/);
  });

  it("rejects a metric with no rows", () => {
    const rows = getFixtureRows();
    rows["WealthGenerated25-50p"] = [];
    expect(() => buildScenarioTable(rows)).toThrow(ScenarioTableError);
    expect(() => buildScenarioTable(rows)).toThrow(
      "No rows for metric WealthGenerated25-50p"
    );
  });

  it("rejects rows with a different number of years", () => {
    const rows = getFixtureRows();
    rows.TotalWealthGenerated.push(
      makeRow("TotalWealthGenerated", { ...DEFAULT_PARAMS, roi: 0.05 }, [1, 2, 3], 6)
    );
    expect(() => buildScenarioTable(rows)).toThrow(/has 3 years, expected 2/);
  });

  it("rejects a row filed under the wrong metric", () => {
    const rows = getFixtureRows();
    rows.BudgetEstimate.push(
      makeRow("TotalWealthGenerated", { ...DEFAULT_PARAMS, roi: 0.05 }, [1, 2], 3)
    );
    expect(() => buildScenarioTable(rows)).toThrow(
      "Row for TotalWealthGenerated listed under BudgetEstimate"
    );
  });
});
