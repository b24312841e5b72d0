import { describe, it, expect } from "vitest";
import { scenarioToCsv } from "./scenarioToCsv";
import { runScenario } from "@/lib/model/aggregation";
import { DEFAULT_PARAMS, getFixtureTable } from "@/fixtures/scenario-table";

describe("scenarioToCsv", () => {
  it("writes parameters, annual effects and cumulative effects", () => {
    const csv = scenarioToCsv(runScenario(getFixtureTable(), DEFAULT_PARAMS));
    expect(csv.split("\n")).toEqual([
      "Parameter,Value",
      "Matching rate,0.03",
      "Phaseout,slow",
      "Phaseout start,0.5",
      "Phaseout rate,0.03",
      "Takeup rate,0.85",
      "Early withdrawal,0.3",
      "Annual return,0.03",
      "",
      "--- Annual effects ---",
      ",0,1,Total",
      "Budget Estimate,-100,-20,-123.5",
      "Wealth Generated for <25p,10,2,12",
      "Wealth Generated for 25-50p,5,1,6",
      "Total Wealth Generated,15,3,999",
      "",
      "--- Cumulative effects ---",
      ",0,1",
      "Budget Estimate,100,120",
      "Wealth Generated for <25p,10,12",
      "Wealth Generated for 25-50p,5,6",
      "Total Wealth Generated,15,18",
    ]);
  });
});
