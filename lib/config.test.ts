import path from "node:path";
import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("defaults the data directory to ./data", () => {
    expect(loadConfig({})).toEqual({
      scenarioDataDir: path.resolve(process.cwd(), "data"),
    });
  });

  it("resolves SCENARIO_DATA_DIR against the working directory", () => {
    expect(loadConfig({ SCENARIO_DATA_DIR: "/srv/scenarios" }).scenarioDataDir).toBe(
      "/srv/scenarios"
    );
    expect(loadConfig({ SCENARIO_DATA_DIR: "fixtures/csv" }).scenarioDataDir).toBe(
      path.resolve(process.cwd(), "fixtures/csv")
    );
  });

  it("rejects an empty SCENARIO_DATA_DIR", () => {
    expect(() => loadConfig({ SCENARIO_DATA_DIR: "" })).toThrow();
  });
});
