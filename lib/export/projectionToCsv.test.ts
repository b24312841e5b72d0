import { describe, it, expect } from "vitest";
import { projectionToCsv } from "./projectionToCsv";
import { projectComparison } from "@/lib/model/projection";
import { DEFAULT_PROJECTION_INPUTS } from "@/lib/model/constants";

describe("projectionToCsv", () => {
  it("writes one line per year with whole-dollar values", () => {
    const comparison = projectComparison({ ...DEFAULT_PROJECTION_INPUTS, roi: 0 });
    const lines = projectionToCsv(comparison).split("\n");

    expect(lines).toHaveLength(42);
    expect(lines.slice(0, 4)).toEqual([
      "Year,With match,Without match,From match",
      "0,0,0,0",
      "1,1440,540,900",
      "2,2880,1080,1800",
    ]);
    expect(lines[41]).toBe("40,57600,21600,36000");
  });
});
