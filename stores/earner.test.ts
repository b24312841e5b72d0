import { describe, it, expect, beforeEach } from "vitest";
import { useEarnerStore } from "./earner";
import { DEFAULT_PROJECTION_INPUTS } from "@/lib/model/constants";

describe("useEarnerStore", () => {
  beforeEach(() => {
    useEarnerStore.setState(useEarnerStore.getInitialState(), true);
  });

  it("starts with a projection for the default earner", () => {
    const { inputs, variant, comparison, validation } = useEarnerStore.getState();
    expect(inputs).toEqual(DEFAULT_PROJECTION_INPUTS);
    expect(variant).toBe("SEPARATE");
    expect(validation.errors).toEqual([]);
    expect(comparison?.withMatch).toHaveLength(41);
  });

  it("recomputes when inputs change", () => {
    useEarnerStore.getState().updateInputs({ roi: 0 });
    const { comparison, inputs } = useEarnerStore.getState();
    expect(inputs.income).toBe(30000);
    expect(comparison?.withMatch[1]).toBeCloseTo(1440, 6);
    expect(comparison?.matchGain).toBeCloseTo(36000, 4);
  });

  it("recomputes when the variant changes", () => {
    useEarnerStore.getState().updateInputs({ roi: 0 });
    useEarnerStore.getState().setVariant("COMBINED");
    const { comparison, variant } = useEarnerStore.getState();
    expect(variant).toBe("COMBINED");
    expect(comparison?.withMatch[1]).toBeCloseTo(1080, 6);
    expect(comparison?.withoutMatch[1]).toBeCloseTo(540, 6);
  });

  it("drops the projection while inputs are invalid", () => {
    useEarnerStore.getState().updateInputs({ income: -5 });
    const { comparison, validation } = useEarnerStore.getState();
    expect(comparison).toBeNull();
    expect(validation.errors.map((e) => e.code)).toEqual(["INVALID_INCOME"]);

    useEarnerStore.getState().updateInputs({ income: 40000 });
    expect(useEarnerStore.getState().comparison).not.toBeNull();
  });
});
