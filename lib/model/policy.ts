import type {
  PhaseoutScenario,
  PolicyParameters,
  PolicySelection,
} from "@/lib/types/zod";
import { PHASEOUT_PRESETS } from "@/lib/model/constants";

export function resolvePhaseout(phaseout: PhaseoutScenario): {
  start: number;
  rate: number;
} {
  return PHASEOUT_PRESETS[phaseout];
}

/** Expand a control selection into the six parameters the scenario table is keyed on. */
export function buildPolicyParameters(
  selection: PolicySelection
): PolicyParameters {
  const { start, rate } = resolvePhaseout(selection.phaseout);
  return {
    matchRate: selection.matchRate,
    phaseoutStart: start,
    phaseoutRate: rate,
    takeupRate: selection.takeupRate,
    leakageRate: selection.leakageRate,
    roi: selection.roi,
  };
}

/** Inverse of resolvePhaseout; null when the pair is not a known preset. */
export function phaseoutForParameters(
  params: Pick<PolicyParameters, "phaseoutStart" | "phaseoutRate">
): PhaseoutScenario | null {
  if (
    params.phaseoutStart === PHASEOUT_PRESETS.slow.start &&
    params.phaseoutRate === PHASEOUT_PRESETS.slow.rate
  ) {
    return "slow";
  }
  if (
    params.phaseoutStart === PHASEOUT_PRESETS.fast.start &&
    params.phaseoutRate === PHASEOUT_PRESETS.fast.rate
  ) {
    return "fast";
  }
  return null;
}
