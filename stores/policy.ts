/**
 * Zustand store for the aggregate dashboard: current policy selection and the
 * scenario result fetched from /api/scenario. Every change refetches in full.
 */

import { create } from "zustand";
import type { PolicySelection } from "@/lib/types/zod";
import type { ScenarioResult } from "@/lib/model/aggregation";
import type { ValidationIssue } from "@/lib/model/validation";
import { DEFAULT_POLICY_SELECTION } from "@/lib/model/constants";
import { toScenarioQuery } from "@/lib/api/scenario-request";
import {
  parseScenarioResponse,
  type ParsedScenarioResponse,
} from "@/lib/api/scenario-response";

export type FetchStatus = "idle" | "loading" | "ready" | "error";

export interface PolicyState {
  selection: PolicySelection;
  result: ScenarioResult | null;
  issues: ValidationIssue[];
  status: FetchStatus;
}

export interface PolicyActions {
  updateSelection: (patch: Partial<PolicySelection>) => void;
  resetSelection: () => void;
  fetchScenario: () => Promise<void>;
}

/** Incremented per request; responses for older selections are dropped. */
let latestRequest = 0;

export const usePolicyStore = create<PolicyState & PolicyActions>()(
  (set, get) => ({
    selection: DEFAULT_POLICY_SELECTION,
    result: null,
    issues: [],
    status: "idle",

    updateSelection: (patch) => {
      set((state) => ({ selection: { ...state.selection, ...patch } }));
      void get().fetchScenario();
    },

    resetSelection: () => {
      set({ selection: DEFAULT_POLICY_SELECTION });
      void get().fetchScenario();
    },

    fetchScenario: async () => {
      const requestId = ++latestRequest;
      const query = toScenarioQuery(get().selection);
      set({ status: "loading" });

      let parsed: ParsedScenarioResponse;
      try {
        const res = await fetch(`/api/scenario?${query.toString()}`);
        const body: unknown = await res.json();
        parsed = parseScenarioResponse(res.status, body);
      } catch (err) {
        const message = err instanceof Error ? err.message : "Network error";
        parsed = { ok: false, issues: [{ code: "NETWORK_ERROR", message }] };
      }

      if (requestId !== latestRequest) return;
      if (parsed.ok) {
        set({ result: parsed.result, issues: [], status: "ready" });
      } else {
        set({ result: null, issues: parsed.issues, status: "error" });
      }
    },
  })
);
