import { describe, it, expect } from "vitest";
import type { BaselineEntity, TeamContext } from "@/lib/domain/types";
import {
  adjust,
  applyFactors,
  assignmentMultiplier,
  buildTeamContexts,
  computeFactors,
  contextValue,
} from "@/lib/projection/adjust";
import { DEFAULT_CONFIGURATION } from "@/lib/projection/config";

const opponent: TeamContext = {
  team: "MTL",
  shot_rate_allowed: 34.1,
  expected_goals_rate_allowed: 3.0,
  shot_rate_for: 28.0,
  shot_attempt_rate_for: 63.8,
  shot_attempt_rate_allowed: 60.0,
  expected_goals_rate_for: 2.4,
};

const forward: BaselineEntity = {
  canonical_id: "AUSTON MATTHEWS_TOR",
  display_name: "Auston Matthews",
  team: "TOR",
  role: "F",
  external_id: null,
  per_unit_rates: { goals: 1.0, assists: 0.8, shots: 4.0, blocks: 0.5 },
  fallback_metrics: [],
  salary: 9000,
  assignment: "top line",
  pp_unit: "pp1",
  opponent: "MTL",
  rostered: true,
};

describe("computeFactors", () => {
  it("scales against league averages", () => {
    const f = computeFactors(forward, opponent, DEFAULT_CONFIGURATION);
    expect(f.shot).toBeCloseTo(34.1 / 31.0, 10);
    expect(f.expected_goals).toBeCloseTo(3.0 / 2.65, 10);
    expect(f.block).toBeCloseTo(1 + 0.5 * (63.8 / 58.0 - 1), 10);
    expect(f.assignment).toBeCloseTo(1.12 * 1.15, 10);
  });

  it("is neutral without opponent data or an assignment", () => {
    const f = computeFactors({ assignment: null, pp_unit: null }, null, DEFAULT_CONFIGURATION);
    expect(f).toEqual({ shot: 1, expected_goals: 1, block: 1, assignment: 1 });
  });

  it("treats a missing opponent field as neutral for that factor only", () => {
    const f = computeFactors(forward, { ...opponent, shot_rate_allowed: null }, DEFAULT_CONFIGURATION);
    expect(f.shot).toBe(1);
    expect(f.expected_goals).toBeCloseTo(3.0 / 2.65, 10);
  });
});

describe("assignmentMultiplier", () => {
  it("maps unknown and unassigned labels to one", () => {
    const table = DEFAULT_CONFIGURATION.assignment_multipliers;
    expect(assignmentMultiplier("unassigned", table)).toBe(1);
    expect(assignmentMultiplier("press box", table)).toBe(1);
    expect(assignmentMultiplier(null, table)).toBe(1);
    expect(assignmentMultiplier("L1", table)).toBe(1.12);
  });
});

describe("applyFactors", () => {
  it("commutes", () => {
    const a = 1.1;
    const b = 1.288;
    const shotThenAssignment = applyFactors(applyFactors(forward.per_unit_rates, { shot: a }), { assignment: b });
    const assignmentThenShot = applyFactors(applyFactors(forward.per_unit_rates, { assignment: b }), { shot: a });
    for (const metric of ["goals", "assists", "shots", "blocks"] as const) {
      expect(shotThenAssignment[metric]).toBeCloseTo(assignmentThenShot[metric] ?? NaN, 12);
    }
    expect(shotThenAssignment.shots).toBeCloseTo(4.0 * a * b, 12);
    expect(shotThenAssignment.goals).toBeCloseTo(1.0 * b, 12);
  });

  it("leaves save fraction alone", () => {
    expect(applyFactors({ save_fraction: 0.91 }, { shot: 2, expected_goals: 2, block: 2, assignment: 2 })).toEqual({
      save_fraction: 0.91,
    });
  });
});

describe("adjust", () => {
  it("multiplies each metric by its factors", () => {
    const out = adjust(forward, opponent, DEFAULT_CONFIGURATION);
    const assignment = 1.12 * 1.15;
    expect(out.adjusted_rates.goals).toBeCloseTo((3.0 / 2.65) * assignment, 10);
    expect(out.adjusted_rates.shots).toBeCloseTo(4.0 * (34.1 / 31.0) * assignment, 10);
    expect(out.adjusted_rates.blocks).toBeCloseTo(0.5 * 1.05 * assignment, 10);
    expect(out.per_unit_rates).toEqual(forward.per_unit_rates);
  });
});

describe("team contexts", () => {
  it("normalizes teams and falls back to league averages", () => {
    const table = buildTeamContexts([
      {
        team: "Toronto Maple Leafs",
        shot_rate_allowed: 29.5,
        expected_goals_rate_allowed: null,
        shot_rate_for: 32.0,
        shot_attempt_rate_for: null,
        shot_attempt_rate_allowed: null,
        expected_goals_rate_for: null,
      },
    ]);
    const tor = table.get("TOR") ?? null;
    expect(tor?.shot_rate_allowed).toBe(29.5);
    expect(contextValue(tor, "shot_rate_for", DEFAULT_CONFIGURATION.league_averages)).toBe(32.0);
    expect(contextValue(tor, "expected_goals_rate_allowed", DEFAULT_CONFIGURATION.league_averages)).toBe(2.65);
    expect(contextValue(null, "shot_rate_for", DEFAULT_CONFIGURATION.league_averages)).toBe(31.0);
  });
});
