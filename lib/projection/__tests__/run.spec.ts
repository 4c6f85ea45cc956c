import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@/lib/errors";
import { DEFAULT_CONFIGURATION, resolveConfiguration } from "@/lib/projection/config";
import { runProjections, type ProjectionInputs } from "@/lib/projection/run";

const montreal = {
  team: "MTL",
  shot_rate_allowed: null,
  expected_goals_rate_allowed: 3.0,
  shot_rate_for: 33.0,
  shot_attempt_rate_for: null,
  shot_attempt_rate_allowed: null,
  expected_goals_rate_for: null,
};

const inputs: ProjectionInputs = {
  roster: [
    { name: "Mitch Marner", team: "TOR", position: "RW", external_id: null, salary: 8000 },
    { name: "Joseph Woll", team: "TOR", position: "G", external_id: null, salary: 7600 },
    { name: "Brad Marchand", team: "BOS", position: "LW", external_id: null, salary: 6000 },
  ],
  stats: [
    {
      kind: "player_rates",
      window: "recent",
      rows: [{ name: "Mitch Marner", team: "TOR", position: "RW", external_id: null, goals: 1.0, assists: null, shots: null, blocks: null }],
    },
    { kind: "goalie_rates", window: "recent", rows: [{ name: "Joseph Woll", team: "TOR", external_id: null, save_fraction: 0.91 }] },
  ],
  team_rates: [montreal],
  assignments: [{ name: "Mitch Marner", team: "TOR", external_id: null, assignment: "top line", pp_unit: null }],
  schedule: [{ home: "TOR", away: "MTL" }],
};

describe("runProjections", () => {
  it("projects a forward against the opponent's expected goals allowed", () => {
    const config = resolveConfiguration({ projected_metrics: ["goals"] });
    const run = runProjections(inputs, config);
    expect(run.skaters).toHaveLength(1);
    const [marner] = run.skaters;
    expect(marner.opponent).toBe("MTL");
    expect(marner.projected.goals).toBeCloseTo(1.2679, 4);
    expect(marner.points).toBeCloseTo(10.777, 3);
    expect(marner.value_score).toBeCloseTo(1.347, 3);
    expect(marner.fallback_metrics).toEqual([]);
  });

  it("projects goalies from the opponent shots-for rate", () => {
    const run = runProjections(inputs);
    expect(run.goalies).toHaveLength(1);
    const [woll] = run.goalies;
    expect(woll.opponent_shot_rate).toBe(33.0);
    expect(woll.projected_saves).toBeCloseTo(33 * 0.91, 10);
    expect(woll.points).toBeCloseTo(33 * 0.91 * 0.7 + 33 * 0.09 * -3.5, 10);
  });

  it("fills missing skater rates from the role fallback", () => {
    const run = runProjections(inputs);
    expect(run.skaters[0].fallback_metrics).toEqual(["assists", "shots", "blocks"]);
  });

  it("excludes players without a game and records why", () => {
    const run = runProjections(inputs);
    expect(run.excluded.map((e) => e.canonical_id)).toEqual(["BRAD MARCHAND_BOS"]);
    expect(run.summary.excluded).toBe(1);
    expect(run.summary.issues.no_scheduled_game).toBe(1);
    expect(run.summary.issues.missing_baseline).toBe(1);
  });

  it("groups skaters into stacks and ranks them", () => {
    const run = runProjections(inputs);
    expect(run.stacks).toHaveLength(1);
    expect(run.stacks[0]).toMatchObject({ team: "TOR", assignment: "top line", members: ["MITCH MARNER_TOR"], cost: 8000 });
    expect(run.rankings).toEqual([
      { rank: 1, canonical_id: "MITCH MARNER_TOR", name: "Mitch Marner", team: "TOR", role: "F", points: run.skaters[0].points },
    ]);
    expect(run.teams.map((t) => t.team)).toEqual(["MTL"]);
  });

  it("fails fast on an invalid configuration", () => {
    const { goals: _goals, ...scoring } = DEFAULT_CONFIGURATION.scoring;
    expect(() => runProjections(inputs, { ...DEFAULT_CONFIGURATION, scoring })).toThrow(ConfigurationError);
  });
});
