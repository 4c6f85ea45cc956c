import type {
  AdjustedEntity,
  BaselineEntity,
  ContextFactors,
  MetricName,
  Rate,
  TeamContext,
} from "@/lib/domain/types";
import { METRIC_NAMES } from "@/lib/domain/types";
import { normalizeAssignment, normalizeTeam } from "@/lib/ingest/aliases";
import type { TeamRateRow } from "@/lib/ingest/schemas";
import type { Configuration, LeagueAverages } from "./config";

export type TeamContextTable = ReadonlyMap<string, TeamContext>;

// which factors scale which metric; save fraction is never context-adjusted
export const METRIC_FACTORS: Record<MetricName, readonly (keyof ContextFactors)[]> = {
  goals: ["expected_goals", "assignment"],
  assists: ["expected_goals", "assignment"],
  shots: ["shot", "assignment"],
  blocks: ["block", "assignment"],
  save_fraction: [],
};

export function buildTeamContexts(rows: readonly TeamRateRow[]): TeamContextTable {
  const out = new Map<string, TeamContext>();
  for (const r of rows) {
    const team = normalizeTeam(r.team);
    if (!team || out.has(team)) continue;
    out.set(team, {
      team,
      shot_rate_allowed: r.shot_rate_allowed,
      expected_goals_rate_allowed: r.expected_goals_rate_allowed,
      shot_rate_for: r.shot_rate_for,
      shot_attempt_rate_for: r.shot_attempt_rate_for,
      shot_attempt_rate_allowed: r.shot_attempt_rate_allowed,
      expected_goals_rate_for: r.expected_goals_rate_for,
    });
  }
  return out;
}

/** Field value, or the league average when the team or the field is missing. */
export function contextValue(
  ctx: TeamContext | null | undefined,
  field: keyof LeagueAverages,
  league: LeagueAverages
): number {
  const v = ctx?.[field];
  return typeof v === "number" && Number.isFinite(v) ? v : league[field];
}

function ratio(v: Rate | undefined, average: number): number {
  if (typeof v !== "number" || !Number.isFinite(v) || !(average > 0)) return 1;
  return v / average;
}

export function assignmentMultiplier(label: string | null, table: Readonly<Record<string, number>>): number {
  if (!label) return 1;
  const m = table[normalizeAssignment(label)] ?? table[label];
  return typeof m === "number" && Number.isFinite(m) ? m : 1;
}

export function computeFactors(
  entity: Pick<BaselineEntity, "assignment" | "pp_unit">,
  opponent: TeamContext | null,
  config: Configuration
): ContextFactors {
  const league = config.league_averages;
  const attempts = opponent?.shot_attempt_rate_for;
  const block =
    typeof attempts === "number" && Number.isFinite(attempts)
      ? 1 + config.block_shrink * (attempts / league.shot_attempt_rate_for - 1)
      : 1;
  return {
    shot: ratio(opponent?.shot_rate_allowed, league.shot_rate_allowed),
    expected_goals: ratio(opponent?.expected_goals_rate_allowed, league.expected_goals_rate_allowed),
    block,
    assignment:
      assignmentMultiplier(entity.assignment, config.assignment_multipliers) *
      assignmentMultiplier(entity.pp_unit, config.assignment_multipliers),
  };
}

/**
 * Scales each rate by the product of the factors that apply to its metric.
 * Factors left out of `factors` count as 1, so partial applications compose
 * in any order.
 */
export function applyFactors(
  rates: Readonly<Partial<Record<MetricName, number>>>,
  factors: Partial<ContextFactors>
): Partial<Record<MetricName, number>> {
  const out: Partial<Record<MetricName, number>> = {};
  for (const metric of METRIC_NAMES) {
    const value = rates[metric];
    if (value === undefined) continue;
    let v = value;
    for (const f of METRIC_FACTORS[metric]) v *= factors[f] ?? 1;
    out[metric] = v;
  }
  return out;
}

export function adjust(entity: BaselineEntity, opponent: TeamContext | null, config: Configuration): AdjustedEntity {
  const factors = computeFactors(entity, opponent, config);
  return { ...entity, adjusted_rates: applyFactors(entity.per_unit_rates, factors), factors };
}
