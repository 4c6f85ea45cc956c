import type {
  AdjustedEntity,
  GoalieProjection,
  RankedProjection,
  Role,
  SkaterMetric,
  SkaterProjection,
  StackProjection,
  TeamContext,
} from "@/lib/domain/types";
import { UNASSIGNED } from "@/lib/domain/types";
import { contextValue } from "./adjust";
import type { Configuration } from "./config";

/** Points per $1,000 of salary; null for a missing or non-positive salary. */
export function valueScore(points: number, salary: number | null): number | null {
  if (salary === null || !Number.isFinite(salary) || salary <= 0 || !Number.isFinite(points)) return null;
  return points / (salary / 1000);
}

export function scoreSkater(entity: AdjustedEntity, config: Configuration): SkaterProjection {
  const projected: Partial<Record<SkaterMetric, number>> = {};
  let points = 0;
  for (const metric of config.projected_metrics) {
    const rate = entity.adjusted_rates[metric];
    if (rate === undefined) continue;
    projected[metric] = rate;
    points += rate * config.scoring[metric];
  }
  return {
    canonical_id: entity.canonical_id,
    name: entity.display_name,
    team: entity.team,
    opponent: entity.opponent,
    role: entity.role,
    assignment: entity.assignment,
    pp_unit: entity.pp_unit,
    salary: entity.salary,
    projected,
    points,
    value_score: valueScore(points, entity.salary),
    fallback_metrics: entity.fallback_metrics,
    rostered: entity.rostered,
  };
}

export type GoalieLine = {
  projected_saves: number;
  projected_goals_against: number;
  points: number;
};

export function projectGoalieLine(
  saveFraction: number,
  opponentShotRate: number,
  weights: { saves: number; goals_against: number }
): GoalieLine {
  const projected_saves = opponentShotRate * saveFraction;
  const projected_goals_against = opponentShotRate * (1 - saveFraction);
  return {
    projected_saves,
    projected_goals_against,
    points: projected_saves * weights.saves + projected_goals_against * weights.goals_against,
  };
}

/** Shots faced are the opponent's shots-for rate, or the league average without one. */
export function scoreGoalie(
  entity: AdjustedEntity,
  opponent: TeamContext | null,
  config: Configuration
): GoalieProjection {
  const save_fraction = entity.adjusted_rates.save_fraction ?? config.fallback_rates.G.save_fraction;
  const opponent_shot_rate = contextValue(opponent, "shot_rate_for", config.league_averages);
  const line = projectGoalieLine(save_fraction, opponent_shot_rate, {
    saves: config.scoring.saves,
    goals_against: config.scoring.goals_against,
  });
  return {
    canonical_id: entity.canonical_id,
    name: entity.display_name,
    team: entity.team,
    opponent: entity.opponent,
    salary: entity.salary,
    save_fraction,
    opponent_shot_rate,
    ...line,
    value_score: valueScore(line.points, entity.salary),
    fallback_metrics: entity.fallback_metrics,
    rostered: entity.rostered,
  };
}

type StackMember = Pick<SkaterProjection, "canonical_id" | "team" | "assignment" | "points" | "salary">;

/**
 * Skaters grouped by (team, assignment). Cost sums the salaries members
 * carry and is null when none does.
 */
export function buildStacks(projections: readonly StackMember[]): StackProjection[] {
  const groups = new Map<string, StackProjection>();
  for (const p of projections) {
    const assignment = p.assignment ?? UNASSIGNED;
    const key = `${p.team}|${assignment}`;
    const g = groups.get(key) ?? { team: p.team, assignment, members: [], points: 0, cost: null, value: null };
    const salary = p.salary !== null && Number.isFinite(p.salary) ? p.salary : null;
    groups.set(key, {
      ...g,
      members: [...g.members, p.canonical_id],
      points: g.points + p.points,
      cost: salary === null ? g.cost : (g.cost ?? 0) + salary,
    });
  }
  return Array.from(groups.values())
    .map((g) => ({ ...g, value: g.cost !== null && g.cost > 0 ? g.points / (g.cost / 1000) : null }))
    .sort(
      (a, b) => b.points - a.points || a.team.localeCompare(b.team) || a.assignment.localeCompare(b.assignment)
    );
}

type Rankable = { canonical_id: string; name: string; team: string; role: Role; points: number };

/** Points descending; ties share the best rank ("1, 2, 2, 4"). */
export function rankProjections(projections: readonly Rankable[]): RankedProjection[] {
  const sorted = [...projections].sort((a, b) => b.points - a.points || a.name.localeCompare(b.name));
  const out: RankedProjection[] = [];
  sorted.forEach((p, i) => {
    const prev = out[i - 1];
    const rank = prev && prev.points === p.points ? prev.rank : i + 1;
    out.push({ rank, canonical_id: p.canonical_id, name: p.name, team: p.team, role: p.role, points: p.points });
  });
  return out;
}
