import type {
  Entity,
  GoalieProjection,
  IssueKind,
  PipelineIssue,
  RankedProjection,
  SkaterProjection,
  StackProjection,
  TeamContext,
} from "@/lib/domain/types";
import { normalizeTeam } from "@/lib/ingest/aliases";
import { buildOpponentMap } from "@/lib/ingest/schedule";
import type { LineAssignmentRow, RosterRow, ScheduleRow, TeamRateRow } from "@/lib/ingest/schemas";
import { createLogger } from "@/lib/log/logger";
import { adjust, buildTeamContexts } from "./adjust";
import { withFallbackRates } from "./blend";
import { assertConfiguration, DEFAULT_CONFIGURATION, type Configuration } from "./config";
import { reconcile, type StatSource } from "./reconcile";
import { buildStacks, rankProjections, scoreGoalie, scoreSkater } from "./score";

const logger = createLogger("projection");

export type ProjectionInputs = {
  roster: readonly RosterRow[] | null;
  stats: readonly StatSource[];
  team_rates: readonly TeamRateRow[] | null;
  assignments: readonly LineAssignmentRow[] | null;
  schedule: readonly ScheduleRow[];
};

export type ProjectionSummary = {
  skaters: number;
  goalies: number;
  stacks: number;
  excluded: number;
  issues: Partial<Record<IssueKind, number>>;
};

export type ProjectionRun = {
  skaters: SkaterProjection[];
  goalies: GoalieProjection[];
  stacks: StackProjection[];
  rankings: RankedProjection[];
  teams: TeamContext[];
  excluded: Entity[];
  issues: PipelineIssue[];
  summary: ProjectionSummary;
};

function countIssues(issues: readonly PipelineIssue[]): ProjectionSummary["issues"] {
  const out: ProjectionSummary["issues"] = {};
  for (const i of issues) out[i.kind] = (out[i.kind] ?? 0) + 1;
  return out;
}

/**
 * The whole day in one pass: reconcile, fall back, adjust, score, group.
 * Configuration problems throw before any entity is touched; a failure on
 * one entity is recorded as `entity_failed` and the rest carry on.
 */
export function runProjections(
  inputs: ProjectionInputs,
  config: Configuration = DEFAULT_CONFIGURATION
): ProjectionRun {
  assertConfiguration(config);

  const opponents = buildOpponentMap(inputs.schedule);
  const contexts = buildTeamContexts(inputs.team_rates ?? []);
  const { entities, excluded, issues } = reconcile(
    { roster: inputs.roster, stats: inputs.stats, assignments: inputs.assignments, opponents },
    config
  );

  const skaters: SkaterProjection[] = [];
  const goalies: GoalieProjection[] = [];
  for (const entity of entities) {
    try {
      const opponent = entity.opponent ? contexts.get(normalizeTeam(entity.opponent)) ?? null : null;
      const adjusted = adjust(withFallbackRates(entity, config), opponent, config);
      if (entity.role === "G") goalies.push(scoreGoalie(adjusted, opponent, config));
      else skaters.push(scoreSkater(adjusted, config));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ canonical_id: entity.canonical_id, err }, "entity projection failed; skipped");
      issues.push({ kind: "entity_failed", canonical_id: entity.canonical_id, message });
    }
  }

  skaters.sort((a, b) => b.points - a.points);
  goalies.sort((a, b) => b.points - a.points);
  const stacks = buildStacks(skaters);
  const rankings = rankProjections(skaters);

  const summary: ProjectionSummary = {
    skaters: skaters.length,
    goalies: goalies.length,
    stacks: stacks.length,
    excluded: excluded.length,
    issues: countIssues(issues),
  };
  logger.info(summary, "projection run complete");

  return {
    skaters,
    goalies,
    stacks,
    rankings,
    teams: Array.from(contexts.values()),
    excluded,
    issues,
    summary,
  };
}
