// Domain models shared by ingest, reconciliation and scoring

export type Role = "F" | "D" | "G";

export type SkaterMetric = "goals" | "assists" | "shots" | "blocks";
export type GoalieMetric = "save_fraction";
export type MetricName = SkaterMetric | GoalieMetric;

export const SKATER_METRICS: readonly SkaterMetric[] = ["goals", "assists", "shots", "blocks"];
export const GOALIE_METRICS: readonly GoalieMetric[] = ["save_fraction"];
export const METRIC_NAMES: readonly MetricName[] = [...SKATER_METRICS, ...GOALIE_METRICS];

export type WindowLabel = "recent" | "mid" | "season" | "priorSeason";
export const WINDOW_LABELS: readonly WindowLabel[] = ["recent", "mid", "season", "priorSeason"];

// null is "no data", never zero
export type Rate = number | null;
export type RateMap = Partial<Record<MetricName, Rate>>;

export const UNASSIGNED = "unassigned";

export type Entity = {
  canonical_id: string;
  display_name: string;
  team: string;
  role: Role;
  external_id: string | null;
  per_unit_rates: RateMap;
  salary: number | null;
  // null until a line source has been fetched, then UNASSIGNED at minimum
  assignment: string | null;
  pp_unit: string | null;
  opponent: string | null;
  rostered: boolean;
};

/** Entity after the fallback step: every rate its role projects is a finite number. */
export type BaselineEntity = Omit<Entity, "per_unit_rates"> & {
  per_unit_rates: Partial<Record<MetricName, number>>;
  fallback_metrics: MetricName[];
};

export type TeamContext = {
  team: string;
  shot_rate_allowed: Rate; // SA/60
  expected_goals_rate_allowed: Rate; // xGA/60
  shot_rate_for: Rate; // SF/60
  shot_attempt_rate_for: Rate; // CF/60
  shot_attempt_rate_allowed: Rate; // CA/60
  expected_goals_rate_for: Rate; // xGF/60
};

export type OpponentMap = ReadonlyMap<string, string>;

export type AdjustedEntity = BaselineEntity & {
  adjusted_rates: Partial<Record<MetricName, number>>;
  factors: ContextFactors;
};

export type ContextFactors = {
  shot: number;
  expected_goals: number;
  block: number;
  assignment: number;
};

export type SkaterProjection = {
  canonical_id: string;
  name: string;
  team: string;
  opponent: string | null;
  role: Role;
  assignment: string | null;
  pp_unit: string | null;
  salary: number | null;
  projected: Partial<Record<SkaterMetric, number>>;
  points: number;
  value_score: number | null;
  fallback_metrics: MetricName[];
  rostered: boolean;
};

export type GoalieProjection = {
  canonical_id: string;
  name: string;
  team: string;
  opponent: string | null;
  salary: number | null;
  save_fraction: number;
  opponent_shot_rate: number;
  projected_saves: number;
  projected_goals_against: number;
  points: number;
  value_score: number | null;
  fallback_metrics: MetricName[];
  rostered: boolean;
};

export type StackProjection = {
  team: string;
  assignment: string;
  members: string[];
  points: number;
  cost: number | null;
  value: number | null;
};

export type RankedProjection = {
  rank: number;
  canonical_id: string;
  name: string;
  team: string;
  role: Role;
  points: number;
};

// Recovered data-quality problems; none of these abort a run
export type PipelineIssue =
  | { kind: "missing_source"; source: string; message: string }
  | { kind: "unparseable_field"; source: string; row: number; field: string; raw: string }
  | { kind: "dropped_row"; source: string; row: number; message: string }
  | { kind: "unresolvable_entity"; source: string; canonical_id: string; name: string }
  | { kind: "missing_baseline"; canonical_id: string; name: string }
  | { kind: "no_scheduled_game"; canonical_id: string; team: string }
  | { kind: "entity_failed"; canonical_id: string; message: string };

export type IssueKind = PipelineIssue["kind"];
