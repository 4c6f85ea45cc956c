import type {
  Entity,
  MetricName,
  OpponentMap,
  PipelineIssue,
  Rate,
  RateMap,
  Role,
  WindowLabel,
} from "@/lib/domain/types";
import { GOALIE_METRICS, SKATER_METRICS, UNASSIGNED } from "@/lib/domain/types";
import {
  canonicalId,
  guessRole,
  normalizeAssignment,
  normalizeName,
  normalizePowerPlayUnit,
  normalizeTeam,
} from "@/lib/ingest/aliases";
import type { GoalieRateRow, LineAssignmentRow, PlayerRateRow, RosterRow } from "@/lib/ingest/schemas";
import { createLogger } from "@/lib/log/logger";
import { blendWindows, metricsForRole, type WindowValues } from "./blend";
import type { Configuration } from "./config";

const logger = createLogger("reconcile");

export type StatSource =
  | { kind: "player_rates"; window: WindowLabel; rows: readonly PlayerRateRow[]; source?: string }
  | { kind: "goalie_rates"; window: WindowLabel; rows: readonly GoalieRateRow[]; source?: string };

export type ReconcileInput = {
  // salary manifest; null or empty means a stats-only run
  roster: readonly RosterRow[] | null;
  stats: readonly StatSource[];
  // null when no line source was fetched
  assignments: readonly LineAssignmentRow[] | null;
  opponents: OpponentMap;
};

export type ReconcileResult = {
  entities: Entity[];
  // reconciled but without a game today
  excluded: Entity[];
  issues: PipelineIssue[];
};

type Seed = {
  canonical_id: string;
  display_name: string;
  team: string;
  role: Role;
  external_id: string | null;
  salary: number | null;
  rostered: boolean;
  matched: boolean;
  windows: Map<MetricName, WindowValues>;
  assignment: string | null;
  pp_unit: string | null;
};

type Identity = { name: string; team: string | null; external_id: string | null };

class EntityIndex {
  private readonly byId = new Map<string, Seed>();
  private readonly byExternal = new Map<string, Seed>();
  private readonly byName = new Map<string, Seed[]>();
  readonly seeds: Seed[] = [];

  add(seed: Seed): void {
    this.byId.set(seed.canonical_id, seed);
    if (seed.external_id) this.byExternal.set(seed.external_id, seed);
    const key = normalizeName(seed.display_name);
    this.byName.set(key, [...(this.byName.get(key) ?? []), seed]);
    this.seeds.push(seed);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /**
   * External id when both sides carry one, then name+team. A row with no
   * team takes the team-less entity an earlier row created, else a unique
   * name.
   */
  match(row: Identity): Seed | undefined {
    if (row.external_id) {
      const hit = this.byExternal.get(row.external_id);
      if (hit) return hit;
    }
    const team = normalizeTeam(row.team);
    if (!team) {
      const teamless = canonicalId(row.name, "");
      const prior = teamless ? this.byId.get(teamless) : undefined;
      if (prior) return prior;
      const same = this.byName.get(normalizeName(row.name)) ?? [];
      return same.length === 1 ? same[0] : undefined;
    }
    const id = canonicalId(row.name, team);
    return id ? this.byId.get(id) : undefined;
  }

  linkExternal(seed: Seed, external_id: string | null): void {
    if (!external_id || seed.external_id) return;
    seed.external_id = external_id;
    if (!this.byExternal.has(external_id)) this.byExternal.set(external_id, seed);
  }
}

function newSeed(id: string, name: string, team: string, role: Role, rostered: boolean): Seed {
  return {
    canonical_id: id,
    display_name: name,
    team,
    role,
    external_id: null,
    salary: null,
    rostered,
    matched: false,
    windows: new Map(),
    assignment: null,
    pp_unit: null,
  };
}

function recordWindow(seed: Seed, metric: MetricName, window: WindowLabel, value: Rate): void {
  const windows = seed.windows.get(metric) ?? {};
  const cur = windows[window];
  if (cur === undefined || cur === null) windows[window] = value;
  seed.windows.set(metric, windows);
}

function statValues(source: StatSource, idx: number): { metrics: readonly MetricName[]; value: (m: MetricName) => Rate; role: Role } {
  if (source.kind === "goalie_rates") {
    const row = source.rows[idx];
    return { metrics: GOALIE_METRICS, value: () => row.save_fraction, role: "G" };
  }
  const row = source.rows[idx];
  return {
    metrics: SKATER_METRICS,
    value: (m) => (m === "save_fraction" ? null : row[m]),
    role: row.position ? guessRole(row.position) : "F",
  };
}

/**
 * One entity per player across the roster, every windowed stat source and
 * the line source. Unmatched stat rows become standalone entities; entities
 * whose team has no game today move to `excluded`.
 */
export function reconcile(input: ReconcileInput, config: Configuration): ReconcileResult {
  const issues: PipelineIssue[] = [];
  const index = new EntityIndex();
  const primary = input.roster && input.roster.length > 0 ? input.roster : null;

  if (primary) {
    for (const row of primary) {
      const team = normalizeTeam(row.team);
      const id = canonicalId(row.name, team);
      if (!id || index.has(id)) continue;
      const seed = newSeed(id, row.name, team, guessRole(row.position), true);
      seed.salary = row.salary !== null && Number.isFinite(row.salary) ? row.salary : null;
      index.add(seed);
      index.linkExternal(seed, row.external_id);
    }
  }

  for (const source of input.stats) {
    const label = source.source ?? `${source.kind}:${source.window}`;
    const rows: readonly (PlayerRateRow | GoalieRateRow)[] = source.rows;
    rows.forEach((row, idx) => {
      let seed = index.match(row);
      const { metrics, value, role } = statValues(source, idx);
      if (!seed) {
        const team = normalizeTeam(row.team);
        const id = canonicalId(row.name, team);
        if (!id) return;
        seed = newSeed(id, row.name, team, role, false);
        index.add(seed);
        if (primary) {
          issues.push({ kind: "unresolvable_entity", source: label, canonical_id: id, name: row.name });
          logger.debug({ source: label, canonical_id: id }, "stat row matched no roster entry; kept standalone");
        }
      }
      seed.matched = true;
      index.linkExternal(seed, row.external_id);
      for (const metric of metrics) recordWindow(seed, metric, source.window, value(metric));
    });
  }

  if (input.assignments) {
    for (const seed of index.seeds) seed.assignment = UNASSIGNED;
    for (const row of input.assignments) {
      const seed = index.match(row);
      if (!seed) continue;
      seed.assignment = normalizeAssignment(row.assignment, seed.role);
      seed.pp_unit = normalizePowerPlayUnit(row.pp_unit);
    }
  }

  const entities: Entity[] = [];
  const excluded: Entity[] = [];
  for (const seed of index.seeds) {
    if (!seed.matched) {
      issues.push({ kind: "missing_baseline", canonical_id: seed.canonical_id, name: seed.display_name });
    }
    const per_unit_rates: RateMap = {};
    for (const metric of metricsForRole(seed.role, config)) {
      const windows = seed.windows.get(metric);
      per_unit_rates[metric] = windows ? blendWindows(windows, config.blend_weights) : null;
    }
    const opponent = input.opponents.get(seed.team) ?? null;
    const entity: Entity = {
      canonical_id: seed.canonical_id,
      display_name: seed.display_name,
      team: seed.team,
      role: seed.role,
      external_id: seed.external_id,
      per_unit_rates,
      salary: seed.salary,
      assignment: seed.assignment,
      pp_unit: seed.pp_unit,
      opponent,
      rostered: seed.rostered,
    };
    if (opponent === null) {
      issues.push({ kind: "no_scheduled_game", canonical_id: seed.canonical_id, team: seed.team });
      excluded.push(entity);
      continue;
    }
    entities.push(entity);
  }

  logger.info(
    {
      entities: entities.length,
      excluded: excluded.length,
      standalone: index.seeds.filter((s) => !s.rostered).length,
      statsOnly: primary === null,
    },
    "reconciled entities"
  );
  return { entities, excluded, issues };
}
