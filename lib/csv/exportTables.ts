import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { GoalieProjection, RankedProjection, SkaterProjection, StackProjection, TeamContext } from "@/lib/domain/types";
import { createLogger } from "@/lib/log/logger";

const logger = createLogger("export");

export type CsvColumn<T> = {
  header: string;
  value: (row: T) => unknown;
};

/**
 * Formats a value for CSV export
 */
export function formatCSVValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number") return Number.isFinite(value) ? String(Math.round(value * 10000) / 10000) : "";
  if (typeof value === "boolean") return value ? "true" : "false";
  if (Array.isArray(value)) return value.join("; ");
  return String(value);
}

/**
 * Escapes a field value for CSV format
 */
export function escapeCSVField(value: string): string {
  if (!value) return "";
  // If the value contains comma, quote, or a line break, wrap in quotes and escape quotes
  if (value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv<T>(rows: readonly T[], columns: readonly CsvColumn<T>[]): string {
  const lines = [columns.map((c) => escapeCSVField(c.header)).join(",")];
  for (const row of rows) {
    lines.push(columns.map((c) => escapeCSVField(formatCSVValue(c.value(row)))).join(","));
  }
  return lines.join("\n") + "\n";
}

// ===== TABLE LAYOUTS =====

export const SKATER_COLUMNS: CsvColumn<SkaterProjection>[] = [
  { header: "name", value: (r) => r.name },
  { header: "team", value: (r) => r.team },
  { header: "opponent", value: (r) => r.opponent },
  { header: "role", value: (r) => r.role },
  { header: "assignment", value: (r) => r.assignment },
  { header: "pp_unit", value: (r) => r.pp_unit },
  { header: "salary", value: (r) => r.salary },
  { header: "goals", value: (r) => r.projected.goals },
  { header: "assists", value: (r) => r.projected.assists },
  { header: "shots", value: (r) => r.projected.shots },
  { header: "blocks", value: (r) => r.projected.blocks },
  { header: "points", value: (r) => r.points },
  { header: "value", value: (r) => r.value_score },
  { header: "fallback", value: (r) => r.fallback_metrics },
  { header: "rostered", value: (r) => r.rostered },
  { header: "canonical_id", value: (r) => r.canonical_id },
];

export const GOALIE_COLUMNS: CsvColumn<GoalieProjection>[] = [
  { header: "name", value: (r) => r.name },
  { header: "team", value: (r) => r.team },
  { header: "opponent", value: (r) => r.opponent },
  { header: "salary", value: (r) => r.salary },
  { header: "save_fraction", value: (r) => r.save_fraction },
  { header: "opponent_shot_rate", value: (r) => r.opponent_shot_rate },
  { header: "saves", value: (r) => r.projected_saves },
  { header: "goals_against", value: (r) => r.projected_goals_against },
  { header: "points", value: (r) => r.points },
  { header: "value", value: (r) => r.value_score },
  { header: "fallback", value: (r) => r.fallback_metrics },
  { header: "rostered", value: (r) => r.rostered },
  { header: "canonical_id", value: (r) => r.canonical_id },
];

export const STACK_COLUMNS: CsvColumn<StackProjection>[] = [
  { header: "team", value: (r) => r.team },
  { header: "assignment", value: (r) => r.assignment },
  { header: "members", value: (r) => r.members },
  { header: "points", value: (r) => r.points },
  { header: "cost", value: (r) => r.cost },
  { header: "value", value: (r) => r.value },
];

export const RANKING_COLUMNS: CsvColumn<RankedProjection>[] = [
  { header: "rank", value: (r) => r.rank },
  { header: "name", value: (r) => r.name },
  { header: "team", value: (r) => r.team },
  { header: "role", value: (r) => r.role },
  { header: "points", value: (r) => r.points },
];

export const TEAM_COLUMNS: CsvColumn<TeamContext>[] = [
  { header: "team", value: (r) => r.team },
  { header: "sf60", value: (r) => r.shot_rate_for },
  { header: "sa60", value: (r) => r.shot_rate_allowed },
  { header: "cf60", value: (r) => r.shot_attempt_rate_for },
  { header: "ca60", value: (r) => r.shot_attempt_rate_allowed },
  { header: "xgf60", value: (r) => r.expected_goals_rate_for },
  { header: "xga60", value: (r) => r.expected_goals_rate_allowed },
];

export type OutputTables = {
  skaters: readonly SkaterProjection[];
  goalies: readonly GoalieProjection[];
  stacks: readonly StackProjection[];
  rankings: readonly RankedProjection[];
  teams: readonly TeamContext[];
};

/** Writes `<dir>/<name>.csv` per table and returns the paths written. */
export async function writeTables(dir: string, tables: OutputTables): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const files: [string, string][] = [
    ["skaters", toCsv(tables.skaters, SKATER_COLUMNS)],
    ["goalies", toCsv(tables.goalies, GOALIE_COLUMNS)],
    ["stacks", toCsv(tables.stacks, STACK_COLUMNS)],
    ["rankings", toCsv(tables.rankings, RANKING_COLUMNS)],
    ["teams", toCsv(tables.teams, TEAM_COLUMNS)],
  ];
  const written: string[] = [];
  for (const [name, csv] of files) {
    const file = path.join(dir, `${name}.csv`);
    await writeFile(file, csv, "utf8");
    written.push(file);
  }
  logger.info({ dir, files: written.length }, "wrote output tables");
  return written;
}
