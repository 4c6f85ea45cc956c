import { readFile } from "node:fs/promises";
import path from "node:path";
import type { PipelineIssue, WindowLabel } from "@/lib/domain/types";
import { WINDOW_LABELS } from "@/lib/domain/types";
import { extract } from "@/lib/ingest/extract";
import { parseTableText, type RawTable } from "@/lib/ingest/parse";
import { extractSchedule } from "@/lib/ingest/schedule";
import type { StatSource } from "@/lib/projection/reconcile";
import type { ProjectionInputs } from "@/lib/projection/run";
import { createLogger } from "@/lib/log/logger";

const logger = createLogger("sources");

export type SlateFiles = {
  roster: string;
  schedule: string;
  lines: string;
  teams: string;
  skaters: (window: WindowLabel) => string;
  goalies: (window: WindowLabel) => string;
};

// file stems; each is tried as .csv then .html
export const SLATE_FILES: SlateFiles = {
  roster: "salaries",
  schedule: "schedule",
  lines: "lines",
  teams: "teams",
  skaters: (w) => `skaters_${w}`,
  goalies: (w) => `goalies_${w}`,
};

/** Every stem `loadSlate` looks for. */
export function slateStems(): string[] {
  const { roster, schedule, lines, teams, skaters, goalies } = SLATE_FILES;
  return [roster, schedule, lines, teams, ...WINDOW_LABELS.flatMap((w) => [skaters(w), goalies(w)])];
}

export type LoadedSlate = {
  inputs: ProjectionInputs;
  issues: PipelineIssue[];
};

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/** First of `<stem>.csv`, `<stem>.html` that exists, parsed; null when neither does or it cannot be read. */
export async function readTableFile(dir: string, stem: string): Promise<RawTable | null> {
  for (const format of ["csv", "html"] as const) {
    const file = path.join(dir, `${stem}.${format}`);
    try {
      const text = await readFile(file, "utf8");
      return parseTableText(text, format);
    } catch (err) {
      if (isMissingFile(err)) continue;
      logger.warn({ file, err }, "could not read source file");
      return null;
    }
  }
  return null;
}

/**
 * A day's slate from a directory laid out per SLATE_FILES. Every absent
 * file is a `missing_source` issue; the run goes on without it.
 */
export async function loadSlate(dir: string): Promise<LoadedSlate> {
  const issues: PipelineIssue[] = [];

  const rosterTable = await readTableFile(dir, SLATE_FILES.roster);
  const roster = extract(rosterTable, "salary_manifest", { source: SLATE_FILES.roster });
  issues.push(...roster.issues);

  const scheduleTable = await readTableFile(dir, SLATE_FILES.schedule);
  const schedule = extractSchedule(scheduleTable, SLATE_FILES.schedule);
  issues.push(...schedule.issues);

  const teamsTable = await readTableFile(dir, SLATE_FILES.teams);
  const teams = extract(teamsTable, "team_rates", { source: SLATE_FILES.teams });
  issues.push(...teams.issues);

  const linesTable = await readTableFile(dir, SLATE_FILES.lines);
  const lines = extract(linesTable, "line_assignment", { source: SLATE_FILES.lines });
  issues.push(...lines.issues);

  const stats: StatSource[] = [];
  for (const window of WINDOW_LABELS) {
    const skaterStem = SLATE_FILES.skaters(window);
    const skaterTable = await readTableFile(dir, skaterStem);
    // season is optional next to mid; only report what the blend cannot do without
    if (skaterTable) {
      const report = extract(skaterTable, "player_rates", { source: skaterStem });
      issues.push(...report.issues);
      stats.push({ kind: "player_rates", window, rows: report.rows, source: skaterStem });
    } else if (window !== "season") {
      issues.push({ kind: "missing_source", source: skaterStem, message: "no table" });
    }

    const goalieStem = SLATE_FILES.goalies(window);
    const goalieTable = await readTableFile(dir, goalieStem);
    if (goalieTable) {
      const report = extract(goalieTable, "goalie_rates", { source: goalieStem });
      issues.push(...report.issues);
      stats.push({ kind: "goalie_rates", window, rows: report.rows, source: goalieStem });
    } else if (window !== "season") {
      issues.push({ kind: "missing_source", source: goalieStem, message: "no table" });
    }
  }

  logger.info(
    {
      dir,
      roster: roster.rows.length,
      games: schedule.rows.length,
      teams: teams.rows.length,
      lines: lines.rows.length,
      statSources: stats.length,
      missing: issues.filter((i) => i.kind === "missing_source").length,
    },
    "loaded slate"
  );

  return {
    inputs: {
      roster: rosterTable ? roster.rows : null,
      stats,
      team_rates: teamsTable ? teams.rows : null,
      assignments: linesTable ? lines.rows : null,
      schedule: schedule.rows,
    },
    issues,
  };
}
