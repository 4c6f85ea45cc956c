import type { OpponentMap, PipelineIssue } from "@/lib/domain/types";
import { normalizeTeam } from "./aliases";
import type { ParseReport, RawTable } from "./parse";
import { normalizeHeader } from "./extract";
import { SCHEDULE_ALIASES, ScheduleRowSchema, type ScheduleRow } from "./schemas";

export type ScheduleReport = ParseReport<ScheduleRow> & { issues: PipelineIssue[] };

export function extractSchedule(table: RawTable | null, source = "schedule"): ScheduleReport {
  if (!table) {
    return {
      rows: [],
      errors: [],
      rowCount: 0,
      droppedRows: 0,
      unknownColumns: [],
      issues: [{ kind: "missing_source", source, message: "no table" }],
    };
  }

  const unknown = table.headers.filter((h) => !(normalizeHeader(h) in SCHEDULE_ALIASES));
  const rows: ScheduleRow[] = [];
  const errors: { row: number; message: string }[] = [];
  const issues: PipelineIssue[] = [];

  table.rows.forEach((raw, idx) => {
    const mapped: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(raw)) {
      const target = SCHEDULE_ALIASES[normalizeHeader(key)];
      if (target && mapped[target] === undefined) mapped[target] = val;
    }
    const parsed = ScheduleRowSchema.safeParse(mapped);
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      errors.push({ row: idx + 1, message });
      issues.push({ kind: "dropped_row", source, row: idx + 1, message });
      return;
    }
    rows.push({ home: normalizeTeam(parsed.data.home), away: normalizeTeam(parsed.data.away) });
  });

  return { rows, errors, rowCount: table.rows.length, droppedRows: errors.length, unknownColumns: unknown, issues };
}

/** Both directions of every game. Teams without a game are simply absent. */
export function buildOpponentMap(games: readonly ScheduleRow[]): OpponentMap {
  const opp = new Map<string, string>();
  for (const g of games) {
    const home = normalizeTeam(g.home);
    const away = normalizeTeam(g.away);
    if (!home || !away) continue;
    opp.set(home, away);
    opp.set(away, home);
  }
  return opp;
}
