import { z } from "zod";

export type SourceKind =
  | "team_rates"
  | "player_rates"
  | "goalie_rates"
  | "line_assignment"
  | "salary_manifest";

// ================= CELL HELPERS =================

const ENTITIES: Record<string, string> = {
  "&nbsp;": " ",
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&apos;": "'",
};

/** Reduces a cell that may carry markup to its visible text. */
export function cellText(v: unknown): string {
  if (v === null || v === undefined) return "";
  return String(v)
    .replace(/<[^>]*>/g, " ")
    .replace(/&[a-z#0-9]+;/gi, (m) => ENTITIES[m.toLowerCase()] ?? " ")
    .replace(/\s+/g, " ")
    .trim();
}

const BLANK_CELLS = new Set(["", "-", "--", "na", "n/a", "null", "nan"]);

/** Placeholder cells that mean "no value" rather than a bad value. */
export function isBlankCell(v: unknown): boolean {
  if (typeof v === "number") return Number.isNaN(v);
  return BLANK_CELLS.has(cellText(v).toLowerCase());
}

/**
 * Lenient numeric coercion: thousands separators, a trailing "%", unicode
 * minus and markup are tolerated. Anything else is null.
 */
export function parseNumeric(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (isBlankCell(v)) return null;
  const s = cellText(v)
    .replace(/[\u2212\u2013]/g, "-")
    .replace(/,/g, "")
    .replace(/%$/, "")
    .trim();
  if (!/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

const toStr = z
  .unknown()
  .transform((v) => cellText(v))
  .pipe(z.string().min(1));

const toOptStr = z
  .unknown()
  .transform((v) => {
    const s = cellText(v);
    return s === "" ? null : s;
  });

const toOptNum = z.unknown().transform(parseNumeric);

// SV% arrives as 0.905, 90.5 or "90.5%"
const toOptFraction = z.unknown().transform((v) => {
  const n = parseNumeric(v);
  if (n === null) return null;
  return n > 1 ? n / 100 : n;
});

// ================= ROW SCHEMAS =================

export const TeamRateRowSchema = z.object({
  team: toStr,
  shot_rate_allowed: toOptNum,
  expected_goals_rate_allowed: toOptNum,
  shot_rate_for: toOptNum,
  shot_attempt_rate_for: toOptNum,
  shot_attempt_rate_allowed: toOptNum,
  expected_goals_rate_for: toOptNum,
});

export type TeamRateRow = z.infer<typeof TeamRateRowSchema>;

export const PlayerRateRowSchema = z.object({
  name: toStr,
  team: toOptStr,
  position: toOptStr,
  external_id: toOptStr,
  goals: toOptNum,
  assists: toOptNum,
  shots: toOptNum,
  blocks: toOptNum,
});

export type PlayerRateRow = z.infer<typeof PlayerRateRowSchema>;

export const GoalieRateRowSchema = z.object({
  name: toStr,
  team: toOptStr,
  external_id: toOptStr,
  save_fraction: toOptFraction,
});

export type GoalieRateRow = z.infer<typeof GoalieRateRowSchema>;

export const LineAssignmentRowSchema = z.object({
  name: toStr,
  team: toOptStr,
  external_id: toOptStr,
  assignment: toOptStr,
  pp_unit: toOptStr,
});

export type LineAssignmentRow = z.infer<typeof LineAssignmentRowSchema>;

export const RosterRowSchema = z.object({
  name: toStr,
  team: toOptStr,
  position: toOptStr,
  external_id: toOptStr,
  salary: toOptNum,
});

export type RosterRow = z.infer<typeof RosterRowSchema>;

export type SourceRowMap = {
  team_rates: TeamRateRow;
  player_rates: PlayerRateRow;
  goalie_rates: GoalieRateRow;
  line_assignment: LineAssignmentRow;
  salary_manifest: RosterRow;
};

// ================= FIELD ALIASES =================

export type FieldSpec<F extends string> = {
  field: F;
  // exact header matches, compared case-insensitively
  aliases: readonly string[];
  // substring fallbacks, tried only after every exact alias has been claimed
  contains?: readonly string[];
  numeric?: boolean;
};

export type SourceSpec<K extends SourceKind> = {
  kind: K;
  schema: z.ZodType<SourceRowMap[K], z.ZodTypeDef, unknown>;
  fields: readonly FieldSpec<keyof SourceRowMap[K] & string>[];
  // rows missing this field are dropped
  identity: keyof SourceRowMap[K] & string;
};

const NAME_FIELD = {
  field: "name",
  aliases: ["player", "name", "player name", "playername", "goalie", "skater"],
  contains: ["player", "name"],
} as const;

const TEAM_FIELD = {
  field: "team",
  aliases: ["team", "tm", "teamabbrev", "team abbrev", "team_abbr", "abbr"],
  contains: ["team"],
} as const;

const ID_FIELD = {
  field: "external_id",
  aliases: ["id", "player id", "playerid", "player_id", "nhl id", "dk id"],
} as const;

export const SOURCE_SPECS: { [K in SourceKind]: SourceSpec<K> } = {
  team_rates: {
    kind: "team_rates",
    schema: TeamRateRowSchema,
    identity: "team",
    fields: [
      { ...TEAM_FIELD, aliases: [...TEAM_FIELD.aliases, "team name"] },
      { field: "shot_rate_allowed", aliases: ["sa/60", "sa60", "shots against per 60"], contains: ["shots against"], numeric: true },
      {
        field: "expected_goals_rate_allowed",
        aliases: ["xga/60", "xga60", "xga per 60"],
        contains: ["xga", "expected goals against"],
        numeric: true,
      },
      { field: "shot_rate_for", aliases: ["sf/60", "sf60", "shots for per 60"], contains: ["shots for"], numeric: true },
      { field: "shot_attempt_rate_for", aliases: ["cf/60", "cf60", "corsi for per 60"], contains: ["corsi for"], numeric: true },
      {
        field: "shot_attempt_rate_allowed",
        aliases: ["ca/60", "ca60", "corsi against per 60"],
        contains: ["corsi against"],
        numeric: true,
      },
      {
        field: "expected_goals_rate_for",
        aliases: ["xgf/60", "xgf60", "xgf per 60"],
        contains: ["xgf", "expected goals for"],
        numeric: true,
      },
    ],
  },
  player_rates: {
    kind: "player_rates",
    schema: PlayerRateRowSchema,
    identity: "name",
    fields: [
      NAME_FIELD,
      TEAM_FIELD,
      ID_FIELD,
      { field: "position", aliases: ["position", "pos"], contains: ["position"] },
      { field: "goals", aliases: ["g/60", "g60", "goals/60", "goals per 60"], contains: ["goals per", "goals/"], numeric: true },
      { field: "assists", aliases: ["a/60", "a60", "assists/60", "total assists/60", "assists per 60"], contains: ["assist"], numeric: true },
      { field: "shots", aliases: ["s/60", "sog/60", "shots/60", "s60", "sog60", "shots per 60"], contains: ["shots/", "shots per", "sog"], numeric: true },
      { field: "blocks", aliases: ["blk/60", "blk60", "shots blocked/60", "blocks/60", "blocks per 60"], contains: ["block", "blk"], numeric: true },
    ],
  },
  goalie_rates: {
    kind: "goalie_rates",
    schema: GoalieRateRowSchema,
    identity: "name",
    fields: [
      NAME_FIELD,
      TEAM_FIELD,
      ID_FIELD,
      { field: "save_fraction", aliases: ["sv%", "sv pct", "save %", "save%", "save percentage"], contains: ["sv%", "sv pct", "save pct", "save%"], numeric: true },
    ],
  },
  line_assignment: {
    kind: "line_assignment",
    schema: LineAssignmentRowSchema,
    identity: "name",
    fields: [
      NAME_FIELD,
      TEAM_FIELD,
      ID_FIELD,
      { field: "assignment", aliases: ["line", "linetype", "line type", "unit", "ev line", "pairing"], contains: ["line", "pair"] },
      { field: "pp_unit", aliases: ["pp", "ppunit", "pp unit", "power play", "pp line"], contains: ["power play", "pp unit"] },
    ],
  },
  salary_manifest: {
    kind: "salary_manifest",
    schema: RosterRowSchema,
    identity: "name",
    fields: [
      NAME_FIELD,
      TEAM_FIELD,
      ID_FIELD,
      { field: "position", aliases: ["position", "pos", "roster position"], contains: ["position"] },
      { field: "salary", aliases: ["salary", "sal", "dk salary", "cost"], contains: ["salary"], numeric: true },
    ],
  },
};

export const ScheduleRowSchema = z.object({
  home: toStr,
  away: toStr,
});

export type ScheduleRow = z.infer<typeof ScheduleRowSchema>;

export const SCHEDULE_ALIASES: Record<string, keyof ScheduleRow> = {
  home: "home",
  "home team": "home",
  hometeam: "home",
  away: "away",
  "away team": "away",
  awayteam: "away",
  visitor: "away",
  road: "away",
};
