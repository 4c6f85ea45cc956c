import { z } from "zod";
import { ConfigurationError } from "@/lib/errors";
import { normalizeAssignment } from "@/lib/ingest/aliases";

const positive = z.number().finite().positive();

export const ConfigurationSchema = z.object({
  blend_weights: z.object({
    recent: positive,
    mid: positive,
    prior_season: positive,
  }),
  // skater metrics that feed points; each needs a scoring weight and fallbacks
  projected_metrics: z.array(z.enum(["goals", "assists", "shots", "blocks"])).min(1),
  scoring: z.record(z.string(), z.number().finite()),
  fallback_rates: z.object({
    F: z.record(z.string(), z.number().finite().nonnegative()),
    D: z.record(z.string(), z.number().finite().nonnegative()),
    G: z.record(z.string(), z.number().finite().nonnegative()),
  }),
  league_averages: z.object({
    shot_rate_allowed: positive,
    expected_goals_rate_allowed: positive,
    shot_rate_for: positive,
    shot_attempt_rate_for: positive,
  }),
  assignment_multipliers: z.record(z.string(), positive),
  // 0 ignores opponent shot attempts for blocks, 1 scales fully
  block_shrink: z.number().min(0).max(1),
});

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type BlendWeights = Configuration["blend_weights"];
export type LeagueAverages = Configuration["league_averages"];

export const DEFAULT_BLEND_WEIGHTS: BlendWeights = { recent: 0.5, mid: 0.35, prior_season: 0.15 };

// DraftKings NHL classic
export const DEFAULT_SCORING: Record<string, number> = {
  goals: 8.5,
  assists: 5.0,
  shots: 1.5,
  blocks: 1.3,
  saves: 0.7,
  goals_against: -3.5,
};

export const DEFAULT_LEAGUE_AVERAGES: LeagueAverages = {
  shot_rate_allowed: 31.0,
  expected_goals_rate_allowed: 2.65,
  shot_rate_for: 31.0,
  shot_attempt_rate_for: 58.0,
};

export const DEFAULT_ASSIGNMENT_MULTIPLIERS: Record<string, number> = {
  "top line": 1.12,
  "second line": 1.0,
  "third line": 0.88,
  "fourth line": 0.75,
  "first pairing": 1.08,
  "second pairing": 1.0,
  "third pairing": 0.9,
  pp1: 1.15,
  pp2: 1.05,
  unassigned: 1.0,
};

export const DEFAULT_CONFIGURATION: Configuration = {
  blend_weights: DEFAULT_BLEND_WEIGHTS,
  projected_metrics: ["goals", "assists", "shots", "blocks"],
  scoring: DEFAULT_SCORING,
  fallback_rates: {
    F: { goals: 0.45, assists: 0.8, shots: 5.2, blocks: 1.0 },
    D: { goals: 0.2, assists: 0.7, shots: 3.2, blocks: 4.0 },
    G: { save_fraction: 0.905 },
  },
  league_averages: DEFAULT_LEAGUE_AVERAGES,
  assignment_multipliers: DEFAULT_ASSIGNMENT_MULTIPLIERS,
  block_shrink: 0.5,
};

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function mergeDeep(base: Record<string, unknown>, over: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(over)) {
    const cur = out[k];
    out[k] = isPlainObject(cur) && isPlainObject(v) ? mergeDeep(cur, v) : v;
  }
  return out;
}

/**
 * Cross-field checks the schema cannot express. Throws ConfigurationError
 * listing every problem at once.
 */
export function assertConfiguration(config: Configuration): void {
  const issues: string[] = [];
  for (const metric of config.projected_metrics) {
    if (config.scoring[metric] === undefined) issues.push(`scoring: no weight for metric "${metric}"`);
    if (config.fallback_rates.F[metric] === undefined) issues.push(`fallback_rates.F: no rate for "${metric}"`);
    if (config.fallback_rates.D[metric] === undefined) issues.push(`fallback_rates.D: no rate for "${metric}"`);
  }
  if (config.scoring.saves === undefined) issues.push(`scoring: no weight for "saves"`);
  if (config.scoring.goals_against === undefined) issues.push(`scoring: no weight for "goals_against"`);
  const sv = config.fallback_rates.G.save_fraction;
  if (sv === undefined) issues.push(`fallback_rates.G: no rate for "save_fraction"`);
  else if (sv > 1) issues.push(`fallback_rates.G.save_fraction must be a fraction, got ${sv}`);
  if (issues.length > 0) throw new ConfigurationError(issues);
}

/**
 * Overrides (typically parsed JSON) merged over the defaults, validated and
 * cross-checked. Assignment table keys are normalized like assignment labels.
 */
export function resolveConfiguration(overrides: unknown = {}): Configuration {
  if (!isPlainObject(overrides)) throw new ConfigurationError(["configuration overrides must be an object"]);
  const merged = mergeDeep(DEFAULT_CONFIGURATION, overrides);
  const parsed = ConfigurationSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const assignment_multipliers: Record<string, number> = {};
  for (const [label, m] of Object.entries(parsed.data.assignment_multipliers)) {
    assignment_multipliers[normalizeAssignment(label)] = m;
  }
  const config: Configuration = { ...parsed.data, assignment_multipliers };
  assertConfiguration(config);
  return config;
}
