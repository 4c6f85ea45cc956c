// Alias maps for team/assignment quirks and name normalization helpers
import type { Role } from "@/lib/domain/types";
import { UNASSIGNED } from "@/lib/domain/types";
import teamAliases from "./data/teams.json";

export const TEAM_ALIASES: Readonly<Record<string, string>> = teamAliases;

export function normalizeTeam(team: string | null | undefined): string {
  if (!team) return "";
  // Traded players are listed as "TOR, MTL"; the last team is the current one
  const parts = String(team)
    .split(/[,/]/)
    .map((s) => s.trim())
    .filter(Boolean);
  const t = (parts[parts.length - 1] ?? "").toUpperCase().replace(/\s+/g, " ");
  return TEAM_ALIASES[t] ?? t;
}

/**
 * Canonical join key for a free-text player name.
 *
 * Diacritics are stripped, typographic dashes and apostrophes become "-",
 * "Last, First" is reordered to "First Last", and anything outside
 * [A-Za-z0-9- ] is dropped. Total: bad input yields "".
 */
export function normalizeName(raw: string | null | undefined): string {
  if (typeof raw !== "string") return "";
  let s = raw
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "") // strip diacritics
    .replace(/[\u2010-\u2015\u2018\u2019\u2032']/g, "-")
    .replace(/\./g, "");

  const parts = s.split(",");
  if (parts.length === 2) {
    const last = parts[0].trim();
    const first = parts[1].trim();
    if (last && first) s = `${first} ${last}`;
  }

  return s
    .replace(/[^A-Za-z0-9\- ]+/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toUpperCase();
}

/** `NAME_TEAM`, or null when the name normalizes to nothing. */
export function canonicalId(name: string | null | undefined, team: string | null | undefined): string | null {
  const key = normalizeName(name);
  if (!key) return null;
  return `${key}_${normalizeTeam(team)}`;
}

export function guessRole(position: string | null | undefined): Role {
  if (!position) return "F";
  const p = position.toUpperCase();
  if (p.includes("G")) return "G";
  if (p.includes("D")) return "D";
  return "F";
}

const ASSIGNMENT_ALIASES: Record<string, string> = {
  l1: "top line",
  f1: "top line",
  "line 1": "top line",
  "1st line": "top line",
  l2: "second line",
  f2: "second line",
  "line 2": "second line",
  "2nd line": "second line",
  l3: "third line",
  f3: "third line",
  "line 3": "third line",
  "3rd line": "third line",
  l4: "fourth line",
  f4: "fourth line",
  "line 4": "fourth line",
  "4th line": "fourth line",
  d1: "first pairing",
  "pair 1": "first pairing",
  "1st pairing": "first pairing",
  d2: "second pairing",
  "pair 2": "second pairing",
  "2nd pairing": "second pairing",
  d3: "third pairing",
  "pair 3": "third pairing",
  "3rd pairing": "third pairing",
  "pp 1": "pp1",
  "pp unit 1": "pp1",
  "pp 2": "pp2",
  "pp unit 2": "pp2",
  "pk 1": "pk1",
  "pk 2": "pk2",
};

/**
 * Lowercased, alias-resolved label; blank input is "unassigned". A bare
 * line number ("1") is a pairing for defensemen and a line otherwise.
 */
export function normalizeAssignment(label: string | null | undefined, role?: Role): string {
  if (!label) return UNASSIGNED;
  const key = label.trim().toLowerCase().replace(/[_-]+/g, " ").replace(/\s+/g, " ");
  if (!key) return UNASSIGNED;
  if (/^\d$/.test(key)) return ASSIGNMENT_ALIASES[role === "D" ? `d${key}` : `l${key}`] ?? key;
  return ASSIGNMENT_ALIASES[key] ?? key;
}

/** "PP1", "pp 1", "1" and "PP-1" all become "pp1"; blank is null (not on a unit). */
export function normalizePowerPlayUnit(label: string | null | undefined): string | null {
  if (!label) return null;
  const trimmed = label.trim();
  if (!trimmed) return null;
  if (/^\d$/.test(trimmed)) return `pp${trimmed}`;
  return normalizeAssignment(trimmed);
}
