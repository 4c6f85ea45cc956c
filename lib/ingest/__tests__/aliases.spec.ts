import { describe, it, expect } from "vitest";
import {
  canonicalId,
  guessRole,
  normalizeAssignment,
  normalizeName,
  normalizePowerPlayUnit,
  normalizeTeam,
} from "@/lib/ingest/aliases";

describe("normalizeName", () => {
  it("reorders Last, First", () => {
    expect(normalizeName("Crosby, Sidney")).toBe(normalizeName("Sidney Crosby"));
    expect(normalizeName("Crosby, Sidney")).toBe("SIDNEY CROSBY");
  });

  it("strips diacritics and periods", () => {
    expect(normalizeName("Tim Stützle")).toBe("TIM STUTZLE");
    expect(normalizeName("J.T. Miller")).toBe("JT MILLER");
  });

  it("turns apostrophes and typographic dashes into hyphens", () => {
    expect(normalizeName("Ryan O'Reilly")).toBe("RYAN O-REILLY");
    expect(normalizeName("Ryan O’Reilly")).toBe("RYAN O-REILLY");
    expect(normalizeName("Jean–Gabriel Pageau")).toBe("JEAN-GABRIEL PAGEAU");
  });

  it("collapses whitespace and drops punctuation", () => {
    expect(normalizeName("  Connor   McDavid*  ")).toBe("CONNOR MCDAVID");
  });

  it("is idempotent", () => {
    for (const raw of ["Crosby, Sidney", "Tim Stützle", "Ryan O'Reilly", "J.T. Miller", "  a  b ", ""]) {
      const once = normalizeName(raw);
      expect(normalizeName(once)).toBe(once);
    }
  });

  it("returns empty for empty or non-string input", () => {
    expect(normalizeName("")).toBe("");
    expect(normalizeName(null)).toBe("");
    expect(normalizeName(undefined)).toBe("");
    expect(normalizeName("...")).toBe("");
  });
});

describe("normalizeTeam", () => {
  it("maps dotted and full names", () => {
    expect(normalizeTeam("L.A")).toBe("LAK");
    expect(normalizeTeam("t.b")).toBe("TBL");
    expect(normalizeTeam("TOR")).toBe("TOR");
  });

  it("keeps the last team of a multi-team cell", () => {
    expect(normalizeTeam("TOR, MTL")).toBe("MTL");
    expect(normalizeTeam("N.J/S.J")).toBe("SJS");
  });

  it("is empty for missing input", () => {
    expect(normalizeTeam(null)).toBe("");
    expect(normalizeTeam("")).toBe("");
  });
});

describe("canonicalId", () => {
  it("joins normalized name and team", () => {
    expect(canonicalId("Crosby, Sidney", "PIT")).toBe("SIDNEY CROSBY_PIT");
  });

  it("is null without a usable name", () => {
    expect(canonicalId("  ", "PIT")).toBeNull();
  });
});

describe("roles and assignments", () => {
  it("guesses role from position", () => {
    expect(guessRole("G")).toBe("G");
    expect(guessRole("D")).toBe("D");
    expect(guessRole("LW")).toBe("F");
    expect(guessRole(null)).toBe("F");
  });

  it("canonicalizes assignment labels", () => {
    expect(normalizeAssignment("L1")).toBe("top line");
    expect(normalizeAssignment("Line 2")).toBe("second line");
    expect(normalizeAssignment("D1")).toBe("first pairing");
    expect(normalizeAssignment("PP_1")).toBe("pp1");
    expect(normalizeAssignment("Top Line")).toBe("top line");
    expect(normalizeAssignment("")).toBe("unassigned");
    expect(normalizeAssignment(null)).toBe("unassigned");
  });

  it("maps bare line numbers by role", () => {
    expect(normalizeAssignment("1")).toBe("top line");
    expect(normalizeAssignment(" 4 ", "F")).toBe("fourth line");
    expect(normalizeAssignment("2", "D")).toBe("second pairing");
    expect(normalizeAssignment("4", "D")).toBe("4");
  });

  it("normalizes power-play units", () => {
    expect(normalizePowerPlayUnit("1")).toBe("pp1");
    expect(normalizePowerPlayUnit("PP2")).toBe("pp2");
    expect(normalizePowerPlayUnit("PP-1")).toBe("pp1");
    expect(normalizePowerPlayUnit(" ")).toBeNull();
    expect(normalizePowerPlayUnit(null)).toBeNull();
  });
});
