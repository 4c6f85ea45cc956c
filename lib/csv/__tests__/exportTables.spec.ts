import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { escapeCSVField, formatCSVValue, toCsv, writeTables } from "@/lib/csv/exportTables";

describe("csv formatting", () => {
  it("quotes fields with separators or quotes", () => {
    expect(escapeCSVField("plain")).toBe("plain");
    expect(escapeCSVField("A_TOR, B_TOR")).toBe('"A_TOR, B_TOR"');
    expect(escapeCSVField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCSVField("x\ny")).toBe('"x\ny"');
    expect(escapeCSVField("x\ry")).toBe('"x\ry"');
  });

  it("formats values", () => {
    expect(formatCSVValue(null)).toBe("");
    expect(formatCSVValue(1.23456789)).toBe("1.2346");
    expect(formatCSVValue(Number.NaN)).toBe("");
    expect(formatCSVValue(true)).toBe("true");
    expect(formatCSVValue(["goals", "shots"])).toBe("goals; shots");
  });

  it("writes a header and one line per row", () => {
    const csv = toCsv(
      [
        { team: "TOR", members: ["A", "B"], value: null },
        { team: "MTL", members: ["C"], value: 0.5 },
      ],
      [
        { header: "team", value: (r) => r.team },
        { header: "members", value: (r) => r.members },
        { header: "value", value: (r) => r.value },
      ]
    );
    expect(csv).toBe("team,members,value\nTOR,A; B,\nMTL,C,0.5\n");
  });
});

describe("writeTables", () => {
  it("writes one file per table", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "projections-out-"));
    try {
      const files = await writeTables(dir, {
        skaters: [],
        goalies: [],
        stacks: [{ team: "TOR", assignment: "top line", members: ["A_TOR", "B_TOR"], points: 8.2, cost: 12000, value: 8.2 / 12 }],
        rankings: [{ rank: 1, canonical_id: "A_TOR", name: "Auston Matthews", team: "TOR", role: "F", points: 5 }],
        teams: [],
      });
      expect(files.map((f) => path.basename(f))).toEqual([
        "skaters.csv",
        "goalies.csv",
        "stacks.csv",
        "rankings.csv",
        "teams.csv",
      ]);
      expect(await readFile(path.join(dir, "stacks.csv"), "utf8")).toBe(
        "team,assignment,members,points,cost,value\nTOR,top line,A_TOR; B_TOR,8.2,12000,0.6833\n"
      );
      expect(await readFile(path.join(dir, "rankings.csv"), "utf8")).toBe(
        "rank,name,team,role,points\n1,Auston Matthews,TOR,F,5\n"
      );
      expect((await readFile(path.join(dir, "skaters.csv"), "utf8")).split("\n")[0]).toBe(
        "name,team,opponent,role,assignment,pp_unit,salary,goals,assists,shots,blocks,points,value,fallback,rostered,canonical_id"
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
