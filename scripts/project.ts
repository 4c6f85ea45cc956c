/**
 * Projects one day's slate and writes the output tables.
 *
 * Usage:
 *   npx tsx scripts/project.ts --slate=data/2025-01-14 --out=data/outputs/2025-01-14
 *   npx tsx scripts/project.ts --slate=data/2025-01-14 --config=config/projections.json
 *   npx tsx scripts/project.ts --slate=data/2025-01-14 --sources=config/sources.json --date=2025-01-14
 *
 * --slate defaults to PROJECTIONS_DATA_DIR, --out to PROJECTIONS_OUTPUT_DIR.
 * --sources maps slate stems to URLs; each is fetched through the day cache
 * in PROJECTIONS_CACHE_DIR and written into the slate directory first.
 */
import "dotenv/config";
import { readFile } from "node:fs/promises";
import { getEnv } from "@/lib/env";
import { ProjectionError } from "@/lib/errors";
import { writeTables } from "@/lib/csv/exportTables";
import { createLogger } from "@/lib/log/logger";
import { resolveConfiguration } from "@/lib/projection/config";
import { runProjections } from "@/lib/projection/run";
import { fetchSlateSources, parseSourceUrls } from "@/lib/sources/remote";
import { loadSlate } from "@/lib/sources/slate";

const logger = createLogger("cli");

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const arg of argv) {
    if (!arg.startsWith("--")) continue;
    const [k, ...rest] = arg.slice(2).split("=");
    out[k] = rest.join("=");
  }
  return out;
}

async function readJsonFile(file: string): Promise<unknown> {
  const text = await readFile(file, "utf8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ProjectionError(`Config file ${file} is not valid JSON`, "INVALID_CONFIG_FILE", { cause: String(err) });
  }
}

async function main(): Promise<void> {
  const env = getEnv();
  const args = parseArgs(process.argv.slice(2));
  const slateDir = args.slate || env.PROJECTIONS_DATA_DIR;
  const outDir = args.out || env.PROJECTIONS_OUTPUT_DIR;

  const config = resolveConfiguration(args.config ? await readJsonFile(args.config) : {});
  if (args.sources) {
    const urls = parseSourceUrls(await readJsonFile(args.sources));
    await fetchSlateSources(urls, slateDir, { cacheDir: env.PROJECTIONS_CACHE_DIR, date: args.date || undefined });
  }
  const slate = await loadSlate(slateDir);
  const run = runProjections(slate.inputs, config);
  const files = await writeTables(outDir, run);

  const issues = [...slate.issues, ...run.issues];
  for (const issue of issues) {
    if (issue.kind === "missing_source" || issue.kind === "entity_failed") logger.warn({ ...issue }, issue.kind);
  }
  logger.info({ ...run.summary, sourceIssues: slate.issues.length, files }, "done");
  const top = run.rankings.slice(0, 10).map((r) => `${r.rank}. ${r.name} (${r.team}) ${r.points.toFixed(2)}`);
  if (top.length > 0) console.log(top.join("\n"));
}

main().catch((err: unknown) => {
  logger.error({ err }, err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
