import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ProjectionError } from "@/lib/errors";
import { createLogger } from "@/lib/log/logger";
import { fetchCached, type FetchLike } from "./fetch";
import { slateStems } from "./slate";

const logger = createLogger("sources");

/** Slate file stem to the URL it is fetched from, e.g. `{ "teams": "https://..." }`. */
export const SourceUrlsSchema = z.record(z.string(), z.string().url());

export type SourceUrls = z.infer<typeof SourceUrlsSchema>;

export type FetchSlateOptions = {
  cacheDir: string;
  date?: Date | string;
  retries?: number;
  retryDelayMs?: number;
  fetchImpl?: FetchLike;
};

export type FetchSlateResult = {
  written: string[];
  failed: string[];
};

export function parseSourceUrls(input: unknown): SourceUrls {
  const result = SourceUrlsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ProjectionError("Invalid source list", "INVALID_SOURCES", { issues });
  }
  const known = new Set(slateStems());
  const unknown = Object.keys(result.data).filter((stem) => !known.has(stem));
  if (unknown.length > 0) {
    throw new ProjectionError(`Unknown source stems: ${unknown.join(", ")}`, "INVALID_SOURCES", { unknown, known: [...known] });
  }
  return result.data;
}

// pages are HTML; exports are delimited text
function formatOf(body: string): "csv" | "html" {
  return body.trimStart().startsWith("<") ? "html" : "csv";
}

/**
 * Fetches each source through the day cache and writes it into `slateDir`
 * as `<stem>.csv` or `<stem>.html`, where `loadSlate` picks it up. A source
 * that cannot be fetched is skipped and later surfaces as `missing_source`.
 */
export async function fetchSlateSources(
  urls: SourceUrls,
  slateDir: string,
  opts: FetchSlateOptions
): Promise<FetchSlateResult> {
  await mkdir(slateDir, { recursive: true });
  const written: string[] = [];
  const failed: string[] = [];
  for (const [stem, url] of Object.entries(urls)) {
    const body = await fetchCached(url, {
      tag: stem,
      date: opts.date,
      cacheDir: opts.cacheDir,
      retries: opts.retries,
      retryDelayMs: opts.retryDelayMs,
      fetchImpl: opts.fetchImpl,
    });
    if (body === null) {
      logger.warn({ stem, url }, "source unavailable; skipped");
      failed.push(stem);
      continue;
    }
    const file = path.join(slateDir, `${stem}.${formatOf(body)}`);
    await writeFile(file, body, "utf8");
    written.push(file);
  }
  logger.info({ slateDir, written: written.length, failed: failed.length }, "fetched slate sources");
  return { written, failed };
}
