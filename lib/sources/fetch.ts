import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { createLogger } from "@/lib/log/logger";

const logger = createLogger("sources");

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type FetchCachedOptions = {
  // logical key of the payload; the cache file is `<tag>_<YYYYMMDD>.txt`
  tag: string;
  date?: Date | string;
  cacheDir: string;
  retries?: number; // default 2
  retryDelayMs?: number; // base delay, doubled per attempt (default 500)
  fetchImpl?: FetchLike;
};

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function dateKey(date: Date | string = new Date()): string {
  if (typeof date === "string") return date.replace(/-/g, "").slice(0, 8);
  // local calendar day
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}${mm}${dd}`;
}

export function cachePath(cacheDir: string, tag: string, date?: Date | string): string {
  const safeTag = tag.replace(/[^A-Za-z0-9_-]+/g, "_");
  return path.join(cacheDir, `${safeTag}_${dateKey(date)}.txt`);
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

async function readCache(file: string): Promise<string | null> {
  try {
    return await readFile(file, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

/**
 * Body of `url`, cached per (tag, day) so repeated runs on the same day do
 * not re-fetch. Retries 429, 5xx and network errors with exponential
 * backoff. Resolves to null when the source stays unavailable; the caller
 * treats that as a missing source.
 */
export async function fetchCached(url: string, opts: FetchCachedOptions): Promise<string | null> {
  const file = cachePath(opts.cacheDir, opts.tag, opts.date);
  const cached = await readCache(file);
  if (cached !== null) {
    logger.debug({ tag: opts.tag, file }, "cache hit");
    return cached;
  }

  const doFetch: FetchLike = opts.fetchImpl ?? ((u, init) => fetch(u, init));
  const retries = Math.max(0, opts.retries ?? 2);
  const baseDelay = Math.max(0, opts.retryDelayMs ?? 500);

  let body: string | null = null;
  for (let attempt = 0; attempt <= retries && body === null; attempt++) {
    const canRetry = attempt < retries;
    try {
      const resp = await doFetch(url, { headers: { "User-Agent": "nhl-dfs-projections" } });
      if (!resp.ok) {
        const retryable = resp.status >= 500 || resp.status === 429;
        logger.warn({ tag: opts.tag, url, status: resp.status, attempt }, "fetch failed");
        if (retryable && canRetry) {
          await sleep(baseDelay * Math.pow(2, attempt));
          continue;
        }
        return null;
      }
      body = await resp.text();
    } catch (err) {
      logger.warn({ tag: opts.tag, url, attempt, err }, "fetch errored");
      if (!canRetry) return null;
      await sleep(baseDelay * Math.pow(2, attempt));
    }
  }
  if (body === null) return null;

  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, body, "utf8");
  logger.info({ tag: opts.tag, url, bytes: body.length }, "fetched and cached");
  return body;
}
