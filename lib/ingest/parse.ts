import Papa from "papaparse";

export type RawTable = {
  headers: string[];
  rows: Record<string, unknown>[];
};

export type ParseReport<T> = {
  rows: T[];
  errors: { row: number; message: string }[];
  rowCount: number;
  droppedRows: number;
  unknownColumns: string[];
};

// Header-mode CSV; papaparse guesses the delimiter (some manifests export with ";")
export function parseCsvText(text: string): RawTable {
  const result = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim(),
  });
  const headers = (result.meta.fields ?? []).filter((h) => h !== "");
  return { headers, rows: result.data };
}

function matchAll(re: RegExp, s: string): string[] {
  const out: string[] = [];
  for (const m of s.matchAll(re)) out.push(m[1]);
  return out;
}

/**
 * First <table> of an HTML page as a raw table. Header cells come from <th>
 * when present, otherwise the first row. Cell values keep their markup;
 * the extractor reduces them to text.
 */
export function parseHtmlTable(html: string): RawTable | null {
  const table = /<table[^>]*>([\s\S]*?)<\/table>/i.exec(html);
  if (!table) return null;
  const rowsHtml = matchAll(/<tr[^>]*>([\s\S]*?)<\/tr>/gi, table[1]);
  if (rowsHtml.length === 0) return null;

  const cellsOf = (tr: string) => matchAll(/<t[dh][^>]*>([\s\S]*?)<\/t[dh]>/gi, tr);
  const headerIdx = rowsHtml.findIndex((tr) => /<th[\s>]/i.test(tr));
  const start = headerIdx >= 0 ? headerIdx : 0;
  const headers = cellsOf(rowsHtml[start]).map((h) =>
    h.replace(/<[^>]*>/g, "").replace(/&nbsp;/gi, " ").replace(/\s+/g, " ").trim()
  );

  const rows: Record<string, unknown>[] = [];
  for (const tr of rowsHtml.slice(start + 1)) {
    const cells = cellsOf(tr);
    if (cells.length === 0) continue;
    const row: Record<string, unknown> = {};
    headers.forEach((h, i) => {
      if (h && !(h in row)) row[h] = cells[i] ?? "";
    });
    rows.push(row);
  }
  return { headers: headers.filter(Boolean), rows };
}

export function parseTableText(text: string, format: "csv" | "html"): RawTable | null {
  return format === "html" ? parseHtmlTable(text) : parseCsvText(text);
}
