import type { PipelineIssue } from "@/lib/domain/types";
import { createLogger } from "@/lib/log/logger";
import { normalizeName, normalizeTeam } from "./aliases";
import type { ParseReport, RawTable } from "./parse";
import {
  SOURCE_SPECS,
  cellText,
  isBlankCell,
  parseNumeric,
  type FieldSpec,
  type SourceKind,
  type SourceRowMap,
} from "./schemas";

const logger = createLogger("ingest");

export type ColumnResolution<F extends string> = {
  columns: Partial<Record<F, string>>;
  unknownColumns: string[];
};

export type ExtractOptions = {
  // team-scoped pages carry no team column
  team?: string | null;
  // label used in issues and logs; defaults to the kind
  source?: string;
};

export type ExtractReport<T> = ParseReport<T> & {
  columns: Record<string, string>;
  issues: PipelineIssue[];
};

export function normalizeHeader(h: string): string {
  return cellText(h).toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Maps target fields to source headers: exact alias first (alias order is
 * preference order), then substring heuristics over the headers nobody
 * claimed. Each header feeds at most one field.
 */
export function resolveColumns<F extends string>(
  headers: readonly string[],
  fields: readonly FieldSpec<F>[]
): ColumnResolution<F> {
  const keyed = headers.map((header) => ({ header, key: normalizeHeader(header) }));
  const claimed = new Set<string>();
  const columns: Partial<Record<F, string>> = {};

  for (const spec of fields) {
    for (const alias of spec.aliases) {
      const hit = keyed.find((h) => !claimed.has(h.header) && h.key === alias);
      if (hit) {
        columns[spec.field] = hit.header;
        claimed.add(hit.header);
        break;
      }
    }
  }

  for (const spec of fields) {
    if (columns[spec.field] !== undefined || !spec.contains) continue;
    const needles = spec.contains;
    const hit = keyed.find((h) => !claimed.has(h.header) && needles.some((n) => h.key.includes(n)));
    if (hit) {
      columns[spec.field] = hit.header;
      claimed.add(hit.header);
    }
  }

  return { columns, unknownColumns: headers.filter((h) => !claimed.has(h)) };
}

function emptyReport<T>(issues: PipelineIssue[]): ExtractReport<T> {
  return { rows: [], errors: [], rowCount: 0, droppedRows: 0, unknownColumns: [], columns: {}, issues };
}

/**
 * Typed rows out of one source snapshot. Never throws for bad data: cells
 * that fail numeric coercion become null, rows without an identity are
 * dropped, and repeated (name, team) pairs keep their first occurrence.
 */
export function extract<K extends SourceKind>(
  table: RawTable | null,
  kind: K,
  options: ExtractOptions = {}
): ExtractReport<SourceRowMap[K]> {
  const spec = SOURCE_SPECS[kind];
  const source = options.source ?? kind;

  if (!table) {
    logger.warn({ source }, "source returned no table");
    return emptyReport([{ kind: "missing_source", source, message: "no table" }]);
  }

  const { columns, unknownColumns } = resolveColumns(table.headers, spec.fields);
  const rows: SourceRowMap[K][] = [];
  const errors: { row: number; message: string }[] = [];
  const issues: PipelineIssue[] = [];
  const seen = new Set<string>();
  const defaultTeam = options.team ? String(options.team) : null;
  const identityField: string = spec.identity;

  const drop = (row: number, message: string) => {
    errors.push({ row, message });
    issues.push({ kind: "dropped_row", source, row, message });
  };

  table.rows.forEach((raw, idx) => {
    const rowNum = idx + 1;
    const mapped: Record<string, unknown> = {};
    for (const field of spec.fields) {
      const header = columns[field.field];
      mapped[field.field] = header === undefined ? undefined : raw[header];
    }
    if (defaultTeam && isBlankCell(mapped.team)) mapped.team = defaultTeam;

    const identity = cellText(mapped[identityField]);
    if (!identity) {
      drop(rowNum, `missing ${identityField}`);
      return;
    }

    const key =
      identityField === "team"
        ? normalizeTeam(identity)
        : `${normalizeName(identity)}|${normalizeTeam(cellText(mapped.team))}`;
    if (!key || key.startsWith("|")) {
      drop(rowNum, `unresolvable ${identityField} "${identity}"`);
      return;
    }
    if (seen.has(key)) return;

    for (const field of spec.fields) {
      const value = mapped[field.field];
      if (field.numeric && !isBlankCell(value) && parseNumeric(value) === null) {
        issues.push({ kind: "unparseable_field", source, row: rowNum, field: field.field, raw: cellText(value) });
      }
    }

    const parsed = spec.schema.safeParse(mapped);
    if (!parsed.success) {
      drop(rowNum, parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
      return;
    }
    seen.add(key);
    rows.push(parsed.data);
  });

  const resolved: Record<string, string> = {};
  for (const field of spec.fields) {
    const header = columns[field.field];
    if (header !== undefined) resolved[field.field] = header;
  }
  const droppedRows = errors.length;
  logger.debug(
    { source, rows: rows.length, rowCount: table.rows.length, droppedRows, unknownColumns },
    "extracted source table"
  );
  if (resolved[identityField] === undefined && table.rows.length > 0) {
    logger.warn({ source, headers: table.headers }, `no ${identityField} column; every row dropped`);
  }

  return {
    rows,
    errors,
    rowCount: table.rows.length,
    droppedRows,
    unknownColumns,
    columns: resolved,
    issues,
  };
}
