/**
 * PPI context — Table of contents
 *
 * Owns the embedded database and the two table views for the life of the
 * process. Construct once with `PpiContext.open`, then pass it to whatever
 * serves queries.
 *
 * open: resolve sources → create database → httpfs (remote scans only,
 *       installed on first use)
 *       → macros (clean_text, display_name, loc_category) → views (edges, idmap)
 */

import { Database } from "../database/index.ts";
import { SQL_WHITESPACE_CLASS, buildLocationMacroSql } from "./location/location.normalizer.ts";
import {
  SourceLoadError,
  SourceLoadErrorCode,
  SourceLoader,
  type ResolvedSource,
  type SourceLoaderOptions,
  type TableSource,
} from "./sources/source.loader.ts";
import type {
  InteractionQuery,
  InteractionRow,
  LocationCategory,
  Logger,
  NeighborFilter,
  SearchHit,
} from "./types.ts";

// ─── Queries (table of contents) ────────────────────────────────────────────

import { runSearchQuery } from "./queries/search.query.ts";
import { runDisplayNameQuery } from "./queries/displayName.query.ts";
import { runPartnerCategoriesQuery } from "./queries/partnerCategories.query.ts";
import { runInteractionsQuery } from "./queries/interactions.query.ts";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface PpiContextOptions {
  edges: TableSource;
  idmap: TableSource;
  /** Shared loader; one is created from `loaderOptions` when omitted. */
  loader?: SourceLoader;
  loaderOptions?: Omit<SourceLoaderOptions, "log">;
  log?: Logger;
}

export interface ResolvedSources {
  edges: ResolvedSource;
  idmap: ResolvedSource;
}

// ─── SQL ────────────────────────────────────────────────────────────────────

const TEXT_MACROS = [
  `CREATE OR REPLACE MACRO clean_text(s) AS regexp_replace(s, '^${SQL_WHITESPACE_CLASS}+|${SQL_WHITESPACE_CLASS}+$', '', 'g');`,
  `CREATE OR REPLACE MACRO display_name(raw_name, fallback) AS coalesce(nullif(clean_text(raw_name), ''), fallback);`,
];

/**
 * Statements that enable remote scans. `INSTALL` fetches the extension from
 * DuckDB's extension repository, so it is only emitted when the extension is
 * not installed yet.
 */
export function buildHttpfsSetupSql(installed: boolean): string[] {
  return [
    ...(installed ? [] : ["INSTALL httpfs;"]),
    "LOAD httpfs;",
    "SET GLOBAL enable_http_metadata_cache = true;",
    "SET http_user_agent = 'Mozilla/5.0';",
  ];
}

async function isHttpfsInstalled(db: Database): Promise<boolean> {
  const rows = await db.query(
    "SELECT installed FROM duckdb_extensions() WHERE extension_name = 'httpfs';"
  );
  return rows[0]?.installed === true;
}

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildScanSql(source: ResolvedSource): string {
  const loc = sqlString(source.location);
  switch (source.format) {
    case "csv":
      return `read_csv(${loc}, header = true, delim = ',', quote = '"')`;
    case "tsv":
      return String.raw`read_csv(${loc}, header = true, delim = '\t', quote = '"')`;
    case "parquet":
      return `read_parquet(${loc})`;
  }
}

export function buildEdgesViewSql(source: ResolvedSource): string {
  return `
CREATE OR REPLACE VIEW edges AS
SELECT CAST(src AS VARCHAR) AS src,
       CAST(dst AS VARCHAR) AS dst,
       CAST(score AS DOUBLE) AS score,
       CAST(strength AS VARCHAR) AS strength
FROM ${buildScanSql(source)};
`.trim();
}

export function buildIdmapViewSql(source: ResolvedSource): string {
  return `
CREATE OR REPLACE VIEW idmap AS
SELECT CAST(id AS VARCHAR) AS id,
       CAST(protein_name AS VARCHAR) AS protein_name,
       CAST(location AS VARCHAR) AS location
FROM ${buildScanSql(source)};
`.trim();
}

async function execForSource(db: Database, statements: readonly string[], source: ResolvedSource): Promise<void> {
  try {
    for (const stmt of statements) await db.exec(stmt);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SourceLoadError(
      SourceLoadErrorCode.OPEN_FAILED,
      source.location,
      `Could not open ${source.location}: ${reason}`,
      { cause: err }
    );
  }
}

// ─── Public API ─────────────────────────────────────────────────────────────

export class PpiContext {
  private constructor(
    private readonly db: Database,
    readonly sources: ResolvedSources
  ) {}

  /**
   * Resolve both sources and register macros and views. Rejects with
   * SourceLoadError when a source cannot be fetched or opened.
   */
  static async open(options: PpiContextOptions): Promise<PpiContext> {
    const log = options.log ?? console;
    const loader = options.loader ?? new SourceLoader({ ...options.loaderOptions, log });

    const [edges, idmap] = await Promise.all([
      loader.resolve("edges", options.edges),
      loader.resolve("idmap", options.idmap),
    ]);

    const db = await Database.open(log);
    try {
      const remote = [edges, idmap].find((s) => s.remote);
      if (remote) {
        const installed = await isHttpfsInstalled(db);
        if (!installed) log.info({ extension: "httpfs" }, "installing duckdb extension");
        await execForSource(db, buildHttpfsSetupSql(installed), remote);
      }
      for (const stmt of TEXT_MACROS) await db.exec(stmt);
      await db.exec(buildLocationMacroSql());
      await execForSource(db, [buildEdgesViewSql(edges)], edges);
      await execForSource(db, [buildIdmapViewSql(idmap)], idmap);
    } catch (err) {
      db.close();
      throw err;
    }

    log.info({ edges: edges.location, idmap: idmap.location }, "ppi tables ready");
    return new PpiContext(db, { edges, idmap });
  }

  /** Autocomplete over identifiers and protein names (default limit 50). */
  search(text: string, limit?: number): Promise<SearchHit[]> {
    return runSearchQuery(this.db, text, limit);
  }

  displayName(id: string): Promise<string> {
    return runDisplayNameQuery(this.db, id);
  }

  partnerCategories(id: string, filter?: NeighborFilter): Promise<LocationCategory[]> {
    return runPartnerCategoriesQuery(this.db, id, filter);
  }

  fetchInteractions(id: string, query?: InteractionQuery): Promise<InteractionRow[]> {
    return runInteractionsQuery(this.db, id, query);
  }

  isClosed(): boolean {
    return this.db.isClosed();
  }

  /** Release the database. Safe to call more than once. */
  close(): void {
    this.db.close();
  }
}
