/**
 * Embedded DuckDB database handle and helpers.
 * One in-memory instance per handle; every query runs on its own short-lived
 * connection so concurrent readers never share a connection.
 */

import { DuckDBInstance, type DuckDBValue } from "@duckdb/node-api";
import type { Logger } from "../services/types.ts";

export type Row = Record<string, DuckDBValue>;

// ─── Public API ─────────────────────────────────────────────────────────────

export class Database {
  private closed = false;

  private constructor(
    private readonly instance: DuckDBInstance,
    private readonly log: Logger
  ) {}

  /**
   * Create a database instance. Defaults to an in-memory catalog; views and
   * macros created on it are visible to every connection.
   */
  static async open(log: Logger = console, path = ":memory:"): Promise<Database> {
    const instance = await DuckDBInstance.create(path);
    return new Database(instance, log);
  }

  /** Whether close() has been called. */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run a parameterized query and return all rows.
   * Uses $1, $2, ... placeholders. Rejects if the database has been closed.
   */
  async query(text: string, values: DuckDBValue[] = []): Promise<Row[]> {
    if (this.closed) {
      throw new Error("Database is closed; cannot run query");
    }
    const connection = await this.instance.connect();
    const t0 = performance.now();
    try {
      const reader = await connection.runAndReadAll(text, values);
      const rows = reader.getRowObjects();
      this.log.debug({ ms: Math.round(performance.now() - t0), rows: rows.length }, "query time");
      return rows;
    } finally {
      connection.closeSync();
    }
  }

  /** Run a statement that returns nothing (DDL, SET, LOAD). */
  async exec(text: string): Promise<void> {
    if (this.closed) {
      throw new Error("Database is closed; cannot run statement");
    }
    const connection = await this.instance.connect();
    try {
      await connection.run(text);
    } finally {
      connection.closeSync();
    }
  }

  /** Release the instance. Safe to call multiple times. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.instance.closeSync();
  }
}

// ─── Value narrowing ────────────────────────────────────────────────────────

/** Read a VARCHAR cell; NULL becomes null. */
export function stringCell(value: DuckDBValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  return typeof value === "string" ? value : String(value);
}

/** Read a numeric cell (DOUBLE, INTEGER or BIGINT); NULL becomes NaN. */
export function numberCell(value: DuckDBValue | undefined): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (value === null || value === undefined) return Number.NaN;
  return Number(String(value));
}
