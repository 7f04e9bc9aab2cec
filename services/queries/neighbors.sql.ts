/**
 * Neighbor CTE shared by partnerCategories and fetchInteractions.
 *
 * Edges are undirected: the queried id may sit on either endpoint, and the
 * partner is the other one. A self-edge yields the protein as its own partner.
 */

import type { DuckDBValue } from "@duckdb/node-api";
import type { NeighborFilter } from "../types.ts";

export interface SqlParts {
  text: string;
  values: DuckDBValue[];
}

export const DEFAULT_MIN_SCORE = 0;

export function resolveMinScore(filter: NeighborFilter): number {
  const s = filter.minScore;
  return typeof s === "number" && Number.isFinite(s) ? s : DEFAULT_MIN_SCORE;
}

/**
 * Build the `nbrs` CTE and the WHERE conditions over it. `$1` is the protein
 * id; further placeholders are appended to `values` in order.
 */
export function buildNeighborSql(
  id: string,
  filter: NeighborFilter
): { withClause: string; conditions: string[]; values: DuckDBValue[] } {
  const values: DuckDBValue[] = [id, resolveMinScore(filter)];
  const conditions = ["n.score >= $2"];

  if (filter.strength !== undefined) {
    values.push(filter.strength);
    conditions.push(`n.strength = $${values.length}`);
  }

  const withClause = `
WITH nbrs AS (
  SELECT CASE WHEN e.src = $1 THEN e.dst ELSE e.src END AS partner,
         e.score, e.strength
  FROM edges e
  WHERE e.src = $1 OR e.dst = $1
)`;

  return { withClause, conditions, values };
}

/**
 * Coerce a limit to a positive integer, falling back when absent or invalid.
 * Capped at MAX_SAFE_INTEGER so the inlined `LIMIT` never renders in exponent form.
 */
export function resolveLimit(limit: number | undefined, fallback: number): number {
  if (typeof limit === "number" && Number.isFinite(limit) && limit >= 1) {
    return Math.min(Math.floor(limit), Number.MAX_SAFE_INTEGER);
  }
  return fallback;
}
