/**
 * Interactions query — partners of one protein with display name, location
 * category, score and strength.
 *
 * Applies:
 * - score >= minScore (default 0)
 * - strength == filter.strength when set
 * - partner category ∈ filter.categories when non-empty
 * - ORDER BY score DESC, partner id ASC; LIMIT (default 5000)
 *
 * Partners absent from the identifier table fall back to their id and Unknown.
 */

import { numberCell, stringCell, type Database, type Row } from "../../database/index.ts";
import { UNKNOWN_CATEGORY } from "../location/location.normalizer.ts";
import { isLocationCategory, type InteractionQuery, type InteractionRow } from "../types.ts";
import { buildNeighborSql, resolveLimit, type SqlParts } from "./neighbors.sql.ts";

// ─── Hard limits ────────────────────────────────────────────────────────────

/** Default row cap per call; the HTTP layer bounds overrides to [100, 100000]. */
export const DEFAULT_INTERACTION_LIMIT = 5_000;

// ─── Query builder ──────────────────────────────────────────────────────────

export function buildInteractionsSql(id: string, q: InteractionQuery): SqlParts {
  const { withClause, conditions, values } = buildNeighborSql(id, q);

  const categories = [...new Set(q.categories ?? [])];
  if (categories.length > 0) {
    const placeholders = categories.map((c) => {
      values.push(c);
      return `$${values.length}`;
    });
    conditions.push(`loc_category(m.location) IN (${placeholders.join(", ")})`);
  }

  const limit = resolveLimit(q.limit, DEFAULT_INTERACTION_LIMIT);

  const text = `
${withClause.trim()}
SELECT
  n.partner AS partner_id,
  display_name(m.protein_name, n.partner) AS partner_protein_name,
  loc_category(m.location) AS partner_location_category,
  n.score,
  n.strength
FROM nbrs n
LEFT JOIN idmap m ON m.id = n.partner
WHERE ${conditions.join(" AND ")}
ORDER BY n.score DESC, n.partner
LIMIT ${limit};
`.trim();

  return { text, values };
}

// ─── Row mapping ─────────────────────────────────────────────────────────────

function mapRowToInteraction(r: Row): InteractionRow {
  const partnerId = stringCell(r.partner_id) ?? "";
  const category = stringCell(r.partner_location_category);
  return {
    partnerId,
    partnerDisplayName: stringCell(r.partner_protein_name) ?? partnerId,
    partnerCategory: isLocationCategory(category) ? category : UNKNOWN_CATEGORY,
    score: numberCell(r.score),
    strength: stringCell(r.strength) ?? "",
  };
}

// ─── Public API ─────────────────────────────────────────────────────────────

export async function runInteractionsQuery(
  db: Database,
  id: string,
  q: InteractionQuery = {}
): Promise<InteractionRow[]> {
  const { text, values } = buildInteractionsSql(id, q);
  const rows = await db.query(text, values);
  return rows.map(mapRowToInteraction);
}
