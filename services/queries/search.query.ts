/**
 * Search query — autocomplete candidates from the identifier table.
 *
 * Short single-token input (≤ 12 chars, no whitespace) may be an accession, so
 * it runs a ranked union:
 *   1. exact id
 *   2. id prefix, case-insensitive
 *   3. protein_name substring, case-insensitive
 * deduplicated on (id, display name, category) with the best rank kept.
 * Longer or multi-word input only matches protein_name.
 *
 * Matching uses starts_with/contains, so `%` and `_` in user input are literal.
 */

import { stringCell, type Database, type Row } from "../../database/index.ts";
import { UNKNOWN_CATEGORY } from "../location/location.normalizer.ts";
import { isLocationCategory, type SearchHit } from "../types.ts";
import { resolveLimit, type SqlParts } from "./neighbors.sql.ts";

// ─── Limits ─────────────────────────────────────────────────────────────────

export const DEFAULT_SEARCH_LIMIT = 50;

const ID_QUERY_MAX_LENGTH = 12;

export function looksLikeIdentifier(text: string): boolean {
  return text.length > 0 && text.length <= ID_QUERY_MAX_LENGTH && !/\s/.test(text);
}

// ─── Query builder ──────────────────────────────────────────────────────────

const HIT_COLUMNS = `m.id,
         display_name(m.protein_name, m.id) AS pname,
         loc_category(m.location) AS loc_cat`;

export function buildSearchSql(text: string, limit: number): SqlParts {
  if (looksLikeIdentifier(text)) {
    return {
      text: `
WITH hits AS (
  SELECT ${HIT_COLUMNS}, 1 AS hit_rank
  FROM idmap m WHERE m.id = $1
  UNION ALL
  SELECT ${HIT_COLUMNS}, 2 AS hit_rank
  FROM idmap m WHERE starts_with(lower(m.id), lower($1))
  UNION ALL
  SELECT ${HIT_COLUMNS}, 3 AS hit_rank
  FROM idmap m WHERE contains(lower(m.protein_name), lower($1))
)
SELECT id, pname, loc_cat, min(hit_rank) AS best_rank
FROM hits
GROUP BY id, pname, loc_cat
ORDER BY best_rank, pname, id
LIMIT ${limit};
`.trim(),
      values: [text],
    };
  }

  return {
    text: `
SELECT ${HIT_COLUMNS}
FROM idmap m
WHERE contains(lower(m.protein_name), lower($1))
ORDER BY pname, m.id
LIMIT ${limit};
`.trim(),
    values: [text],
  };
}

// ─── Row mapping ─────────────────────────────────────────────────────────────

function mapRowToHit(r: Row): SearchHit {
  const id = stringCell(r.id) ?? "";
  const category = stringCell(r.loc_cat);
  return {
    id,
    displayName: stringCell(r.pname) ?? id,
    category: isLocationCategory(category) ? category : UNKNOWN_CATEGORY,
  };
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Run the search. Empty text returns [] without touching the database.
 */
export async function runSearchQuery(db: Database, text: string, limit?: number): Promise<SearchHit[]> {
  if (text.length === 0) return [];
  const { text: sql, values } = buildSearchSql(text, resolveLimit(limit, DEFAULT_SEARCH_LIMIT));
  const rows = await db.query(sql, values);
  return rows.map(mapRowToHit);
}
