/**
 * Partner categories — the distinct location categories among a protein's
 * neighbors after score/strength filtering. Feeds the category facet.
 */

import { stringCell, type Database } from "../../database/index.ts";
import { isLocationCategory, type LocationCategory, type NeighborFilter } from "../types.ts";
import { buildNeighborSql, type SqlParts } from "./neighbors.sql.ts";

export function buildPartnerCategoriesSql(id: string, filter: NeighborFilter): SqlParts {
  const { withClause, conditions, values } = buildNeighborSql(id, filter);
  const text = `
${withClause.trim()}
SELECT DISTINCT loc_category(m.location) AS loc_cat
FROM nbrs n
LEFT JOIN idmap m ON m.id = n.partner
WHERE ${conditions.join(" AND ")}
ORDER BY loc_cat;
`.trim();
  return { text, values };
}

/** Sorted ascending; partners missing from the identifier table count as Unknown. */
export async function runPartnerCategoriesQuery(
  db: Database,
  id: string,
  filter: NeighborFilter = {}
): Promise<LocationCategory[]> {
  const { text, values } = buildPartnerCategoriesSql(id, filter);
  const rows = await db.query(text, values);
  return rows.map((r) => stringCell(r.loc_cat)).filter(isLocationCategory);
}
