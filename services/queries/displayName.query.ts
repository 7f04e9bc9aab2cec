import { stringCell, type Database } from "../../database/index.ts";

/**
 * Display name for one identifier: trimmed protein_name, else the id.
 * Unknown identifiers return the id unchanged.
 */
export async function runDisplayNameQuery(db: Database, id: string): Promise<string> {
  const rows = await db.query(
    "SELECT display_name(m.protein_name, m.id) AS name FROM idmap m WHERE m.id = $1 LIMIT 1;",
    [id]
  );
  return stringCell(rows[0]?.name) ?? id;
}
