import type { InteractionRow } from "../types.ts";

export const INTERACTIONS_CSV_HEADER = [
  "partner_id",
  "partner_protein_name",
  "partner_location_category",
  "score",
  "strength",
] as const;

function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** RFC 4180 text with a header row, `\n` line endings and a trailing newline. */
export function toInteractionsCsv(rows: readonly InteractionRow[]): string {
  const lines = [INTERACTIONS_CSV_HEADER.join(",")];
  for (const r of rows) {
    lines.push(
      [r.partnerId, r.partnerDisplayName, r.partnerCategory, r.score, r.strength].map(csvField).join(",")
    );
  }
  return `${lines.join("\n")}\n`;
}

export function interactionsCsvFileName(id: string): string {
  return `${id.replace(/[^A-Za-z0-9._-]/g, "_")}_interactions.csv`;
}
