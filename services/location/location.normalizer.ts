/**
 * Location normalizer — free-text subcellular location → LocationCategory.
 *
 * Case-insensitive substring matching over an ordered rule table; first match
 * wins. The generic "membrane" rule must stay last: "plasma membrane" and
 * "cell membrane" would otherwise never reach their own category.
 *
 * The same table renders the `loc_category` SQL macro, so queries classify
 * rows exactly as `normalizeLocation` does.
 */

import type { LocationCategory } from "../types.ts";

// ─── Rules ──────────────────────────────────────────────────────────────────

export interface LocationRule {
  category: LocationCategory;
  /** Lowercase substrings; any one matching selects the category. */
  keywords: readonly string[];
}

export const LOCATION_RULES: readonly LocationRule[] = Object.freeze([
  { category: "Mitochondrion", keywords: ["mitochond"] },
  { category: "Endoplasmic Reticulum", keywords: ["endoplasmic reticulum"] },
  { category: "Golgi apparatus", keywords: ["golgi"] },
  { category: "Plasma membrane", keywords: ["plasma membrane", "cell membrane", "cell surface"] },
  { category: "Lysosome", keywords: ["lysosom"] },
  { category: "Endosome", keywords: ["endosom"] },
  { category: "Peroxisome", keywords: ["peroxisom"] },
  { category: "Cytoplasm", keywords: ["cytosol", "cytoplasm"] },
  { category: "Nucleus", keywords: ["nucleus", "nuclear", "nucleoplasm", "nucleolus", "chromosom", "chromatin"] },
  { category: "Cytoskeleton", keywords: ["cytoskeleton", "microtubule", "actin", "intermediate filament"] },
  { category: "Extracellular", keywords: ["extracellular", "secreted"] },
  { category: "Ribosome", keywords: ["ribosom"] },
  { category: "Centrosome", keywords: ["centrosom"] },
  { category: "Membrane", keywords: ["membrane"] },
] as const);

/**
 * RE2 character class for the characters `String.prototype.trim` strips. RE2's
 * `\s` alone misses \v and the Unicode spaces.
 */
export const SQL_WHITESPACE_CLASS = String.raw`[\s\x{0B}\p{Z}\x{FEFF}]`;

export const UNKNOWN_CATEGORY: LocationCategory = "Unknown";
export const FALLBACK_CATEGORY: LocationCategory = "Other";

// ─── TypeScript ─────────────────────────────────────────────────────────────

export function normalizeLocation(
  location: string | null | undefined,
  rules: readonly LocationRule[] = LOCATION_RULES
): LocationCategory {
  if (location == null || location.trim() === "") return UNKNOWN_CATEGORY;
  const text = location.toLowerCase();
  for (const rule of rules) {
    if (rule.keywords.some((k) => text.includes(k))) return rule.category;
  }
  return FALLBACK_CATEGORY;
}

// ─── SQL ────────────────────────────────────────────────────────────────────

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Render the CASE expression for a column or macro parameter. Blank means empty
 * after stripping whitespace; `contains` keeps keywords literal.
 */
export function buildLocationCaseSql(arg: string, rules: readonly LocationRule[] = LOCATION_RULES): string {
  const lines = [
    "CASE",
    `  WHEN ${arg} IS NULL OR regexp_matches(${arg}, '^${SQL_WHITESPACE_CLASS}*$') THEN ${sqlString(UNKNOWN_CATEGORY)}`,
  ];
  for (const rule of rules) {
    const tests = rule.keywords.map((k) => `contains(lower(${arg}), ${sqlString(k)})`).join(" OR ");
    lines.push(`  WHEN ${tests} THEN ${sqlString(rule.category)}`);
  }
  lines.push(`  ELSE ${sqlString(FALLBACK_CATEGORY)}`, "END");
  return lines.join("\n");
}

/** `CREATE MACRO loc_category(loc)` statement used by every query. */
export function buildLocationMacroSql(rules: readonly LocationRule[] = LOCATION_RULES): string {
  return `CREATE OR REPLACE MACRO loc_category(loc) AS\n${buildLocationCaseSql("loc", rules)};`;
}
