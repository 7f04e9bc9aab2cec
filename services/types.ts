// ─── Logger ──────────────────────────────────────────────────────────────────
/** Structured logger shape shared by pino (Fastify's `app.log`) and `console`. */
export interface Logger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  debug(obj: object, msg?: string): void;
}

// ─── Strength ────────────────────────────────────────────────────────────────
export const STRENGTHS = ["strong", "moderate", "weak"] as const;

/** Qualitative confidence bucket of an interaction edge. */
export type Strength = (typeof STRENGTHS)[number];

// ─── LocationCategory ────────────────────────────────────────────────────────
export const LOCATION_CATEGORIES = [
  "Unknown",
  "Mitochondrion",
  "Endoplasmic Reticulum",
  "Golgi apparatus",
  "Plasma membrane",
  "Lysosome",
  "Endosome",
  "Peroxisome",
  "Cytoplasm",
  "Nucleus",
  "Cytoskeleton",
  "Extracellular",
  "Ribosome",
  "Centrosome",
  "Membrane",
  "Other",
] as const;

/** Normalized subcellular-location bucket derived from free-text annotation. */
export type LocationCategory = (typeof LOCATION_CATEGORIES)[number];

export function isLocationCategory(value: unknown): value is LocationCategory {
  return LOCATION_CATEGORIES.some((c) => c === value);
}

// ─── SearchHit ───────────────────────────────────────────────────────────────
/** One autocomplete candidate: identifier, display name (protein name or id) and location category. */
export interface SearchHit {
  id: string;
  displayName: string;
  category: LocationCategory;
}

// ─── NeighborFilter ──────────────────────────────────────────────────────────
/**
 * Filters applied to the neighbors of a protein.
 * - minScore: keep edges with score >= minScore (default 0)
 * - strength: undefined = any strength, otherwise exact match
 */
export interface NeighborFilter {
  minScore?: number;
  strength?: Strength;
}

// ─── InteractionQuery ────────────────────────────────────────────────────────
/** Neighbor filter plus optional partner-category set and row limit (default 5000). */
export interface InteractionQuery extends NeighborFilter {
  categories?: readonly LocationCategory[];
  limit?: number;
}

// ─── InteractionRow ──────────────────────────────────────────────────────────
/** One partner of the queried protein. `strength` is passed through from the edge table as stored. */
export interface InteractionRow {
  partnerId: string;
  partnerDisplayName: string;
  partnerCategory: LocationCategory;
  score: number;
  strength: string;
}
