import { z } from "zod";
import { LOCATION_CATEGORIES, STRENGTHS } from "../../services/types.ts";

/** Bounds the UI offers for the interactions row cap. */
export const INTERACTION_LIMIT_MIN = 100;
export const INTERACTION_LIMIT_MAX = 100_000;

export const SEARCH_LIMIT_MAX = 500;

export const ProteinParamsSchema = z.object({
  id: z.string().trim().min(1),
});

export const SearchQuerySchema = z.object({
  q: z.string(),
  limit: z.coerce.number().int().min(1).max(SEARCH_LIMIT_MAX).default(50),
});

/**
 * "any" (or absent) means no strength filter; the core takes undefined for that.
 */
const strengthSchema = z
  .union([z.literal("any"), z.enum(STRENGTHS)])
  .default("any")
  .transform((v) => (v === "any" ? undefined : v));

/**
 * Categories arrive as `?category=A&category=B` or `?category=A,B`.
 * Empty entries are dropped; every remaining entry must be a known category.
 */
const categoriesSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((v) =>
    (v === undefined ? [] : Array.isArray(v) ? v : [v])
      .flatMap((s) => s.split(","))
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  )
  .pipe(z.array(z.enum(LOCATION_CATEGORIES)));

export const NeighborQuerySchema = z.object({
  minScore: z.coerce.number().min(0).max(1).default(0),
  strength: strengthSchema,
});

export const InteractionsQuerySchema = NeighborQuerySchema.extend({
  category: categoriesSchema,
  limit: z.coerce.number().int().min(INTERACTION_LIMIT_MIN).max(INTERACTION_LIMIT_MAX).default(5000),
});

export type SearchQuery = z.infer<typeof SearchQuerySchema>;
export type NeighborQuery = z.infer<typeof NeighborQuerySchema>;
export type InteractionsQuery = z.infer<typeof InteractionsQuerySchema>;

/** Flatten zod issues into "path: message; ..." as returned to clients. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.length ? e.path.join(".") : "value";
      return `${path}: ${e.message}`;
    })
    .join("; ");
}
