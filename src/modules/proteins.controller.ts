import type { z } from "zod";
import { interactionsCsvFileName, toInteractionsCsv } from "../../services/export/interactions.csv.ts";
import type { PpiContext } from "../../services/ppi.context.ts";
import type {
    BadRequest,
    CategoriesResponse,
    CsvExport,
    InteractionsResponse,
    ProteinResponse,
    SearchResponse,
} from "./proteins.types.ts";
import {
    InteractionsQuerySchema,
    NeighborQuerySchema,
    ProteinParamsSchema,
    SearchQuerySchema,
    formatIssues,
} from "./proteins.validator.ts";

function badRequest(error: z.ZodError, what = "query parameters"): BadRequest {
    return { error: `Invalid ${what}: ${formatIssues(error)}`, status: 400 };
}

export async function searchProteins(ctx: PpiContext, queryParams: unknown): Promise<SearchResponse | BadRequest> {
    const query = SearchQuerySchema.safeParse(queryParams);
    if (!query.success) return badRequest(query.error);

    return { results: await ctx.search(query.data.q, query.data.limit) };
}

export async function getProtein(ctx: PpiContext, params: unknown): Promise<ProteinResponse | BadRequest> {
    const p = ProteinParamsSchema.safeParse(params);
    if (!p.success) return badRequest(p.error, "path parameters");

    return { id: p.data.id, displayName: await ctx.displayName(p.data.id) };
}

export async function getPartnerCategories(
    ctx: PpiContext,
    params: unknown,
    queryParams: unknown
): Promise<CategoriesResponse | BadRequest> {
    const p = ProteinParamsSchema.safeParse(params);
    if (!p.success) return badRequest(p.error, "path parameters");
    const query = NeighborQuerySchema.safeParse(queryParams);
    if (!query.success) return badRequest(query.error);

    const categories = await ctx.partnerCategories(p.data.id, {
        minScore: query.data.minScore,
        strength: query.data.strength,
    });
    return { categories };
}

export async function getInteractions(
    ctx: PpiContext,
    params: unknown,
    queryParams: unknown
): Promise<InteractionsResponse | BadRequest> {
    const p = ProteinParamsSchema.safeParse(params);
    if (!p.success) return badRequest(p.error, "path parameters");
    const query = InteractionsQuerySchema.safeParse(queryParams);
    if (!query.success) return badRequest(query.error);

    const { id } = p.data;
    const [displayName, interactions] = await Promise.all([
        ctx.displayName(id),
        ctx.fetchInteractions(id, {
            minScore: query.data.minScore,
            strength: query.data.strength,
            categories: query.data.category,
            limit: query.data.limit,
        }),
    ]);
    return { id, displayName, interactions };
}

export async function exportInteractions(
    ctx: PpiContext,
    params: unknown,
    queryParams: unknown
): Promise<CsvExport | BadRequest> {
    const result = await getInteractions(ctx, params, queryParams);
    if ("status" in result) return result;

    return { fileName: interactionsCsvFileName(result.id), body: toInteractionsCsv(result.interactions) };
}
