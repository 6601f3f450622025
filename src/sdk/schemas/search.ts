import { z } from "zod";

export const SearchHitSchema = z.object({
    id: z.object({ resy: z.number() }).passthrough(),
    name: z.string(),
    location: z.object({
        locality: z.string().optional(),
        region: z.string().optional(),
        neighborhood: z.string().nullable().optional(),
    }).passthrough().optional(),
    cuisine: z.array(z.string()).optional(),
    price_range: z.number().optional(),
    url_slug: z.string().optional(),
}).passthrough();

/**
 * Response from GET /3/venuesearch/search
 */
export const SearchResponseSchema = z.object({
    search: z.object({
        hits: z.array(SearchHitSchema).default([]),
    }).passthrough().optional(),
}).passthrough();

export type SearchHit = z.infer<typeof SearchHitSchema>;
export type SearchResponse = z.infer<typeof SearchResponseSchema>;

export interface SearchParams {
    query: string;
    per_page?: number;
    lat?: number;
    long?: number;
}
