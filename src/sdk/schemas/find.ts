import { z } from "zod";

// ============ Helper Schemas ============

// Slot config - the token is what /3/details wants as config_id
export const SlotConfigSchema = z.object({
    id: z.number().optional(),
    type: z.string().nullable().optional(),
    token: z.string().optional(),
}).passthrough();

// Slot date - start looks like "2024-06-01 19:00:00"
export const SlotDateSchema = z.object({
    start: z.string().optional(),
    end: z.string().optional(),
}).passthrough();

export const FindSlotSchema = z.object({
    config: SlotConfigSchema.optional(),
    date: SlotDateSchema.optional(),
    size: z.object({ min: z.number(), max: z.number() }).passthrough().optional(),
}).passthrough();

export const FindVenueSchema = z.object({
    venue: z.object({
        id: z.object({ resy: z.number() }).passthrough().optional(),
        name: z.string().optional(),
    }).passthrough().optional(),
    slots: z.array(FindSlotSchema).default([]),
}).passthrough();

/**
 * Response from GET /4/find
 */
export const FindResponseSchema = z.object({
    results: z.object({
        venues: z.array(FindVenueSchema).default([]),
    }).passthrough().optional(),
}).passthrough();

export type FindResponse = z.infer<typeof FindResponseSchema>;

/**
 * Query params for GET /4/find
 */
export interface FindParams {
    venue_id: string;
    day: string; // YYYY-MM-DD
    party_size: number;
    lat?: number;
    long?: number;
}
