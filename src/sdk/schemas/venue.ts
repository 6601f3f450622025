import { z } from "zod";

/**
 * Response from GET /4/venue
 */
export const VenueResponseSchema = z.object({
    id: z.object({ resy: z.number() }).passthrough().optional(),
    name: z.string(),
    location: z.object({
        neighborhood: z.string().nullable().optional(),
        locality: z.string().optional(),
    }).passthrough().optional(),
    type: z.string().nullable().optional(),
}).passthrough();

export type VenueResponse = z.infer<typeof VenueResponseSchema>;
