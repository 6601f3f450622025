import { z } from "zod";

/**
 * The book_token needed to complete a reservation
 */
export const DetailsBookTokenSchema = z.object({
    value: z.string(),
    date_expires: z.string().optional(), // ISO datetime
});

/**
 * Response from GET /3/details
 * Only book_token matters to the sniper; everything else passes through.
 */
export const DetailsResponseSchema = z.object({
    book_token: DetailsBookTokenSchema.nullable().optional(),
    cancellation: z.unknown().optional(),
    payment: z.unknown().optional(),
}).passthrough();

export type DetailsResponse = z.infer<typeof DetailsResponseSchema>;

/**
 * Query params for GET /3/details
 */
export interface DetailsParams {
    config_id: string;
    day: string; // YYYY-MM-DD
    party_size: number;
}
