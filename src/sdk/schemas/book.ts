import { z } from "zod";

/**
 * Response from POST /3/book
 * The actual reservation confirmation
 */
export const BookResponseSchema = z.object({
    reservation_id: z.number(),
    resy_token: z.string(),
});

export type BookResponse = z.infer<typeof BookResponseSchema>;

/**
 * Extended book response - Resy sometimes nests the confirmation under specs
 */
export const BookResponseExtendedSchema = z.object({
    reservation_id: z.number().optional(),
    resy_token: z.string().optional(),
    specs: z.object({
        reservation_id: z.number(),
        resy_token: z.string(),
    }).optional(),
}).passthrough();

/**
 * Request body for booking endpoint
 */
export interface BookParams {
    book_token: string;
    payment_method_id?: number;
    source_id?: string; // e.g., "resy.com-venue-details"
}
