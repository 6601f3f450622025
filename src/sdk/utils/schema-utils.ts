import { z } from "zod";
import { logger } from "../../logger";

/**
 * Parse data with a schema and log any unknown top-level fields.
 * Helps spot undocumented API fields that should be added to schemas.
 */
export function parseWithUnknownFieldDetection<T extends z.ZodObject<z.ZodRawShape>>(
    schema: T,
    data: unknown,
    context?: string
): z.infer<T> {
    const result: z.infer<T> = schema.parse(data);

    if (typeof data === "object" && data !== null) {
        const unknownFields = listUnknownFields(schema, data);

        if (unknownFields.length > 0) {
            logger.debug({ context, unknownFields }, "Unknown fields in Resy response");
        }
    }

    return result;
}

/**
 * Keys present in the payload that the schema doesn't declare
 */
export function listUnknownFields<T extends z.ZodObject<z.ZodRawShape>>(
    schema: T,
    data: object
): string[] {
    const knownKeys = new Set(Object.keys(schema.shape));
    return Object.keys(data).filter((key) => !knownKeys.has(key));
}
