import {
    FindResponseSchema,
    DetailsResponseSchema,
    BookResponseSchema,
    BookResponseExtendedSchema,
    SearchResponseSchema,
    VenueResponseSchema,
} from "./schemas";
import type {
    FindParams,
    FindResponse,
    DetailsParams,
    DetailsResponse,
    BookParams,
    BookResponse,
    SearchParams,
    SearchResponse,
    VenueResponse,
} from "./schemas";
import { parseWithUnknownFieldDetection } from "./utils/schema-utils";
import { RemoteCallError, ResyAPIError } from "./errors";
import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { ZodError } from "zod";

const RESY_API_BASE = "https://api.resy.com";
const DEFAULT_TIMEOUT_MS = 15_000;

// Default geo: NYC
const DEFAULT_LAT = 40.7128;
const DEFAULT_LONG = -74.006;

export interface ResyClientConfig {
    apiKey: string;
    authToken?: string;
    timeoutMs?: number;
    debug?: boolean;
}

/**
 * The four remote operations the monitor depends on
 */
export interface BookingApi {
    search(params: SearchParams): Promise<SearchResponse>;
    findSlots(params: FindParams): Promise<FindResponse>;
    getDetails(params: DetailsParams): Promise<DetailsResponse>;
    bookReservation(params: BookParams): Promise<BookResponse>;
}

/**
 * Type-safe Resy API client using Axios
 */
export class ResyClient implements BookingApi {
    private authToken?: string;
    private apiKey: string;
    private debug: boolean;
    private axiosInstance: AxiosInstance;

    constructor(config: ResyClientConfig) {
        this.apiKey = config.apiKey;
        this.authToken = config.authToken;
        this.debug = config.debug ?? false;
        this.axiosInstance = axios.create({
            baseURL: RESY_API_BASE,
            timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            // Don't throw on non-2xx status codes - we handle them manually
            validateStatus: () => true,
        });
    }

    /**
     * Build headers for requests
     */
    private getHeaders(includeAuth = false): Record<string, string> {
        const headers: Record<string, string> = {
            "Accept": "application/json, text/plain, */*",
            "Authorization": `ResyAPI api_key="${this.apiKey}"`,
            "Origin": "https://resy.com",
            "Referer": "https://resy.com/",
            "User-Agent": "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36",
        };

        if (includeAuth && this.authToken) {
            headers["X-Resy-Auth-Token"] = this.authToken;
            headers["X-Resy-Universal-Auth"] = this.authToken;
        }

        return headers;
    }

    /**
     * Run a request, turning transport failures into RemoteCallError
     */
    private async send(operation: string, request: () => Promise<AxiosResponse<unknown>>): Promise<AxiosResponse<unknown>> {
        try {
            return await request();
        } catch (error) {
            const reason = axios.isAxiosError(error) && error.code === "ECONNABORTED"
                ? "request timed out"
                : error instanceof Error ? error.message : String(error);
            throw new RemoteCallError(`${operation} failed: ${reason}`, operation, { cause: error });
        }
    }

    /**
     * Helper to handle API responses and throw typed errors
     */
    private handleResponse(operation: string, response: AxiosResponse<unknown>): unknown {
        const { status, data } = response;
        if (status < 200 || status >= 300) {
            // Convert data to string for raw body logging
            const rawBody = typeof data === "string" ? data : JSON.stringify(data);

            // Extract code if present
            const apiCode = typeof data === "object" && data !== null && "code" in data && typeof data.code === "number"
                ? data.code
                : undefined;

            throw new ResyAPIError(`${operation} failed: ${status}`, operation, status, apiCode, rawBody);
        }
        return data;
    }

    /**
     * Validate a payload; a shape we can't use is a remote failure like any other
     */
    private parse<T>(operation: string, parse: () => T): T {
        try {
            return parse();
        } catch (error) {
            if (error instanceof ZodError) {
                throw new RemoteCallError(
                    `${operation} returned an unexpected payload: ${error.issues.map((i) => i.path.join(".")).join(", ")}`,
                    operation,
                    { cause: error }
                );
            }
            throw error;
        }
    }

    // ============ Discovery Endpoints ============

    /**
     * Search venues by name
     * GET /3/venuesearch/search
     */
    async search(params: SearchParams): Promise<SearchResponse> {
        const lat = params.lat ?? DEFAULT_LAT;
        const long = params.long ?? DEFAULT_LONG;
        const response = await this.send("search", () =>
            this.axiosInstance.get("/3/venuesearch/search", {
                headers: this.getHeaders(true),
                params: {
                    query: params.query,
                    geo: JSON.stringify({ latitude: lat, longitude: long }),
                    types: JSON.stringify(["venue"]),
                    per_page: params.per_page ?? 10,
                },
            })
        );

        const data = this.handleResponse("search", response);
        return this.parse("search", () => SearchResponseSchema.parse(data));
    }

    /**
     * Venue details
     * GET /4/venue
     */
    async getVenue(venueId: string): Promise<VenueResponse> {
        const response = await this.send("getVenue", () =>
            this.axiosInstance.get("/4/venue", {
                headers: this.getHeaders(true),
                params: { id: venueId },
            })
        );

        const data = this.handleResponse("getVenue", response);
        return this.parse("getVenue", () => VenueResponseSchema.parse(data));
    }

    // ============ Booking Flow Endpoints ============

    /**
     * Step 1: Find available time slots for a specific day
     * GET /4/find
     */
    async findSlots(params: FindParams): Promise<FindResponse> {
        const response = await this.send("findSlots", () =>
            this.axiosInstance.get("/4/find", {
                headers: this.getHeaders(true),
                params: {
                    venue_id: params.venue_id,
                    day: params.day,
                    party_size: params.party_size,
                    lat: params.lat ?? DEFAULT_LAT,
                    long: params.long ?? DEFAULT_LONG,
                },
            })
        );

        const data = this.handleResponse("findSlots", response);

        return this.parse("findSlots", () =>
            this.debug
                ? parseWithUnknownFieldDetection(FindResponseSchema, data, "findSlots")
                : FindResponseSchema.parse(data)
        );
    }

    /**
     * Step 2: Get details and book_token for a specific slot
     * GET /3/details
     */
    async getDetails(params: DetailsParams): Promise<DetailsResponse> {
        const response = await this.send("getDetails", () =>
            this.axiosInstance.get("/3/details", {
                headers: this.getHeaders(true),
                params: {
                    config_id: params.config_id,
                    day: params.day,
                    party_size: params.party_size,
                },
            })
        );

        const data = this.handleResponse("getDetails", response);

        return this.parse("getDetails", () =>
            this.debug
                ? parseWithUnknownFieldDetection(DetailsResponseSchema, data, "getDetails")
                : DetailsResponseSchema.parse(data)
        );
    }

    /**
     * Step 3: Book the reservation
     * POST /3/book
     */
    async bookReservation(params: BookParams): Promise<BookResponse> {
        const body = new URLSearchParams({
            book_token: params.book_token,
            source_id: params.source_id ?? "resy.com-venue-details",
        });
        if (params.payment_method_id !== undefined) {
            body.set("struct_payment_method", JSON.stringify({ id: params.payment_method_id }));
        }

        const response = await this.send("bookReservation", () =>
            this.axiosInstance.post("/3/book", body.toString(), {
                headers: {
                    ...this.getHeaders(true),
                    "Content-Type": "application/x-www-form-urlencoded",
                },
            })
        );

        const data = this.handleResponse("bookReservation", response);

        return this.parse("bookReservation", () => {
            // Handle both response formats
            const extended = BookResponseExtendedSchema.parse(data);
            if (extended.reservation_id !== undefined && extended.resy_token !== undefined) {
                return { reservation_id: extended.reservation_id, resy_token: extended.resy_token };
            }
            if (extended.specs) {
                return { reservation_id: extended.specs.reservation_id, resy_token: extended.specs.resy_token };
            }
            return BookResponseSchema.parse(data);
        });
    }
}
