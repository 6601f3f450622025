/**
 * Shared test fixtures: a vi.fn-backed Resy client and watch builders
 */
import { vi, type Mock } from "vitest";
import type {
  BookingApi,
  BookParams,
  BookResponse,
  DetailsParams,
  DetailsResponse,
  FindParams,
  FindResponse,
  SearchParams,
  SearchResponse,
} from "../src/sdk";
import type { NewWatch } from "../src/db/schema";

export interface FakeResy extends BookingApi {
  search: Mock<(params: SearchParams) => Promise<SearchResponse>>;
  findSlots: Mock<(params: FindParams) => Promise<FindResponse>>;
  getDetails: Mock<(params: DetailsParams) => Promise<DetailsResponse>>;
  bookReservation: Mock<(params: BookParams) => Promise<BookResponse>>;
}

/**
 * Find response with one venue offering the given slots
 */
export function findResponse(slots: Array<{ start: string; token?: string }>): FindResponse {
  return {
    results: {
      venues: [
        {
          slots: slots.map(({ start, token }) => ({
            config: { token: token ?? `cfg-${start}` },
            date: { start },
          })),
        },
      ],
    },
  };
}

/**
 * Client that finds nothing and books successfully until told otherwise
 */
export function createFakeResy(): FakeResy {
  return {
    search: vi.fn<(params: SearchParams) => Promise<SearchResponse>>()
      .mockResolvedValue({ search: { hits: [] } }),
    findSlots: vi.fn<(params: FindParams) => Promise<FindResponse>>()
      .mockResolvedValue(findResponse([])),
    getDetails: vi.fn<(params: DetailsParams) => Promise<DetailsResponse>>()
      .mockResolvedValue({ book_token: { value: "book-tok" } }),
    bookReservation: vi.fn<(params: BookParams) => Promise<BookResponse>>()
      .mockResolvedValue({ reservation_id: 777, resy_token: "resy-tok" }),
  };
}

export function newWatch(overrides: Partial<NewWatch> = {}): NewWatch {
  return {
    venue_id: "1505",
    venue_name: "Test Bistro",
    party_size: 2,
    date_start: "2026-06-01",
    date_end: null,
    time_earliest: "17:00",
    time_latest: "22:00",
    snipe_mode: false,
    active: true,
    ...overrides,
  };
}
