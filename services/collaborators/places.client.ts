/**
 * Google Places catalog — geocode the location key, then a Nearby Search per
 * category. Docs: https://developers.google.com/maps/documentation/places/web-service/search-nearby
 */

import { z } from "zod";
import type { Logger } from "pino";
import type { CatalogEntry, CatalogQuery, CatalogSearch, VenueCategory } from "../planner/types.js";
import { CollaboratorError, CollaboratorErrorCode, errorMessage } from "./errors.js";

// ─── Constants ──────────────────────────────────────────────────────────────

const PLACES_URL = "https://maps.googleapis.com/maps/api/place";
const GEOCODE_URL = "https://maps.googleapis.com/maps/api/geocode/json";
const METERS_PER_MILE = 1609.34;
const RESULT_LIMIT = 10;
const DEFAULT_PRICE_LEVEL = 1;
const MIN_PRICE_LEVEL = 1;
/** Nearby Search rejects a larger radius. */
export const MAX_RADIUS_METERS = 50_000;
const GEOCODE_CACHE_LIMIT = 500;

/** Used when the location key cannot be geocoded. */
export const FALLBACK_COORDINATES = { lat: 37.7749, lng: -122.4194 } as const;

export const PLACE_TYPES: Record<VenueCategory, string> = {
  restaurant: "restaurant",
  entertainment: "tourist_attraction|amusement_park|movie_theater|museum",
  outdoor: "park|tourist_attraction",
  shopping: "shopping_mall|store",
};

// ─── Response schemas ───────────────────────────────────────────────────────

const GeocodeResponseSchema = z.object({
  results: z.array(
    z.object({
      geometry: z.object({ location: z.object({ lat: z.number(), lng: z.number() }) }),
    })
  ),
});

const NearbyResponseSchema = z.object({
  status: z.string().optional(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        name: z.string().optional(),
        vicinity: z.string().optional(),
        rating: z.number().optional(),
        price_level: z.number().optional(),
      })
    )
    .default([]),
});

type NearbyPlace = z.infer<typeof NearbyResponseSchema>["results"][number];

// ─── Helpers ───────────────────────────────────────────────────────────────

export function milesToMeters(miles: number): number {
  return Math.min(MAX_RADIUS_METERS, Math.trunc(miles * METERS_PER_MILE));
}

/**
 * First RESULT_LIMIT places, defaults filled in, anything above the price
 * ceiling dropped. Google reports free places as price level 0; those count as 1.
 */
export function toCatalogEntries(places: readonly NearbyPlace[], maxPrice: number): CatalogEntry[] {
  return places
    .slice(0, RESULT_LIMIT)
    .map((place) => ({
      name: place.name ?? "Unknown Place",
      address: place.vicinity ?? "Address not available",
      rating: place.rating ?? 0,
      priceLevel: Math.max(MIN_PRICE_LEVEL, place.price_level ?? DEFAULT_PRICE_LEVEL),
    }))
    .filter((entry) => entry.priceLevel <= maxPrice);
}

// ─── Client ─────────────────────────────────────────────────────────────────

export interface GooglePlacesCatalogOptions {
  apiKey: string;
  timeoutMs: number;
  logger: Logger;
}

type Coordinates = { lat: number; lng: number };

export class GooglePlacesCatalog implements CatalogSearch {
  private readonly options: GooglePlacesCatalogOptions;
  /** Successful geocodes by location key; one run searches several categories around the same point. */
  private readonly coordinates = new Map<string, Promise<Coordinates | null>>();

  constructor(options: GooglePlacesCatalogOptions) {
    this.options = options;
  }

  private async getJson(url: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (err) {
      throw new CollaboratorError("catalog", CollaboratorErrorCode.UNREACHABLE, `Places API unreachable: ${errorMessage(err)}`);
    }
    if (!response.ok) {
      throw new CollaboratorError(
        "catalog",
        CollaboratorErrorCode.HTTP_ERROR,
        `Places request failed: ${response.status} ${response.statusText}`
      );
    }
    return response.json().catch(() => null);
  }

  private async lookupCoordinates(locationKey: string): Promise<Coordinates | null> {
    const params = new URLSearchParams({ address: locationKey, key: this.options.apiKey });
    try {
      const parsed = GeocodeResponseSchema.safeParse(await this.getJson(`${GEOCODE_URL}?${params.toString()}`));
      const first = parsed.success ? parsed.data.results[0] : undefined;
      if (first) return first.geometry.location;
      this.options.logger.warn({ locationKey }, "geocoding returned no results; using fallback coordinates");
    } catch (err) {
      this.options.logger.warn({ locationKey, err: errorMessage(err) }, "geocoding failed; using fallback coordinates");
    }
    return null;
  }

  /**
   * Coordinates for a postal code or address; FALLBACK_COORDINATES when
   * geocoding fails. Concurrent and later calls for the same key share one
   * lookup. Failed lookups are not kept.
   */
  async geocode(locationKey: string): Promise<Coordinates> {
    let pending = this.coordinates.get(locationKey);
    if (!pending) {
      if (this.coordinates.size >= GEOCODE_CACHE_LIMIT) this.coordinates.clear();
      pending = this.lookupCoordinates(locationKey);
      this.coordinates.set(locationKey, pending);
    }
    const found = await pending;
    if (found) return { ...found };
    this.coordinates.delete(locationKey);
    return { ...FALLBACK_COORDINATES };
  }

  async search(query: CatalogQuery): Promise<CatalogEntry[]> {
    const { lat, lng } = await this.geocode(query.locationKey);
    const params = new URLSearchParams({
      location: `${lat},${lng}`,
      radius: String(milesToMeters(query.radiusMiles)),
      type: PLACE_TYPES[query.category],
      key: this.options.apiKey,
    });

    const parsed = NearbyResponseSchema.safeParse(await this.getJson(`${PLACES_URL}/nearbysearch/json?${params.toString()}`));
    if (!parsed.success) {
      throw new CollaboratorError("catalog", CollaboratorErrorCode.MALFORMED_RESPONSE, "Places response did not match the expected shape");
    }
    const { status, error_message: apiError } = parsed.data;
    if (status && status !== "OK" && status !== "ZERO_RESULTS") {
      throw new CollaboratorError("catalog", CollaboratorErrorCode.HTTP_ERROR, `Places API status ${status}${apiError ? `: ${apiError}` : ""}`);
    }
    return toCatalogEntries(parsed.data.results, query.maxPrice);
  }
}
