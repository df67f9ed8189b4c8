import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { CatalogEntry, CatalogQuery, CatalogSearch } from "../planner/types.js";
import { VENUE_CATEGORIES } from "../planner/types.js";

const SampleVenueSchema = z.object({
  name: z.string(),
  address: z.string(),
  rating: z.number().min(0).max(5),
  priceLevel: z.number().int().min(1).max(4),
  category: z.enum(VENUE_CATEGORIES),
});

const SampleFileSchema = z.array(SampleVenueSchema);

export type SampleVenue = z.infer<typeof SampleVenueSchema>;

/** Resolved against the working directory, like MEMORY_PATH. */
export const DEFAULT_SAMPLE_PATH = "./data/sample-venues.json";

/**
 * Offline catalog backed by a JSON file. Used when no Places API key is
 * configured; ignores location and radius, honors category and price ceiling.
 */
export class SampleCatalog implements CatalogSearch {
  private venues: Promise<SampleVenue[]> | null = null;

  constructor(private readonly source: string = DEFAULT_SAMPLE_PATH) {}

  private load(): Promise<SampleVenue[]> {
    this.venues ??= readFile(this.source, "utf8")
      .then((text) => SampleFileSchema.parse(JSON.parse(text)))
      .catch((err: unknown) => {
        this.venues = null;
        throw err;
      });
    return this.venues;
  }

  async search(query: CatalogQuery): Promise<CatalogEntry[]> {
    const venues = await this.load();
    return venues
      .filter((v) => v.category === query.category && v.priceLevel <= query.maxPrice)
      .map(({ name, address, rating, priceLevel }) => ({ name, address, rating, priceLevel }));
  }
}
