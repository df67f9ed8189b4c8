import { errorMessage } from "../../collaborators/errors.js";
import { withTimeout } from "../../collaborators/timeout.js";
import type { CatalogEntry, PlannerRun, Stage, Venue, VenueCategory } from "../types.js";

function tag(entries: CatalogEntry[], category: VenueCategory): Venue[] {
  return entries.map((e) => ({
    name: e.name,
    address: e.address,
    rating: e.rating,
    priceLevel: e.priceLevel,
    category,
  }));
}

/**
 * Fan out one catalog search per category and join them all. The result keeps
 * category order, then catalog order within a category. Venues returned under
 * two categories appear twice. Failed categories come back as warnings.
 */
export async function aggregateCandidates(
  run: PlannerRun,
  categories: readonly VenueCategory[]
): Promise<{ candidates: Venue[]; warnings: string[] }> {
  const { catalog } = run.collaborators;
  const { radiusMiles, maxPrice, collaboratorTimeoutMs } = run.settings;

  const settled = await Promise.allSettled(
    categories.map((category) =>
      withTimeout("catalog", collaboratorTimeoutMs, () =>
        catalog.search({ category, locationKey: run.request.locationKey, radiusMiles, maxPrice })
      )
    )
  );

  const candidates: Venue[] = [];
  const warnings: string[] = [];
  settled.forEach((result, i) => {
    const category = categories[i];
    if (category === undefined) return;
    if (result.status === "fulfilled") {
      candidates.push(...tag(result.value, category));
      run.logger.debug({ category, count: result.value.length }, "catalog search done");
    } else {
      warnings.push(`Search failed for ${category}: ${errorMessage(result.reason)}`);
    }
  });

  return { candidates, warnings };
}

/** Candidate stage: categories → concatenated venue list. */
export const candidatesStage: Stage<"candidates"> = async (run, snapshot) => {
  const { candidates, warnings } = await aggregateCandidates(run, snapshot.categories);
  return {
    output: { candidates },
    warnings,
    narration: `Found ${candidates.length} venues across ${snapshot.categories.join(", ") || "no categories"} within ${run.settings.radiusMiles} miles of ${run.request.locationKey}, price level <= ${run.settings.maxPrice}`,
  };
};
