import type { Stage } from "../types.js";

export const NO_CANDIDATES_WARNING = "No activities available for selection";

/** Selection stage: the top-ranked venue, or null when nothing survived ranking. */
export const selectionStage: Stage<"selection"> = async (_run, snapshot) => {
  const selection = snapshot.ranking[0] ?? null;
  if (!selection) {
    return { output: { selection: null }, warnings: [NO_CANDIDATES_WARNING], narration: "No venue to select" };
  }
  return {
    output: { selection },
    narration: `Selected ${selection.name} (score ${selection.compositeScore.toFixed(2)}, ${selection.rating}/5.0, ${selection.category}) at ${selection.address}`,
  };
};
