import { z } from "zod";

/** Max length for the free-text request, mirrored from the planner's own check. */
const MESSAGE_MAX_LENGTH = 2_000;

/**
 * Validates the POST /plan body.
 * - message: optional free text, defaults to "Plan my Saturday".
 * - zipCode: optional postal code or place name; blank means "use the configured default".
 */
export const PlanBodySchema = z
  .object({
    message: z.string().max(MESSAGE_MAX_LENGTH).default("Plan my Saturday"),
    zipCode: z
      .string()
      .trim()
      .max(64)
      .optional()
      .transform((v) => (v === "" ? undefined : v)),
  })
  .strict();

export type PlanBody = z.infer<typeof PlanBodySchema>;
