import type { Planner } from "../../services/planner/planner.service.js";
import { PlanBodySchema } from "./plan.validator.js";
import type { PlanResponse } from "./plan.types.js";

export interface ControllerResponse {
  status: 200 | 400 | 500;
  body: PlanResponse;
}

/** Validate the body, run one plan, map the outcome to an HTTP status. */
export async function createPlan(
  planner: Planner,
  body: unknown
): Promise<ControllerResponse> {
  const parsed = PlanBodySchema.safeParse(body ?? {});

  if (!parsed.success) {
    const errorMessages = parsed.error.issues.map((e) => {
      const path = e.path.length ? e.path.join(".") : "value";
      return `${path}: ${e.message}`;
    }).join("; ");
    return { status: 400, body: { success: false, error: `Invalid request body: ${errorMessages}` } };
  }

  const plan = await planner.plan({ locationKey: parsed.data.zipCode, userMessage: parsed.data.message });

  if (plan.status === "failed") {
    return { status: 500, body: { success: false, error: plan.error ?? "Failed to create plan", plan } };
  }
  return { status: 200, body: { success: true, plan } };
}
